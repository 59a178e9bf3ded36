/**
 * Pattern Lookup Tables
 *
 * For undoing a gadget on a plain configuration: given which mapped pins
 * are selected, which source nodes should be selected instead. Tables are
 * built on first use by enumerating the (small) source graph and cached
 * per pattern.
 */

import type { Pattern } from "./pattern";

interface SourceBest {
  size: number;
  /** Bitmask over source nodes */
  nodes: number;
}

/** Pin mask (bit k = pin k selected) to the best source selection with exactly those pins */
type SourceTable = Map<number, SourceBest>;

const tables = new WeakMap<Pattern, SourceTable>();

function buildSourceTable(pattern: Pattern): SourceTable {
  const count = pattern.sourceLocs.length;
  const neighborMask = new Array<number>(count).fill(0);
  for (const [u, v] of pattern.sourceEdges) {
    neighborMask[u] |= 1 << v;
    neighborMask[v] |= 1 << u;
  }

  const table: SourceTable = new Map();
  for (let nodes = 0; nodes < 1 << count; nodes++) {
    let independent = true;
    let size = 0;
    for (let v = 0; v < count; v++) {
      if ((nodes >> v) & 1) {
        if (neighborMask[v] & nodes) {
          independent = false;
          break;
        }
        size++;
      }
    }
    if (!independent) continue;

    const pins = pattern.sourcePins.reduce((mask, node, k) => mask | (((nodes >> node) & 1) << k), 0);
    const best = table.get(pins);
    if (!best || size > best.size) {
      table.set(pins, { size, nodes });
    }
  }
  return table;
}

function sourceTable(pattern: Pattern): SourceTable {
  let table = tables.get(pattern);
  if (!table) {
    table = buildSourceTable(pattern);
    tables.set(pattern, table);
  }
  return table;
}

function popcount(mask: number): number {
  let bits = 0;
  for (let m = mask; m; m &= m - 1) bits++;
  return bits;
}

/**
 * Source-node selection (one 0/1 per source location) that replaces a mapped
 * selection with the given pin mask. Among pin subsets of the mask, the one
 * with the largest source value wins; ties go to fewer pins, then the
 * smaller mask.
 */
export function sourceSelection(pattern: Pattern, mappedPins: number): number[] {
  const table = sourceTable(pattern);
  let chosen: { pins: number; best: SourceBest } | null = null;

  for (let pins = 0; pins < 1 << pattern.sourcePins.length; pins++) {
    if (pins & ~mappedPins) continue;
    const best = table.get(pins);
    if (!best) continue;
    if (
      !chosen ||
      best.size > chosen.best.size ||
      (best.size === chosen.best.size && popcount(pins) < popcount(chosen.pins))
    ) {
      chosen = { pins, best };
    }
  }

  // The empty selection is always independent, so pin mask 0 is always present
  const nodes = chosen ? chosen.best.nodes : 0;
  return pattern.sourceLocs.map((_, v) => (nodes >> v) & 1);
}
