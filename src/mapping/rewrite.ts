/**
 * Rewrite Engine
 *
 * Drives the populated grid to its final shape: first every crossing
 * location is resolved with the first matching crossing gadget, then the
 * dangling-leg simplifiers trim line ends. Each application is recorded on
 * the tape together with its top-left corner so it can be traced or undone.
 */

import { cellKey } from "../utils/cellKey";
import { GadgetMismatchError } from "./errors";
import type { CopyLine, LatticeKind } from "./graph-types";
import type { LayoutConfig } from "./layout-config";
import { cellWeight, type CellKind, type CellState, type MappingGrid } from "./mapping-grid";
import { sourceMatrix, type Pattern } from "./pattern";
import type { Ruleset } from "./gadget-catalog";

/**
 * One gadget application; row/col is the 0-indexed top-left of its window.
 */
export interface TapeEntry {
  pattern: Pattern;
  row: number;
  col: number;
}

const sourceMatrixCache = new WeakMap<Pattern, CellKind[][]>();

function cachedSourceMatrix(pattern: Pattern): CellKind[][] {
  let matrix = sourceMatrixCache.get(pattern);
  if (!matrix) {
    matrix = sourceMatrix(pattern);
    sourceMatrixCache.set(pattern, matrix);
  }
  return matrix;
}

/**
 * King's lattice: kinds must agree exactly. A connected marker never stands
 * in for an occupied cell, or a plain crossing would fire on an edge.
 * Triangular lattice: any non-empty cell satisfies an occupied or doubled
 * expectation, but a connected expectation needs a connected cell.
 */
function cellMatches(expected: CellKind, actual: CellKind, lattice: LatticeKind): boolean {
  if (lattice === "triangular") {
    if (expected === "empty") return actual === "empty";
    if (expected === "connected") return actual === "connected";
    return actual !== "empty";
  }
  return expected === actual;
}

/**
 * Whether the pattern's source shape sits at (row, col). With checkWeights,
 * every source node's cell must also carry the node's weight.
 */
export function patternMatches(
  pattern: Pattern,
  grid: MappingGrid,
  row: number,
  col: number,
  lattice: LatticeKind,
  checkWeights: boolean
): boolean {
  const source = cachedSourceMatrix(pattern);
  for (let r = 0; r < pattern.rows; r++) {
    for (let c = 0; c < pattern.cols; c++) {
      if (!cellMatches(source[r][c], grid.get(row + r, col + c).kind, lattice)) {
        return false;
      }
    }
  }
  if (checkWeights) {
    return pattern.sourceLocs.every(
      (loc, i) => cellWeight(grid.get(row + loc.row - 1, col + loc.col - 1)) === pattern.sourceWeights[i]
    );
  }
  return true;
}

/**
 * Replace the window with the mapped nodes. Unweighted grids give every node
 * weight 1; weighted grids sum the mapped weights of repeated locations.
 */
export function applyPattern(pattern: Pattern, grid: MappingGrid, row: number, col: number, weighted: boolean): void {
  for (let r = 0; r < pattern.rows; r++) {
    for (let c = 0; c < pattern.cols; c++) {
      grid.set(row + r, col + c, { kind: "empty" });
    }
  }

  const totals = new Map<string, { r: number; c: number; weight: number; count: number }>();
  pattern.mappedLocs.forEach((loc, i) => {
    const key = cellKey(loc.row, loc.col);
    const entry = totals.get(key) ?? { r: loc.row - 1, c: loc.col - 1, weight: 0, count: 0 };
    entry.weight += weighted ? pattern.mappedWeights[i] : 1;
    entry.count++;
    totals.set(key, entry);
  });

  for (const { r, c, weight, count } of totals.values()) {
    const state: CellState = count > 1 ? { kind: "doubled", weight } : { kind: "occupied", weight };
    grid.set(row + r, col + c, state);
  }
}

/**
 * Restore the source occupancy of the window: the inverse of applyPattern
 * on cell kinds. A repeated location keeps the weight of its first listing.
 */
export function unapplyPattern(pattern: Pattern, grid: MappingGrid, row: number, col: number, weighted: boolean): void {
  const source = cachedSourceMatrix(pattern);
  const weights = new Map<string, number>();
  pattern.sourceLocs.forEach((loc, i) => {
    const key = cellKey(loc.row, loc.col);
    if (!weights.has(key)) weights.set(key, weighted ? pattern.sourceWeights[i] : 1);
  });

  for (let r = 0; r < pattern.rows; r++) {
    for (let c = 0; c < pattern.cols; c++) {
      const kind = source[r][c];
      const weight = weights.get(cellKey(r + 1, c + 1)) ?? 0;
      grid.set(row + r, col + c, kind === "empty" ? { kind: "empty" } : { kind, weight });
    }
  }
}

/**
 * Resolve every crossing. For each ordered pair of lines, the crossing
 * location is tried against the ruleset; patterns are anchored so their
 * cross location lands on it.
 */
export function applyCrossingGadgets(
  grid: MappingGrid,
  lines: readonly CopyLine[],
  ruleset: Ruleset,
  config: LayoutConfig
): TapeEntry[] {
  const tape: TapeEntry[] = [];
  const resolved = new Set<string>();
  const n = lines.length;

  for (let j = 0; j < n; j++) {
    for (let i = 0; i < n; i++) {
      const [first, second] = lines[i].vslot < lines[j].vslot ? [lines[i], lines[j]] : [lines[j], lines[i]];
      const cross = grid.crossAt(first.vslot, second.vslot, first.hslot);
      const key = cellKey(cross.row, cross.col);
      if (config.skipResolvedCrossings && resolved.has(key)) continue;

      for (const pattern of ruleset.crossing) {
        const row = cross.row - pattern.crossLocation.row + 1;
        const col = cross.col - pattern.crossLocation.col + 1;
        if (row < 0 || col < 0) continue;
        if (patternMatches(pattern, grid, row, col, ruleset.lattice, config.checkCrossingWeights)) {
          applyPattern(pattern, grid, row, col, config.weighted);
          tape.push({ pattern, row, col });
          resolved.add(key);
          break;
        }
      }
    }
  }

  return tape;
}

/**
 * Trim dangling legs. Weighted grids also require the leg's weights.
 */
export function applySimplifierGadgets(grid: MappingGrid, ruleset: Ruleset, config: LayoutConfig): TapeEntry[] {
  const tape: TapeEntry[] = [];
  const tryAt = (pattern: Pattern, row: number, col: number) => {
    if (patternMatches(pattern, grid, row, col, ruleset.lattice, config.weighted)) {
      applyPattern(pattern, grid, row, col, config.weighted);
      tape.push({ pattern, row, col });
    }
  };

  for (let pass = 0; pass < config.simplifierPasses; pass++) {
    if (config.simplifierScan === "pattern") {
      for (const pattern of ruleset.simplifiers) {
        for (let col = 0; col < grid.cols; col++) {
          for (let row = 0; row < grid.rows; row++) {
            tryAt(pattern, row, col);
          }
        }
      }
    } else {
      for (let col = 0; col < grid.cols; col++) {
        for (let row = 0; row < grid.rows; row++) {
          for (const pattern of ruleset.simplifiers) {
            tryAt(pattern, row, col);
          }
        }
      }
    }
  }

  return tape;
}

/**
 * After the crossing phase no doubled or connected cell may remain.
 */
export function assertCrossingsResolved(grid: MappingGrid): void {
  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      const kind = grid.get(row, col).kind;
      if (kind === "doubled" || kind === "connected") {
        throw new GadgetMismatchError(
          { row, col },
          `Unresolved ${kind} cell at (${row}, ${col}): no gadget in the catalog matches this region`
        );
      }
    }
  }
}

export function tapeOverhead(tape: readonly TapeEntry[]): number {
  return tape.reduce((sum, entry) => sum + entry.pattern.overhead, 0);
}
