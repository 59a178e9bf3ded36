/**
 * Copy Lines
 *
 * Each input vertex becomes an L-shaped path of grid cells. The vertical
 * segment sits in the vertex's own column slot; the horizontal segment runs
 * right along its row slot far enough to cross every later neighbor, and
 * the vertical segment spans the row slots of every earlier neighbor.
 * Two lines cross exactly where their vertices share an edge.
 */

import type { CopyLine, CopyLineCell, Edge, GridPoint } from "./graph-types";
import type { LayoutConfig } from "./layout-config";

function buildAdjacency(vertexCount: number, edges: readonly Edge[]): boolean[][] {
  const adj = Array.from({ length: vertexCount }, () => Array.from({ length: vertexCount }, () => false));
  for (const [u, v] of edges) {
    adj[u][v] = true;
    adj[v][u] = true;
  }
  return adj;
}

/**
 * For every step of the order, the vertices whose neighbors have all been
 * placed by then. A vertex is never removed before its own step.
 */
export function removeOrder(vertexCount: number, edges: readonly Edge[], order: readonly number[]): number[][] {
  const adj = buildAdjacency(vertexCount, edges);
  const degree = adj.map((row) => row.filter(Boolean).length);
  const placedNeighbors = new Array<number>(vertexCount).fill(0);
  const position = new Array<number>(vertexCount).fill(0);
  order.forEach((v, i) => {
    position[v] = i;
  });

  const result: number[][] = Array.from({ length: vertexCount }, () => []);
  const removed = new Array<boolean>(vertexCount).fill(false);

  order.forEach((v, step) => {
    for (let j = 0; j < vertexCount; j++) {
      if (adj[j][v]) placedNeighbors[j]++;
    }
    for (let j = 0; j < vertexCount; j++) {
      if (!removed[j] && placedNeighbors[j] === degree[j]) {
        result[Math.max(step, position[j])].push(j);
        removed[j] = true;
      }
    }
  });

  return result;
}

/**
 * Assign slots and extents to every vertex. Returned lines are indexed by vertex.
 */
export function createCopyLines(vertexCount: number, edges: readonly Edge[], order: readonly number[]): CopyLine[] {
  const adj = buildAdjacency(vertexCount, edges);
  const removals = removeOrder(vertexCount, edges, order);

  // slots[k] holds the vertex on horizontal slot k + 1, or -1 when free
  const slots = new Array<number>(vertexCount).fill(-1);
  const hslots = new Array<number>(vertexCount).fill(0);

  order.forEach((v, i) => {
    const free = slots.indexOf(-1);
    if (free < 0) {
      throw new Error("No free horizontal slot left");
    }
    slots[free] = v;
    hslots[i] = free + 1;

    for (const r of removals[i]) {
      const at = slots.indexOf(r);
      if (at >= 0) slots[at] = -1;
    }
  });

  const lines: CopyLine[] = new Array<CopyLine>(vertexCount);
  order.forEach((v, i) => {
    const relevantHslots: number[] = [];
    for (let j = 0; j <= i; j++) {
      if (order[j] === v || adj[order[j]][v]) relevantHslots.push(hslots[j]);
    }
    let hstop = 1;
    order.forEach((w, j) => {
      if (w === v || adj[w][v]) hstop = Math.max(hstop, j + 1);
    });

    lines[v] = {
      vertex: v,
      vslot: i + 1,
      hslot: hslots[i],
      vstart: Math.min(...relevantHslots),
      vstop: Math.max(...relevantHslots),
      hstop,
    };
  });

  return lines;
}

/**
 * The grid cell of the line's corner, where the vertical and horizontal segments meet.
 */
export function centerLocation(line: CopyLine, padding: number, spacing: number): GridPoint {
  return {
    row: spacing * (line.hslot - 1) + padding + 1,
    col: spacing * (line.vslot - 1) + padding,
  };
}

/**
 * Dense cell list of a copy line: the up arm (corner outward), the down arm,
 * the right arm, and finally the hub at the corner's right.
 *
 * Arm cells weigh 2 and each arm's far end weighs 1. The hub weighs one per
 * non-empty arm, so a line with no arms is a single weight-0 hub.
 */
export function copyLineLocations(line: CopyLine, padding: number, spacing: number): CopyLineCell[] {
  const locs: CopyLineCell[] = [];
  let arms = 0;
  const { row: I, col: J } = centerLocation(line, padding, spacing);

  const start = I + spacing * (line.vstart - line.hslot) + 1;
  if (line.vstart < line.hslot) arms++;
  for (let row = I; row >= start; row--) {
    locs.push({ row, col: J, weight: row !== start ? 2 : 1 });
  }

  const stop = I + spacing * (line.vstop - line.hslot) - 1;
  if (line.vstop > line.hslot) arms++;
  for (let row = I; row <= stop; row++) {
    if (row === I) {
      locs.push({ row: row + 1, col: J + 1, weight: 2 });
    } else {
      locs.push({ row, col: J, weight: row !== stop ? 2 : 1 });
    }
  }

  const stopCol = J + spacing * (line.hstop - line.vslot) - 1;
  if (line.hstop > line.vslot) arms++;
  for (let col = J + 2; col <= stopCol; col++) {
    locs.push({ row: I, col, weight: col !== stopCol ? 2 : 1 });
  }

  locs.push({ row: I, col: J + 1, weight: arms });
  return locs;
}

/**
 * Independent-set value the line contributes on its own, beyond the one
 * unit its vertex carries.
 */
export function copyLineOverhead(line: CopyLine, config: LayoutConfig): number {
  const { spacing, padding } = config;
  if (!config.weighted) {
    return Math.floor(copyLineLocations(line, padding, spacing).length / 2);
  }
  const up = (line.hslot - line.vstart) * spacing;
  const down = (line.vstop - line.hslot) * spacing;
  const right = Math.max((line.hstop - line.vslot) * spacing - 2, 0);
  return up + down + right;
}
