/**
 * Grid Neighbor Functions
 *
 * Defines how occupied cells connect to their neighbors for each lattice.
 * Each lattice has its own adjacency pattern.
 */

import type { GridPoint, LatticeKind } from "./graph-types";

/**
 * King's moves: 4 cardinal + 4 diagonal neighbors
 */
const KING_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

/**
 * Triangular lattice with even columns shifted down by half a cell.
 * Physical position: x = row (+ 0.5 on even columns), y = col * sqrt(3) / 2
 */
const TRIANGULAR_EVEN_COL_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 1],
];

const TRIANGULAR_ODD_COL_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
  [-1, -1],
  [-1, 1],
];

function deltasFor(p: GridPoint, lattice: LatticeKind): ReadonlyArray<readonly [number, number]> {
  if (lattice === "king") return KING_DELTAS;
  return p.col % 2 === 0 ? TRIANGULAR_EVEN_COL_DELTAS : TRIANGULAR_ODD_COL_DELTAS;
}

/**
 * Get the lattice neighbors of a point within bounds
 */
export function getNeighbors(p: GridPoint, lattice: LatticeKind, rows: number, cols: number): GridPoint[] {
  const neighbors: GridPoint[] = [];
  for (const [dr, dc] of deltasFor(p, lattice)) {
    const nr = p.row + dr;
    const nc = p.col + dc;
    if (nr >= 0 && nr < rows && nc >= 0 && nc < cols) {
      neighbors.push({ row: nr, col: nc });
    }
  }
  return neighbors;
}

/**
 * Check if two points are lattice neighbors
 */
export function areAdjacent(a: GridPoint, b: GridPoint, lattice: LatticeKind): boolean {
  const dr = b.row - a.row;
  const dc = b.col - a.col;
  return deltasFor(a, lattice).some(([r, c]) => r === dr && c === dc);
}

/**
 * Edges among an arbitrary list of points, as index pairs (i < j)
 */
export function latticeEdges(points: readonly GridPoint[], lattice: LatticeKind): Array<[number, number]> {
  const edges: Array<[number, number]> = [];
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      if (areAdjacent(points[i], points[j], lattice)) {
        edges.push([i, j]);
      }
    }
  }
  return edges;
}
