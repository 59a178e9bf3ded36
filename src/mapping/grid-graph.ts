/**
 * Grid-Graph Extraction
 *
 * Turns the final grid into a plain graph: one vertex per occupied cell in
 * row-major order, edges from the lattice's neighbor rule.
 */

import { cellKey } from "../utils/cellKey";
import type { GridGraph, LatticeKind } from "./graph-types";
import { getNeighbors } from "./grid-neighbors";
import { cellWeight, type MappingGrid } from "./mapping-grid";

/**
 * Vertices of an unweighted grid all weigh 1; weighted grids use the cell weights.
 */
export function extractGridGraph(grid: MappingGrid, lattice: LatticeKind, weighted: boolean): GridGraph {
  const vertices = grid.occupiedCells();
  const index = new Map<string, number>();
  vertices.forEach((p, i) => index.set(cellKey(p.row, p.col), i));

  const edges: Array<[number, number]> = [];
  vertices.forEach((p, i) => {
    for (const q of getNeighbors(p, lattice, grid.rows, grid.cols)) {
      const j = index.get(cellKey(q.row, q.col));
      if (j !== undefined && j > i) {
        edges.push([i, j]);
      }
    }
  });
  edges.sort((a, b) => a[0] - b[0] || a[1] - b[1]);

  const weights = vertices.map((p) => (weighted ? cellWeight(grid.get(p.row, p.col)) : 1));

  return { vertices, edges, weights, lattice, rows: grid.rows, cols: grid.cols };
}

/**
 * Vertex order that sweeps the grid along its longer side, so the frontier
 * of a sweeping solver spans the shorter side.
 */
export function sweepOrder(graph: GridGraph): number[] {
  const order = graph.vertices.map((_, i) => i);
  if (graph.cols <= graph.rows) {
    return order;
  }
  const { vertices } = graph;
  return order.sort((a, b) => vertices[a].col - vertices[b].col || vertices[a].row - vertices[b].row);
}

/**
 * Index of every vertex by its cell
 */
export function vertexIndex(graph: GridGraph): Map<string, number> {
  return new Map(graph.vertices.map((p, i) => [cellKey(p.row, p.col), i]));
}
