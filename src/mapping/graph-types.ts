/**
 * Type Definitions for Graph-to-Grid Mapping
 *
 * Core types for representing grid points, input graphs, layout modes,
 * and the extracted grid graph.
 */

/**
 * Layout mode - plain King's subgraph, weighted King's subgraph, or weighted triangular lattice
 */
export type LayoutMode = "ksg" | "weighted" | "triangular";

/**
 * Lattice adjacency used when turning occupied cells into a graph
 */
export type LatticeKind = "king" | "triangular";

/**
 * Represents a point in the grid (0-indexed)
 */
export interface GridPoint {
  row: number;
  col: number;
}

/**
 * An undirected edge between two vertex indices
 */
export type Edge = readonly [number, number];

/**
 * The graph extracted from the final grid.
 * vertices[k] carries weights[k]; edges index into vertices.
 */
export interface GridGraph {
  vertices: GridPoint[];
  edges: Array<[number, number]>;
  weights: number[];
  lattice: LatticeKind;
  rows: number;
  cols: number;
}

/**
 * A copy line: the L-shaped path of cells that represents one input vertex.
 * Slots are 1-indexed.
 */
export interface CopyLine {
  vertex: number;
  vslot: number;
  hslot: number;
  vstart: number;
  vstop: number;
  hstop: number;
}

/**
 * One cell of a copy line with its weight in weighted modes
 */
export interface CopyLineCell extends GridPoint {
  weight: number;
}

/**
 * Statistics reported once a mapping is complete
 */
export interface MappingStats {
  mode: LayoutMode;
  gridRows: number;
  gridCols: number;
  vertices: number;
  edges: number;
  tapeLength: number;
  overhead: number;
}
