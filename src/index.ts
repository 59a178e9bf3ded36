/**
 * Graph-to-grid maximum independent set mapping
 */

export { mapGraph, MappingResult } from "./mapping/map-graph";
export type { MapGraphOptions } from "./mapping/map-graph";
export { ConfigurationError, DimensionMismatchError, GadgetMismatchError, MappingError } from "./mapping/errors";
export type {
  CopyLine,
  Edge,
  GridGraph,
  GridPoint,
  LatticeKind,
  LayoutMode,
  MappingStats,
} from "./mapping/graph-types";
export { LAYOUTS } from "./mapping/layout-config";
export type { LayoutConfig } from "./mapping/layout-config";
export { createCopyLines, copyLineLocations, copyLineOverhead, centerLocation } from "./mapping/copyline";
export { MappingGrid } from "./mapping/mapping-grid";
export type { CellState } from "./mapping/mapping-grid";
export { rulesetFor, allPatterns } from "./mapping/gadget-catalog";
export type { Ruleset } from "./mapping/gadget-catalog";
export { rotated, reflected } from "./mapping/pattern";
export type { Pattern } from "./mapping/pattern";
export type { TapeEntry } from "./mapping/rewrite";
export { sweepOrder } from "./mapping/grid-graph";
export { pathwidth } from "./mapping/vertex-order";
export type { Layout, PathMethod } from "./mapping/vertex-order";
export * from "./solvers";
export { smallGraph, smallGraphNames, pathGraph, cycleGraph, emptyGraph } from "./topology/small-graphs";
export type { SmallGraph } from "./topology/small-graphs";
