/**
 * Layout Constants
 *
 * One fixed configuration per layout mode. The catalog and the rewrite
 * engine read everything mode-specific from here.
 */

import type { LatticeKind, LayoutMode } from "./graph-types";

export interface LayoutConfig {
  mode: LayoutMode;
  lattice: LatticeKind;
  /** Cells between consecutive slots */
  spacing: number;
  /** Empty border around the copy lines */
  padding: number;
  /** Cells carry integer weights and source weights are added at centers */
  weighted: boolean;
  /** Passes of the dangling-leg simplifier */
  simplifierPasses: number;
  /**
   * "pattern": every simplifier variant scans the whole grid in turn.
   * "position": every position tries all variants before moving on.
   */
  simplifierScan: "pattern" | "position";
  /** Skip a crossing location once a gadget has been applied there */
  skipResolvedCrossings: boolean;
  /** Crossing gadgets must also match the source weights of the cells */
  checkCrossingWeights: boolean;
  /**
   * Source weights must stay below this. At the limit an optimum may
   * select both ends of an edge, or flip two crossing lines at once.
   */
  sourceWeightLimit: number;
  /** Source weight at every center when the caller gives none */
  defaultSourceWeight: number;
}

export const LAYOUTS: Readonly<Record<LayoutMode, LayoutConfig>> = {
  ksg: {
    mode: "ksg",
    lattice: "king",
    spacing: 4,
    padding: 2,
    weighted: false,
    simplifierPasses: 2,
    simplifierScan: "pattern",
    skipResolvedCrossings: false,
    checkCrossingWeights: false,
    sourceWeightLimit: 0,
    defaultSourceWeight: 0,
  },
  weighted: {
    mode: "weighted",
    lattice: "king",
    spacing: 4,
    padding: 2,
    weighted: true,
    simplifierPasses: 2,
    simplifierScan: "pattern",
    skipResolvedCrossings: false,
    checkCrossingWeights: false,
    sourceWeightLimit: 1,
    defaultSourceWeight: 0.5,
  },
  triangular: {
    mode: "triangular",
    lattice: "triangular",
    spacing: 6,
    padding: 2,
    weighted: true,
    simplifierPasses: 10,
    simplifierScan: "position",
    skipResolvedCrossings: true,
    checkCrossingWeights: true,
    // TriCross<true> gains one when both lines flip phase through it
    sourceWeightLimit: 0.5,
    defaultSourceWeight: 0.25,
  },
};
