/**
 * Solvers Module
 *
 * Exact independent-set solvers used to verify mappings. The mapping core
 * never calls them.
 */

export type {
  Clause,
  IndependentSetProblem,
  IndependentSetSolution,
  IndependentSetSolver,
  Literal,
  SATSolver,
  SolveResult,
} from "./types";
export { BaseFormulaBuilder, isIndependentSet } from "./types";
export { MiniSatFormulaBuilder, MiniSatIndependentSetSolver, MiniSatSolver } from "./minisat-solver";
export { FrontierSolver } from "./frontier-solver";
export { BruteForceSolver } from "./brute-force-solver";
