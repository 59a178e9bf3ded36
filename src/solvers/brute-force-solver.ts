/**
 * Exhaustive independent-set search for gadgets and small input graphs.
 */

import {
  adjacencyLists,
  problemWeights,
  type IndependentSetProblem,
  type IndependentSetSolution,
  type IndependentSetSolver,
} from "./types";

const MAX_VERTICES = 24;

export class BruteForceSolver implements IndependentSetSolver {
  readonly name = "brute-force";

  /**
   * Vertices in `forced` are pinned to the given value (1 in, 0 out).
   * Returns null when the pinned vertices admit no independent set.
   */
  solveWith(problem: IndependentSetProblem, forced: ReadonlyMap<number, 0 | 1>): IndependentSetSolution | null {
    const n = problem.vertexCount;
    if (n > MAX_VERTICES) {
      throw new RangeError(`Brute force is limited to ${MAX_VERTICES} vertices, got ${n}`);
    }
    const weights = problemWeights(problem);
    const neighborMask = adjacencyLists(problem).map((adj) => adj.reduce((mask, u) => mask | (1 << u), 0));

    let best: IndependentSetSolution | null = null;
    for (let mask = 0; mask < 1 << n; mask++) {
      let ok = true;
      let value = 0;
      for (let v = 0; v < n && ok; v++) {
        const bit = (mask >> v) & 1;
        const pin = forced.get(v);
        if (pin !== undefined && pin !== bit) ok = false;
        else if (bit) {
          if (neighborMask[v] & mask) ok = false;
          value += weights[v];
        }
      }
      if (ok && (!best || value > best.value)) {
        best = { value, config: Array.from({ length: n }, (_, v) => (mask >> v) & 1) };
      }
    }
    return best;
  }

  solve(problem: IndependentSetProblem): IndependentSetSolution {
    const result = this.solveWith(problem, new Map());
    if (!result) {
      throw new Error("Unconstrained search found no independent set");
    }
    return result;
  }
}
