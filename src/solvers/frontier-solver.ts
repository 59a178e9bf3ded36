/**
 * Frontier Dynamic Programme
 *
 * Exact maximum-weight independent set for graphs of small pathwidth, such
 * as grid graphs swept one column (or row) at a time. Vertices are visited
 * in sweep order; the state is the set of selected vertices that still have
 * an unvisited neighbor. A vertex leaves the frontier once its last
 * neighbor has been visited.
 */

import {
  adjacencyLists,
  problemWeights,
  type IndependentSetProblem,
  type IndependentSetSolution,
  type IndependentSetSolver,
} from "./types";

interface StateEntry {
  value: number;
  /** Key of the predecessor state */
  from: string;
  took: boolean;
}

const stateKey = (vertices: readonly number[]): string => vertices.join(",");

function parseState(key: string): number[] {
  return key === "" ? [] : key.split(",").map(Number);
}

export class FrontierSolver implements IndependentSetSolver {
  readonly name = "frontier";

  /** Aborts when a layer grows past this many states */
  constructor(private readonly maxStates: number = 1 << 20) {}

  solve(problem: IndependentSetProblem): IndependentSetSolution {
    const n = problem.vertexCount;
    const weights = problemWeights(problem);
    const neighbors = adjacencyLists(problem);
    const order = problem.sweepOrder ? [...problem.sweepOrder] : Array.from({ length: n }, (_, i) => i);
    if (order.length !== n || new Set(order).size !== n) {
      throw new RangeError("Sweep order must be a permutation of the vertices");
    }

    const position = new Array<number>(n).fill(0);
    order.forEach((v, i) => {
      position[v] = i;
    });
    const lastNeighborStep = neighbors.map((adj, v) => Math.max(position[v], ...adj.map((u) => position[u])));

    const layers: Array<Map<string, StateEntry>> = [];
    let current = new Map<string, StateEntry>([["", { value: 0, from: "", took: false }]]);

    order.forEach((v, step) => {
      const next = new Map<string, StateEntry>();
      const offer = (selected: number[], value: number, from: string, took: boolean) => {
        const kept = selected.filter((u) => lastNeighborStep[u] > step).sort((a, b) => a - b);
        const key = stateKey(kept);
        const existing = next.get(key);
        if (!existing || value > existing.value) {
          next.set(key, { value, from, took });
        }
      };

      for (const [key, entry] of current) {
        const selected = parseState(key);
        offer(selected, entry.value, key, false);
        if (weights[v] > 0 && !selected.some((u) => neighbors[v].includes(u))) {
          offer([...selected, v], entry.value + weights[v], key, true);
        }
      }

      if (next.size > this.maxStates) {
        throw new RangeError(`Frontier grew past ${this.maxStates} states at step ${step}`);
      }
      layers.push(next);
      current = next;
    });

    let bestKey = "";
    let bestValue = 0;
    for (const [key, entry] of current) {
      if (entry.value > bestValue) {
        bestKey = key;
        bestValue = entry.value;
      }
    }

    const config = new Array<number>(n).fill(0);
    let key = bestKey;
    for (let step = order.length - 1; step >= 0; step--) {
      const entry = layers[step].get(key);
      if (!entry) {
        throw new Error(`Missing frontier state "${key}" at step ${step}`);
      }
      if (entry.took) config[order[step]] = 1;
      key = entry.from;
    }

    return { value: bestValue, config };
  }
}
