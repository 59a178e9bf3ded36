/**
 * End-to-end mapping scenarios.
 *
 * For each input graph and layout mode these tests verify that:
 * 1. The grid graph's maximum (weighted) independent set equals the input
 *    graph's plus the reported overhead
 * 2. Mapping an optimal grid configuration back gives an optimal,
 *    independent configuration of the input graph
 * 3. Both hold for seeded random graphs, orders and source weights
 * 4. Mapping is deterministic
 */

import { describe, it, expect } from "vitest";
import {
  BruteForceSolver,
  FrontierSolver,
  isIndependentSet,
  LAYOUTS,
  mapGraph,
  smallGraph,
  sweepOrder,
  type Edge,
  type LayoutMode,
  type MapGraphOptions,
  type MappingResult,
} from "../src";

const MODES: LayoutMode[] = ["ksg", "weighted", "triangular"];

const gridSolver = new FrontierSolver();
const inputSolver = new BruteForceSolver();

function solveGrid(result: MappingResult) {
  const { gridGraph } = result;
  return gridSolver.solve({
    vertexCount: gridGraph.vertices.length,
    edges: gridGraph.edges,
    weights: gridGraph.weights,
    sweepOrder: sweepOrder(gridGraph),
  });
}

/** The input graph's optimum under the weights the mapping carries */
function inputOptimum(vertexCount: number, edges: Edge[], result: MappingResult): number {
  return inputSolver.solve({ vertexCount, edges, weights: result.sourceWeights ?? undefined }).value;
}

/** Weight of an input configuration; plain mappings count vertices */
function weightOf(config: readonly number[], result: MappingResult): number {
  const weights = result.sourceWeights;
  return config.reduce((sum, bit, v) => sum + bit * (weights ? weights[v] : 1), 0);
}

function mapAndCheck(vertexCount: number, edges: Edge[], options: MapGraphOptions) {
  const result = mapGraph(vertexCount, edges, options);
  const grid = solveGrid(result);
  const input = inputOptimum(vertexCount, edges, result);
  return { result, grid, input };
}

describe("triangle", () => {
  const { vertexCount, edges } = smallGraph("triangle");

  it.each<[LayoutMode, number, number, number, number, number]>([
    ["ksg", 15, 18, 14, 6, 7],
    ["weighted", 15, 18, 14, 12, 12.5],
    ["triangular", 35, 24, 18, 32, 32.25],
  ])("maps in %s mode", (mode, vertices, rows, cols, overhead, optimum) => {
    const { result, grid, input } = mapAndCheck(vertexCount, edges, { mode });
    expect(result.gridGraph.vertices).toHaveLength(vertices);
    expect(result.gridSize).toEqual({ rows, cols });
    expect(result.overhead).toBe(overhead);
    expect(grid.value).toBe(optimum);
    expect(grid.value).toBe(input + result.overhead);
  });
});

describe("Petersen graph", () => {
  const { vertexCount, edges } = smallGraph("petersen");

  it.each<[LayoutMode, number, number, number, number, number]>([
    ["ksg", 219, 30, 42, 89, 93],
    ["weighted", 219, 30, 42, 178, 180],
    ["triangular", 395, 42, 60, 375, 376],
  ])("maps in %s mode", (mode, vertices, rows, cols, overhead, optimum) => {
    const { result, grid, input } = mapAndCheck(vertexCount, edges, { mode });
    expect(result.gridGraph.vertices).toHaveLength(vertices);
    expect(result.gridSize).toEqual({ rows, cols });
    expect(result.overhead).toBe(overhead);
    expect(grid.value).toBe(optimum);
    expect(grid.value).toBe(input + result.overhead);
  });

  it("keeps the identity with a greedy vertex order", () => {
    const { result, grid, input } = mapAndCheck(vertexCount, edges, { pathMethod: "greedy" });
    expect(result.order).toEqual([0, 1, 4, 7, 8, 5, 2, 6, 3, 9]);
    expect(result.overhead).toBe(77);
    expect(grid.value).toBe(input + result.overhead);
  });
});

describe("graph without edges", () => {
  it.each<[LayoutMode, number]>([
    ["ksg", 4],
    ["weighted", 2],
    ["triangular", 1],
  ])("has no overhead in %s mode", (mode, optimum) => {
    const { result, grid } = mapAndCheck(4, [], { mode });
    expect(result.overhead).toBe(0);
    expect(result.gridGraph.edges).toEqual([]);
    expect(grid.value).toBe(optimum);
    expect(result.mapConfigBack(grid.config)).toEqual([1, 1, 1, 1]);
  });
});

describe("back-mapping", () => {
  const graphs = ["bull", "diamond", "house", "petersen", "cubical"];
  const cases = graphs.flatMap((name) => MODES.map((mode): [string, LayoutMode] => [name, mode]));

  it.each(cases)("recovers an optimal set of %s in %s mode", (name, mode) => {
    const { vertexCount, edges } = smallGraph(name);
    const { result, grid, input } = mapAndCheck(vertexCount, edges, { mode });
    expect(grid.value).toBe(input + result.overhead);

    const config = result.mapConfigBack(grid.config);
    expect(config).toHaveLength(vertexCount);
    expect(config.every((x) => x === 0 || x === 1)).toBe(true);
    expect(isIndependentSet({ vertexCount, edges }, config)).toBe(true);

    expect(weightOf(config, result)).toBe(input);
  });

  it.each<[LayoutMode, number[], number, number]>([
    ["weighted", [0.75, 0.25, 0.5, 0.625, 0.5], 1.375, 36],
    ["triangular", [0.375, 0.125, 0.25, 0.3125, 0.25], 0.6875, 79],
  ])("follows uneven source weights in %s mode", (mode, weights, optimum, overhead) => {
    const { vertexCount, edges } = smallGraph("house");
    const { result, grid, input } = mapAndCheck(vertexCount, edges, { mode, weights });
    expect(input).toBe(optimum);
    expect(result.overhead).toBe(overhead);
    expect(grid.value).toBe(optimum + overhead);
    expect(result.mapConfigBack(grid.config)).toEqual([1, 0, 0, 1, 0]);
  });

  it("never selects both ends of an edge where two triangular lines cross", () => {
    const edges: Edge[] = [
      [0, 2],
      [1, 2],
      [1, 3],
    ];
    const { result, grid, input } = mapAndCheck(4, edges, { mode: "triangular", order: [0, 1, 2, 3] });
    expect(result.tape.some((e) => e.pattern.name === "TriCross<true>")).toBe(true);
    expect(input).toBe(0.5);
    expect(grid.value).toBe(21.5);

    const config = result.mapConfigBack(grid.config);
    expect(isIndependentSet({ vertexCount: 4, edges }, config)).toBe(true);
    expect(weightOf(config, result)).toBe(0.5);
  });

  it("maps back an independent set for a five-vertex triangular layout", () => {
    const edges: Edge[] = [
      [0, 1],
      [0, 3],
      [1, 3],
      [2, 3],
      [2, 4],
    ];
    const { result, grid, input } = mapAndCheck(5, edges, { mode: "triangular" });
    expect(input).toBe(0.5);
    expect(grid.value).toBe(input + result.overhead);

    const config = result.mapConfigBack(grid.config);
    expect(isIndependentSet({ vertexCount: 5, edges }, config)).toBe(true);
    expect(weightOf(config, result)).toBe(0.5);
  });
});

/** mulberry32: a small seeded generator, so random cases repeat exactly */
function seededRandom(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** 3 to 5 vertices, each edge with probability one half, a shuffled order and sixteenths as weights */
function randomCase(rng: () => number, mode: LayoutMode) {
  const vertexCount = 3 + Math.floor(rng() * 3);
  const edges: Edge[] = [];
  for (let u = 0; u < vertexCount; u++) {
    for (let v = u + 1; v < vertexCount; v++) {
      if (rng() < 0.5) edges.push([u, v]);
    }
  }
  const order = Array.from({ length: vertexCount }, (_, v) => v);
  for (let i = vertexCount - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [order[i], order[j]] = [order[j], order[i]];
  }
  const { weighted, sourceWeightLimit } = LAYOUTS[mode];
  const weights = weighted ? order.map(() => Math.floor(rng() * 16 * sourceWeightLimit) / 16) : undefined;
  return { vertexCount, edges, order, weights };
}

describe("random graphs", () => {
  it.each(MODES)("keep the identity and map back in %s mode", (mode) => {
    const rng = seededRandom(7);
    for (let trial = 0; trial < 10; trial++) {
      const { vertexCount, edges, order, weights } = randomCase(rng, mode);
      const { result, grid, input } = mapAndCheck(vertexCount, edges, { mode, order, weights });
      expect(result.order).toEqual(order);
      expect(grid.value).toBe(input + result.overhead);

      const config = result.mapConfigBack(grid.config);
      expect(isIndependentSet({ vertexCount, edges }, config)).toBe(true);
      expect(weightOf(config, result)).toBe(input);
    }
  });
});

describe("determinism", () => {
  it.each(MODES)("maps the cubical graph identically twice in %s mode", (mode) => {
    const { vertexCount, edges } = smallGraph("cubical");
    const first = mapGraph(vertexCount, edges, { mode });
    const second = mapGraph(vertexCount, edges, { mode });
    expect(second.gridGraph).toEqual(first.gridGraph);
    expect(second.centers).toEqual(first.centers);
    expect(second.tape.map((e) => [e.pattern.name, e.row, e.col])).toEqual(
      first.tape.map((e) => [e.pattern.name, e.row, e.col])
    );
  });
});
