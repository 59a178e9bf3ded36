import { describe, it, expect, vi } from "vitest";
import { ConfigurationError, DimensionMismatchError } from "./errors";
import type { Edge, MappingStats } from "./graph-types";
import { mapGraph } from "./map-graph";

const TRIANGLE: Edge[] = [
  [0, 1],
  [0, 2],
  [1, 2],
];

const weightSum = (weights: readonly number[]) => weights.reduce((a, b) => a + b, 0);

describe("mapGraph", () => {
  it("maps a graph with no vertices to an empty grid", () => {
    const result = mapGraph(0, []);
    expect(result.gridGraph.vertices).toEqual([]);
    expect(result.overhead).toBe(0);
    expect(result.gridSize).toEqual({ rows: 0, cols: 0 });
    expect(result.mapConfigBack([])).toEqual([]);
  });

  it("maps isolated vertices to isolated cells", () => {
    const result = mapGraph(4, []);
    expect(result.gridSize).toEqual({ rows: 10, cols: 18 });
    expect(result.gridGraph.vertices).toEqual([
      { row: 3, col: 3 },
      { row: 3, col: 7 },
      { row: 3, col: 11 },
      { row: 3, col: 15 },
    ]);
    expect(result.gridGraph.edges).toEqual([]);
    expect(result.overhead).toBe(0);
    expect(result.tape).toEqual([]);
  });

  it("reports statistics once", () => {
    const onStatsReady = vi.fn<[MappingStats], void>();
    mapGraph(3, TRIANGLE, { onStatsReady });
    expect(onStatsReady).toHaveBeenCalledTimes(1);
    expect(onStatsReady).toHaveBeenCalledWith({
      mode: "ksg",
      gridRows: 18,
      gridCols: 14,
      vertices: 15,
      edges: 17,
      tapeLength: 7,
      overhead: 6,
    });
  });

  it("uses the mode's spacing", () => {
    const result = mapGraph(3, TRIANGLE, { mode: "triangular" });
    expect(result.spacing).toBe(6);
    expect(result.padding).toBe(2);
    expect(result.gridSize).toEqual({ rows: 24, cols: 18 });
    expect(result.gridGraph.lattice).toBe("triangular");
  });

  it("keeps the copy-line grid alongside the final one", () => {
    const result = mapGraph(3, TRIANGLE);
    expect(result.initialGrid.connectedCells().size).toBeGreaterThan(0);
    expect(result.grid.connectedCells().size).toBe(0);
    expect(result.order).toEqual([0, 1, 2]);
  });

  it("hands out centers that cannot be moved", () => {
    const result = mapGraph(3, TRIANGLE, { mode: "weighted" });
    const before = result.centers.map((c) => ({ ...c }));
    expect(Object.isFrozen(result.centers)).toBe(true);
    expect(Reflect.set(result.centers[0], "row", 0)).toBe(false);
    expect(Reflect.set(result.centers, 0, { row: 0, col: 0 })).toBe(false);
    expect(result.centers).toEqual(before);
    expect(result.mapWeights([0.75, 0.75, 0.75]).centers).toEqual(before);
  });

  it("rejects a vertex order that is not a permutation", () => {
    expect(() => mapGraph(3, TRIANGLE, { order: [0, 0, 1] })).toThrow(ConfigurationError);
  });

  it("rejects source weights in the plain mode", () => {
    expect(() => mapGraph(3, TRIANGLE, { weights: [0.5, 0.5, 0.5] })).toThrow(ConfigurationError);
  });

  it("rejects source weights above one", () => {
    expect(() => mapGraph(3, TRIANGLE, { mode: "weighted", weights: [0.5, 1.5, 0.5] })).toThrow(ConfigurationError);
  });

  it("rejects a source weight vector of the wrong length", () => {
    expect(() => mapGraph(3, TRIANGLE, { mode: "weighted", weights: [0.5, 0.5] })).toThrow(DimensionMismatchError);
  });
});

describe("source weights", () => {
  it("adds one half per vertex by default", () => {
    const result = mapGraph(3, TRIANGLE, { mode: "weighted" });
    expect(result.sourceWeights).toEqual([0.5, 0.5, 0.5]);
    expect(weightSum(result.gridGraph.weights)).toBe(25.5);
  });

  it("re-weights an existing mapping", () => {
    const result = mapGraph(3, TRIANGLE, { mode: "weighted" });
    const reweighted = result.mapWeights([0.75, 0, 0]);
    expect(weightSum(reweighted.gridGraph.weights)).toBe(24.75);
    expect(reweighted.sourceWeights).toEqual([0.75, 0, 0]);
    expect(reweighted.gridGraph.vertices).toEqual(result.gridGraph.vertices);
    expect(weightSum(result.gridGraph.weights)).toBe(25.5);
  });

  it("defaults to a quarter per vertex on the triangular lattice", () => {
    const result = mapGraph(3, TRIANGLE, { mode: "triangular" });
    expect(result.sourceWeights).toEqual([0.25, 0.25, 0.25]);
  });

  it("refuses weights at the mode's limit", () => {
    expect(() => mapGraph(3, TRIANGLE, { mode: "weighted" }).mapWeights([1, 0, 0])).toThrow(
      "Source weight 0 is 1, expected a value in [0, 1)"
    );
    expect(() => mapGraph(3, TRIANGLE, { mode: "triangular", weights: [0.25, 0.5, 0] })).toThrow(
      "Source weight 1 is 0.5, expected a value in [0, 0.5)"
    );
  });

  it("refuses to re-weight a plain mapping", () => {
    expect(() => mapGraph(3, TRIANGLE).mapWeights([1, 1, 1])).toThrow(ConfigurationError);
  });

  it("leaves plain grids at unit weights", () => {
    const result = mapGraph(3, TRIANGLE);
    expect(result.sourceWeights).toBeNull();
    expect(result.gridGraph.weights.every((w) => w === 1)).toBe(true);
  });
});

describe("format", () => {
  const result = mapGraph(3, [[0, 1], [1, 2]], { order: [0, 1, 2] });

  it("draws one text row per grid row", () => {
    const text = result.format();
    expect(text.split("\n")).toHaveLength(14);
    expect(text).not.toContain("●");
  });

  it("marks the selected cells", () => {
    const text = result.format([1, 0, 1, 0, 1, 1, 0]);
    expect(text.split("●")).toHaveLength(5);
    // (3, 5) is the first grid vertex
    expect(text.split("\n")[3].split(" ")[5]).toBe("●");
  });
});
