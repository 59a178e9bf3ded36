import { describe, it, expect } from "vitest";
import { checkGridConfig, readCenters } from "./back-mapping";
import { ConfigurationError, DimensionMismatchError } from "./errors";
import type { Edge } from "./graph-types";
import { mapGraph } from "./map-graph";

const PATH: Edge[] = [
  [0, 1],
  [1, 2],
];

describe("mapConfigBack on a plain grid", () => {
  // The mapped path is itself a 7-vertex path: 0-1-2-3-5-6-4
  const result = mapGraph(3, PATH, { order: [0, 1, 2] });

  it("recovers the outer vertices from the larger grid set", () => {
    expect(result.mapConfigBack([1, 0, 1, 0, 1, 1, 0])).toEqual([1, 0, 1]);
  });

  it("recovers the middle vertex from the complementary set", () => {
    expect(result.mapConfigBack([0, 1, 0, 1, 0, 0, 1])).toEqual([0, 1, 0]);
  });

  it("maps the empty selection to the empty selection", () => {
    expect(result.mapConfigBack([0, 0, 0, 0, 0, 0, 0])).toEqual([0, 0, 0]);
  });
});

describe("mapConfigBack on a weighted grid", () => {
  const result = mapGraph(3, PATH, { mode: "weighted", order: [0, 1, 2] });

  it("reads the center cells", () => {
    // Centers are vertices 0, 7 and 4 of the grid graph
    const config = new Array<number>(result.gridGraph.vertices.length).fill(0);
    config[0] = 1;
    config[4] = 1;
    expect(result.mapConfigBack(config)).toEqual([1, 0, 1]);
    expect(readCenters(result.gridGraph, result.centers, config)).toEqual([1, 0, 1]);
  });
});

describe("checkGridConfig", () => {
  const { gridGraph } = mapGraph(3, PATH, { order: [0, 1, 2] });

  it("rejects a configuration of the wrong length", () => {
    expect(() => checkGridConfig(gridGraph, [0, 1, 0])).toThrow(DimensionMismatchError);
    expect(() => checkGridConfig(gridGraph, [0, 1, 0])).toThrow("Grid configuration has length 3, expected 7");
  });

  it("rejects entries other than 0 and 1", () => {
    expect(() => checkGridConfig(gridGraph, [0, 2, 0, 0, 0, 0, 0])).toThrow(ConfigurationError);
  });
});
