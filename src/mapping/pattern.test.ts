import { describe, it, expect } from "vitest";
import { rulesetFor } from "./gadget-catalog";
import { mappedMatrix, reflected, rotated, sourceMatrix, type Pattern } from "./pattern";

function byName(name: string): Pattern {
  const ruleset = rulesetFor("ksg");
  const pattern = [...ruleset.crossing, ...ruleset.simplifiers].find((p) => p.name === name);
  if (!pattern) throw new Error(`missing ${name}`);
  return pattern;
}

const geometry = (p: Pattern) => ({
  rows: p.rows,
  cols: p.cols,
  crossLocation: p.crossLocation,
  sourceLocs: p.sourceLocs,
  mappedLocs: p.mappedLocs,
  centerMove: p.centerMove,
});

describe("rotated", () => {
  const cross = byName("Cross<false>");
  const leg = byName("DanglingLeg");

  it("swaps the window dimensions on a quarter turn", () => {
    const r = rotated(cross, 1);
    expect(r.rows).toBe(5);
    expect(r.cols).toBe(4);
    expect(r.crossLocation).toEqual({ row: 3, col: 2 });
    expect(r.sourceLocs[0]).toEqual({ row: 5, col: 2 });
    expect(r.name).toBe("Rotated(Cross<false>, 1)");
  });

  it("turns a dangling leg upside down, center included", () => {
    const r = rotated(leg, 2);
    expect(r.rows).toBe(4);
    expect(r.cols).toBe(3);
    expect(r.crossLocation).toEqual({ row: 3, col: 3 });
    expect(r.sourceLocs).toEqual([
      { row: 3, col: 2 },
      { row: 2, col: 2 },
      { row: 1, col: 2 },
    ]);
    expect(r.mappedLocs).toEqual([{ row: 1, col: 2 }]);
    expect(r.centerMove).toEqual({ source: { row: 3, col: 2 }, mapped: { row: 1, col: 2 } });
  });

  it("is the identity after four quarter turns", () => {
    expect(geometry(rotated(cross, 4))).toEqual(geometry(cross));
    expect(geometry(rotated(rotated(leg, 1), 3))).toEqual(geometry(leg));
  });

  it("keeps weights, pins, and overhead", () => {
    const r = rotated(cross, 3);
    expect(r.sourceWeights).toEqual(cross.sourceWeights);
    expect(r.sourcePins).toEqual(cross.sourcePins);
    expect(r.overhead).toBe(cross.overhead);
  });
});

describe("reflected", () => {
  const leg = byName("DanglingLeg");

  it("mirrors columns around the cross location", () => {
    const r = reflected(leg, "x");
    expect(r.crossLocation).toEqual({ row: 2, col: 3 });
    expect(r.sourceLocs).toEqual(leg.sourceLocs);
  });

  it("undoes itself", () => {
    const turn = byName("Turn");
    for (const mirror of ["x", "y", "diag", "offdiag"] as const) {
      expect(geometry(reflected(reflected(turn, mirror), mirror))).toEqual(geometry(turn));
    }
  });
});

describe("occupancy matrices", () => {
  // The connected cross only appears flipped upside down in the King's ruleset
  const crossWithEdge = byName("Reflected(Cross<true>, y)");

  it("marks repeated and connected source cells", () => {
    expect(sourceMatrix(crossWithEdge)).toEqual([
      ["empty", "connected", "empty"],
      ["connected", "doubled", "occupied"],
      ["empty", "occupied", "empty"],
    ]);
  });

  it("marks every mapped location as occupied", () => {
    expect(mappedMatrix(crossWithEdge)).toEqual([
      ["empty", "occupied", "empty"],
      ["occupied", "occupied", "occupied"],
      ["empty", "occupied", "empty"],
    ]);
  });
});
