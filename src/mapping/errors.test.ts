import { describe, it, expect } from "vitest";
import { ConfigurationError, DimensionMismatchError, GadgetMismatchError, MappingError } from "./errors";

describe("mapping errors", () => {
  it("name themselves after their class", () => {
    expect(new ConfigurationError("bad order").name).toBe("ConfigurationError");
    expect(new GadgetMismatchError({ row: 1, col: 2 }).name).toBe("GadgetMismatchError");
  });

  it("share a base class", () => {
    const errors = [
      new ConfigurationError("x"),
      new GadgetMismatchError({ row: 0, col: 0 }),
      new DimensionMismatchError("Weights", 3, 2),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(MappingError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it("describe the unmatched region", () => {
    const error = new GadgetMismatchError({ row: 4, col: 7 });
    expect(error.message).toBe("No gadget resolves the crossing region at (4, 7)");
    expect(error.cell).toEqual({ row: 4, col: 7 });
  });

  it("carry both lengths of a mismatch", () => {
    const error = new DimensionMismatchError("Source weights", 5, 4);
    expect(error.message).toBe("Source weights has length 4, expected 5");
    expect([error.expected, error.actual]).toEqual([5, 4]);
  });
});
