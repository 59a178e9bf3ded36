/**
 * Mapping Errors
 *
 * Every failure of the mapping pipeline is fatal and deterministic, so these
 * are thrown rather than returned.
 */

import type { GridPoint } from "./graph-types";

/**
 * Base class for all errors raised while building or querying a mapping
 */
export class MappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The caller supplied an inconsistent graph, vertex order, or weight vector
 */
export class ConfigurationError extends MappingError {}

/**
 * A crossing region of the grid matched no template in the catalog
 */
export class GadgetMismatchError extends MappingError {
  readonly cell: GridPoint;

  constructor(cell: GridPoint, message?: string) {
    super(message ?? `No gadget resolves the crossing region at (${cell.row}, ${cell.col})`);
    this.cell = cell;
  }
}

/**
 * A weight vector or grid configuration has the wrong length for the instance
 */
export class DimensionMismatchError extends MappingError {
  readonly expected: number;
  readonly actual: number;

  constructor(what: string, expected: number, actual: number) {
    super(`${what} has length ${actual}, expected ${expected}`);
    this.expected = expected;
    this.actual = actual;
  }
}
