/**
 * Gadget Patterns
 *
 * A pattern pairs a small "source" occupancy (what the copy lines look like
 * around a crossing or line feature) with a "mapped" replacement. Locations
 * are 1-indexed within the pattern's m x n window. Source edges are explicit;
 * mapped edges follow from the lattice.
 *
 * Rotations and reflections are derived by transforming every location
 * around the cross location, then shifting so the window starts at (1, 1).
 */

import { z } from "zod";
import type { Edge, GridPoint } from "./graph-types";
import type { CellKind } from "./mapping-grid";

export interface CenterMove {
  source: GridPoint;
  mapped: GridPoint;
}

export interface Pattern {
  readonly name: string;
  readonly rows: number;
  readonly cols: number;
  readonly crossLocation: GridPoint;
  readonly sourceLocs: readonly GridPoint[];
  readonly sourceEdges: readonly Edge[];
  readonly sourcePins: readonly number[];
  readonly sourceWeights: readonly number[];
  readonly mappedLocs: readonly GridPoint[];
  readonly mappedPins: readonly number[];
  readonly mappedWeights: readonly number[];
  /** Source nodes that sit on a connected (edge-marker) cell */
  readonly connected: readonly number[];
  readonly overhead: number;
  /** Where a vertex center inside the window moves to, if anywhere */
  readonly centerMove: CenterMove | null;
}

export type Mirror = "x" | "y" | "diag" | "offdiag";

// ============================================================================
// Catalog file schema
// ============================================================================

const pointSchema = z.tuple([z.number().int().positive(), z.number().int().positive()]);
const indexSchema = z.number().int().nonnegative();

const gadgetSchema = z
  .object({
    name: z.string().min(1),
    size: pointSchema,
    crossLocation: pointSchema,
    source: z.object({
      locs: z.array(pointSchema).min(1),
      edges: z.array(z.tuple([indexSchema, indexSchema])),
      pins: z.array(indexSchema),
      weights: z.array(z.number().int()),
    }),
    mapped: z.object({
      locs: z.array(pointSchema).min(1),
      pins: z.array(indexSchema),
      weights: z.array(z.number().int()),
    }),
    connected: z.array(indexSchema),
    overhead: z.number().int(),
    center: z.object({ source: pointSchema, mapped: pointSchema }).optional(),
  })
  .superRefine((g, ctx) => {
    const [m, n] = g.size;
    const outside = (p: [number, number]) => p[0] > m || p[1] > n;
    if (g.source.locs.some(outside) || g.mapped.locs.some(outside)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${g.name}: location outside the ${m}x${n} window` });
    }
    if (g.source.weights.length !== g.source.locs.length || g.mapped.weights.length !== g.mapped.locs.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${g.name}: one weight per location required` });
    }
    if (g.source.pins.length !== g.mapped.pins.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${g.name}: source and mapped pin counts differ` });
    }
    const sourceCount = g.source.locs.length;
    const badIndex =
      g.source.pins.some((i) => i >= sourceCount) ||
      g.connected.some((i) => i >= sourceCount) ||
      g.source.edges.some(([u, v]) => u >= sourceCount || v >= sourceCount) ||
      g.mapped.pins.some((i) => i >= g.mapped.locs.length);
    if (badIndex) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${g.name}: node index out of range` });
    }
  });

export const catalogFileSchema = z.object({
  lattice: z.enum(["king", "triangular"]),
  gadgets: z.array(gadgetSchema).min(1),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;
type RawGadget = CatalogFile["gadgets"][number];

const toPoint = ([row, col]: [number, number]): GridPoint => ({ row, col });

/**
 * Build a pattern from its catalog entry. overheadScale converts the stored
 * overhead into the overhead of the mode the pattern is used in.
 */
export function patternFromCatalog(raw: RawGadget, overheadScale: number): Pattern {
  return {
    name: raw.name,
    rows: raw.size[0],
    cols: raw.size[1],
    crossLocation: toPoint(raw.crossLocation),
    sourceLocs: raw.source.locs.map(toPoint),
    sourceEdges: raw.source.edges,
    sourcePins: raw.source.pins,
    sourceWeights: raw.source.weights,
    mappedLocs: raw.mapped.locs.map(toPoint),
    mappedPins: raw.mapped.pins,
    mappedWeights: raw.mapped.weights,
    connected: raw.connected,
    overhead: raw.overhead * overheadScale,
    centerMove: raw.center ? { source: toPoint(raw.center.source), mapped: toPoint(raw.center.mapped) } : null,
  };
}

// ============================================================================
// Rotations and reflections
// ============================================================================

type Offset = (dr: number, dc: number) => [number, number];

function transformPattern(pattern: Pattern, name: string, f: Offset): Pattern {
  const { crossLocation: cl } = pattern;
  const relative = (p: GridPoint): [number, number] => f(p.row - cl.row, p.col - cl.col);

  const corners = [relative({ row: 1, col: 1 }), relative({ row: pattern.rows, col: pattern.cols })];
  const minRow = Math.min(corners[0][0], corners[1][0]);
  const minCol = Math.min(corners[0][1], corners[1][1]);
  const maxRow = Math.max(corners[0][0], corners[1][0]);
  const maxCol = Math.max(corners[0][1], corners[1][1]);

  const place = (p: GridPoint): GridPoint => {
    const [dr, dc] = relative(p);
    return { row: dr - minRow + 1, col: dc - minCol + 1 };
  };

  return {
    ...pattern,
    name,
    rows: maxRow - minRow + 1,
    cols: maxCol - minCol + 1,
    crossLocation: { row: 1 - minRow, col: 1 - minCol },
    sourceLocs: pattern.sourceLocs.map(place),
    mappedLocs: pattern.mappedLocs.map(place),
    centerMove: pattern.centerMove
      ? { source: place(pattern.centerMove.source), mapped: place(pattern.centerMove.mapped) }
      : null,
  };
}

/**
 * Rotate a pattern by k quarter turns
 */
export function rotated(pattern: Pattern, k: number): Pattern {
  const turns = ((k % 4) + 4) % 4;
  return transformPattern(pattern, `Rotated(${pattern.name}, ${turns})`, (dr, dc) => {
    let r = dr;
    let c = dc;
    for (let i = 0; i < turns; i++) {
      [r, c] = [-c, r];
    }
    return [r, c];
  });
}

/**
 * Mirror a pattern. "x" flips columns, "y" flips rows.
 */
export function reflected(pattern: Pattern, mirror: Mirror): Pattern {
  const name = `Reflected(${pattern.name}, ${mirror})`;
  switch (mirror) {
    case "x":
      return transformPattern(pattern, name, (dr, dc) => [dr, -dc]);
    case "y":
      return transformPattern(pattern, name, (dr, dc) => [-dr, dc]);
    case "diag":
      return transformPattern(pattern, name, (dr, dc) => [-dc, -dr]);
    case "offdiag":
      return transformPattern(pattern, name, (dr, dc) => [dc, dr]);
  }
}

// ============================================================================
// Occupancy matrices
// ============================================================================

function occupancy(rows: number, cols: number, locs: readonly GridPoint[]): CellKind[][] {
  const matrix: CellKind[][] = Array.from({ length: rows }, () => Array.from({ length: cols }, (): CellKind => "empty"));
  for (const { row, col } of locs) {
    const r = row - 1;
    const c = col - 1;
    matrix[r][c] = matrix[r][c] === "empty" ? "occupied" : "doubled";
  }
  return matrix;
}

/**
 * What the grid looks like before the pattern is applied.
 * A location listed twice is doubled; connected nodes are edge markers.
 */
export function sourceMatrix(pattern: Pattern): CellKind[][] {
  const matrix = occupancy(pattern.rows, pattern.cols, pattern.sourceLocs);
  for (const idx of pattern.connected) {
    const { row, col } = pattern.sourceLocs[idx];
    matrix[row - 1][col - 1] = "connected";
  }
  return matrix;
}

export function mappedMatrix(pattern: Pattern): CellKind[][] {
  return occupancy(pattern.rows, pattern.cols, pattern.mappedLocs);
}
