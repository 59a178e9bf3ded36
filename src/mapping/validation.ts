/**
 * Input Validation
 *
 * zod schemas for everything a caller hands to mapGraph. Failures become
 * ConfigurationErrors listing every issue; weight vectors of the wrong
 * length become DimensionMismatchErrors.
 */

import { z } from "zod";
import { ConfigurationError, DimensionMismatchError } from "./errors";
import type { Edge, LayoutMode } from "./graph-types";
import { LAYOUTS } from "./layout-config";
import type { PathMethod } from "./vertex-order";

const vertexSchema = z.number().int().nonnegative();

export const graphInputSchema = z
  .object({
    vertexCount: z.number().int().nonnegative(),
    edges: z.array(z.tuple([vertexSchema, vertexSchema])),
  })
  .superRefine(({ vertexCount, edges }, ctx) => {
    const seen = new Set<string>();
    edges.forEach(([u, v], i) => {
      if (u >= vertexCount || v >= vertexCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["edges", i],
          message: `endpoint out of range for ${vertexCount} vertices`,
        });
      }
      if (u === v) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["edges", i], message: "self-loop" });
      }
      const key = u < v ? `${u}-${v}` : `${v}-${u}`;
      if (seen.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["edges", i], message: `duplicate edge ${key}` });
      }
      seen.add(key);
    });
  });

export const mapOptionsSchema = z.object({
  mode: z.enum(["ksg", "weighted", "triangular"]).default("ksg"),
  order: z.array(vertexSchema).optional(),
  weights: z.array(z.number().nonnegative()).optional(),
  pathMethod: z.enum(["auto", "greedy", "branch-and-bound"]).default("auto"),
});

export interface ValidatedInput {
  vertexCount: number;
  edges: Edge[];
  mode: LayoutMode;
  order?: number[];
  weights?: number[];
  pathMethod: PathMethod;
}

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * A supplied order must place every vertex exactly once
 */
export function checkOrder(vertexCount: number, order: readonly number[]): void {
  if (order.length !== vertexCount) {
    throw new ConfigurationError(`Vertex order has ${order.length} entries for ${vertexCount} vertices`);
  }
  const seen = new Set<number>();
  for (const v of order) {
    if (v >= vertexCount) {
      throw new ConfigurationError(`Vertex order names vertex ${v}, but there are only ${vertexCount}`);
    }
    if (seen.has(v)) {
      throw new ConfigurationError(`Vertex ${v} appears twice in the vertex order`);
    }
    seen.add(v);
  }
}

/**
 * Source weights: weighted modes only, one per vertex, each in
 * [0, sourceWeightLimit) of the mode's layout
 */
export function checkSourceWeights(mode: LayoutMode, vertexCount: number, weights: readonly number[]): void {
  if (mode === "ksg") {
    throw new ConfigurationError('Source weights need a weighted mode ("weighted" or "triangular")');
  }
  if (weights.length !== vertexCount) {
    throw new DimensionMismatchError("Source weights", vertexCount, weights.length);
  }
  const limit = LAYOUTS[mode].sourceWeightLimit;
  const bad = weights.findIndex((w) => !(w >= 0 && w < limit));
  if (bad >= 0) {
    throw new ConfigurationError(`Source weight ${bad} is ${weights[bad]}, expected a value in [0, ${limit})`);
  }
}

export function validateInput(vertexCount: unknown, edges: unknown, options: unknown): ValidatedInput {
  const graph = graphInputSchema.safeParse({ vertexCount, edges });
  if (!graph.success) {
    throw new ConfigurationError(`Invalid graph: ${describe(graph.error)}`);
  }

  // Weights are range-checked below so a length mismatch is reported as such
  const parsed = mapOptionsSchema
    .extend({ weights: z.array(z.number()).optional() })
    .safeParse(options ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid options: ${describe(parsed.error)}`);
  }

  const { mode, order, weights, pathMethod } = parsed.data;
  if (order) checkOrder(graph.data.vertexCount, order);
  if (weights) checkSourceWeights(mode, graph.data.vertexCount, weights);

  return {
    vertexCount: graph.data.vertexCount,
    edges: graph.data.edges,
    mode,
    order,
    weights,
    pathMethod,
  };
}
