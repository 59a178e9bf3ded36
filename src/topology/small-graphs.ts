/**
 * Small named graphs for examples and tests, plus path and cycle builders
 */

import { z } from "zod";
import type { Edge } from "../mapping/graph-types";
import smallGraphsFile from "./small-graphs.json";

export interface SmallGraph {
  name: string;
  vertexCount: number;
  edges: Edge[];
}

const smallGraphsSchema = z.object({
  graphs: z.array(
    z.object({
      name: z.string(),
      vertexCount: z.number().int().nonnegative(),
      edges: z.array(z.tuple([z.number().int(), z.number().int()])),
    })
  ),
});

const GRAPHS: ReadonlyMap<string, SmallGraph> = new Map(
  smallGraphsSchema.parse(smallGraphsFile).graphs.map((g) => [g.name, g])
);

export function smallGraphNames(): string[] {
  return [...GRAPHS.keys()];
}

export function smallGraph(name: string): SmallGraph {
  const graph = GRAPHS.get(name);
  if (!graph) {
    throw new Error(`Unknown graph "${name}", expected one of: ${smallGraphNames().join(", ")}`);
  }
  return { name: graph.name, vertexCount: graph.vertexCount, edges: graph.edges.map(([u, v]): Edge => [u, v]) };
}

export function pathGraph(vertexCount: number): SmallGraph {
  const edges: Edge[] = [];
  for (let v = 0; v + 1 < vertexCount; v++) edges.push([v, v + 1]);
  return { name: `path${vertexCount}`, vertexCount, edges };
}

export function cycleGraph(vertexCount: number): SmallGraph {
  const { edges } = pathGraph(vertexCount);
  if (vertexCount > 2) edges.push([vertexCount - 1, 0]);
  return { name: `cycle${vertexCount}`, vertexCount, edges };
}

/** Vertices 0..n-1 with no edges */
export function emptyGraph(vertexCount: number): SmallGraph {
  return { name: `empty${vertexCount}`, vertexCount, edges: [] };
}
