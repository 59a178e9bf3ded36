/**
 * Vertex Order
 *
 * The order in which copy lines are laid out comes from a path
 * decomposition of the input graph: a vertex sequence whose vertex
 * separation (the most unplaced vertices adjacent to a placed prefix)
 * bounds the number of horizontal slots in use at once.
 *
 * Two methods:
 * - "branch-and-bound": exact, for small graphs
 * - "greedy": forced extensions first, then the cheapest candidate
 *
 * Both are deterministic: ties go to the earliest candidate.
 */

import type { Edge } from "./graph-types";

export type PathMethod = "auto" | "greedy" | "branch-and-bound";

/** Largest graph "auto" solves exactly */
export const EXACT_PATHWIDTH_LIMIT = 30;

export interface Layout {
  /** Placed prefix of the order */
  vertices: number[];
  /** Vertex separation of the prefix so far */
  vsep: number;
  /** Unplaced vertices adjacent to the prefix */
  neighbors: number[];
  /** Unplaced vertices not adjacent to the prefix */
  disconnected: number[];
}

type Adjacency = ReadonlyArray<ReadonlySet<number>>;

function buildAdjacency(vertexCount: number, edges: readonly Edge[]): Set<number>[] {
  const adj = Array.from({ length: vertexCount }, () => new Set<number>());
  for (const [u, v] of edges) {
    adj[u].add(v);
    adj[v].add(u);
  }
  return adj;
}

function emptyLayout(vertexCount: number): Layout {
  return {
    vertices: [],
    vsep: 0,
    neighbors: [],
    disconnected: Array.from({ length: vertexCount }, (_, v) => v),
  };
}

/**
 * Layout of a complete or partial order, computed from scratch
 */
export function layoutOf(vertexCount: number, edges: readonly Edge[], vertices: readonly number[]): Layout {
  const adj = buildAdjacency(vertexCount, edges);
  const placed = new Set<number>();
  let vsep = 0;
  let neighbors: number[] = [];

  for (const v of vertices) {
    placed.add(v);
    neighbors = [];
    for (let w = 0; w < vertexCount; w++) {
      if (!placed.has(w) && [...adj[w]].some((u) => placed.has(u))) {
        neighbors.push(w);
      }
    }
    vsep = Math.max(vsep, neighbors.length);
  }

  const frontier = new Set(neighbors);
  const disconnected: number[] = [];
  for (let w = 0; w < vertexCount; w++) {
    if (!placed.has(w) && !frontier.has(w)) disconnected.push(w);
  }
  return { vertices: [...vertices], vsep, neighbors, disconnected };
}

/**
 * Separation after placing v, without building the new layout
 */
function vsepAfter(adj: Adjacency, layout: Layout, v: number): number {
  const placed = new Set(layout.vertices);
  const frontier = new Set(layout.neighbors);
  let size = layout.neighbors.length - (frontier.has(v) ? 1 : 0);
  for (const w of adj[v]) {
    if (!placed.has(w) && !frontier.has(w)) size++;
  }
  return Math.max(size, layout.vsep);
}

function extend(adj: Adjacency, layout: Layout, v: number): Layout {
  const placed = new Set(layout.vertices);
  const neighbors = layout.neighbors.filter((w) => w !== v);
  const frontier = new Set(neighbors);
  const added: number[] = [];
  for (const w of adj[v]) {
    if (w !== v && !placed.has(w) && !frontier.has(w)) {
      added.push(w);
      frontier.add(w);
    }
  }
  const fresh = new Set(added);
  return {
    vertices: [...layout.vertices, v],
    vsep: Math.max(neighbors.length + added.length, layout.vsep),
    neighbors: [...neighbors, ...added],
    disconnected: layout.disconnected.filter((w) => w !== v && !fresh.has(w)),
  };
}

/**
 * Apply every extension that cannot hurt: a vertex whose neighbors are all
 * placed or on the frontier, or a frontier vertex that adds exactly one
 * new frontier vertex.
 */
function greedyExact(adj: Adjacency, start: Layout): Layout {
  let layout = start;
  let progress = true;

  while (progress) {
    progress = false;

    for (const list of [[...layout.disconnected], [...layout.neighbors]]) {
      for (const v of list) {
        const placed = new Set(layout.vertices);
        const frontier = new Set(layout.neighbors);
        if ([...adj[v]].every((w) => placed.has(w) || frontier.has(w))) {
          layout = extend(adj, layout, v);
          progress = true;
        }
      }
    }

    for (const v of [...layout.neighbors]) {
      const placed = new Set(layout.vertices);
      const frontier = new Set(layout.neighbors);
      const fresh = [...adj[v]].filter((w) => !placed.has(w) && !frontier.has(w)).length;
      if (fresh === 1) {
        layout = extend(adj, layout, v);
        progress = true;
      }
    }
  }

  return layout;
}

function greedyStep(adj: Adjacency, layout: Layout, candidates: readonly number[]): Layout {
  let best: Layout | null = null;
  for (const v of candidates) {
    const next = extend(adj, layout, v);
    if (!best || next.vsep < best.vsep) best = next;
  }
  return best ?? layout;
}

export function greedyDecompose(vertexCount: number, edges: readonly Edge[]): Layout {
  const adj = buildAdjacency(vertexCount, edges);
  let layout = emptyLayout(vertexCount);

  for (;;) {
    layout = greedyExact(adj, layout);
    if (layout.neighbors.length > 0) {
      layout = greedyStep(adj, layout, layout.neighbors);
    } else if (layout.disconnected.length > 0) {
      layout = greedyStep(adj, layout, layout.disconnected);
    } else {
      return layout;
    }
  }
}

/**
 * Exact minimum vertex separation. Prefixes already explored are
 * remembered by their vertex sequence.
 */
export function branchAndBound(vertexCount: number, edges: readonly Edge[]): Layout {
  const adj = buildAdjacency(vertexCount, edges);
  const identity = Array.from({ length: vertexCount }, (_, v) => v);
  const visited = new Map<string, boolean>();

  const search = (partial: Layout, incumbent: Layout): Layout => {
    let best = incumbent;
    const key = partial.vertices.join(",");
    if (partial.vsep >= best.vsep || visited.has(key)) {
      return best;
    }

    const forced = greedyExact(adj, partial);
    if (forced.vertices.length === vertexCount && forced.vsep < best.vsep) {
      return forced;
    }

    const bound = best.vsep;
    const candidates = [...forced.neighbors, ...forced.disconnected]
      .map((v) => ({ v, cost: vsepAfter(adj, forced, v) }))
      .sort((a, b) => a.cost - b.cost);

    for (const { v, cost } of candidates) {
      if (cost < best.vsep) {
        const result = search(extend(adj, forced, v), best);
        if (result.vsep < best.vsep) best = result;
      }
    }

    visited.set(key, !(best.vsep < bound && partial.vsep === best.vsep));
    return best;
  };

  return search(emptyLayout(vertexCount), layoutOf(vertexCount, edges, identity));
}

export function pathwidth(vertexCount: number, edges: readonly Edge[], method: PathMethod = "auto"): Layout {
  const resolved: PathMethod =
    method === "auto" ? (vertexCount > EXACT_PATHWIDTH_LIMIT ? "greedy" : "branch-and-bound") : method;
  return resolved === "greedy" ? greedyDecompose(vertexCount, edges) : branchAndBound(vertexCount, edges);
}
