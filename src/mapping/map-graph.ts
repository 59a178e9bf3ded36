/**
 * Graph-to-Grid Mapping
 *
 * mapGraph embeds an input graph as copy lines on a grid, resolves every
 * crossing with gadgets, trims dangling legs, and extracts the resulting
 * grid graph. The maximum independent set of the grid graph equals the
 * input graph's plus `overhead`, and `mapConfigBack` turns a grid
 * configuration into an input configuration.
 *
 * Pipeline:
 * 1. Vertex order (caller-supplied or from a path decomposition)
 * 2. Copy lines drawn onto the grid; edge crossings marked as connected
 * 3. Crossing gadgets, then simplifier gadgets, recorded on a tape
 * 4. Overhead from the copy lines and the tape
 * 5. Grid graph, vertex centers, source weights at the centers
 */

import { cellKey, type CellKey } from "../utils/cellKey";
import { readCenters, unapplyTape } from "./back-mapping";
import { traceCenters } from "./centers";
import { copyLineLocations, copyLineOverhead, createCopyLines } from "./copyline";
import { ConfigurationError } from "./errors";
import { rulesetFor } from "./gadget-catalog";
import type { CopyLine, Edge, GridGraph, GridPoint, LayoutMode, MappingStats } from "./graph-types";
import { extractGridGraph } from "./grid-graph";
import { LAYOUTS, type LayoutConfig } from "./layout-config";
import { MappingGrid } from "./mapping-grid";
import {
  applyCrossingGadgets,
  applySimplifierGadgets,
  assertCrossingsResolved,
  tapeOverhead,
  type TapeEntry,
} from "./rewrite";
import { checkSourceWeights, validateInput } from "./validation";
import { pathwidth, type PathMethod } from "./vertex-order";

export interface MapGraphOptions {
  mode?: LayoutMode;
  /** Vertex order for the copy lines; computed from a path decomposition when omitted */
  order?: number[];
  /** Source-vertex weights in [0, 1], weighted modes only */
  weights?: number[];
  pathMethod?: PathMethod;
  onStatsReady?: (stats: MappingStats) => void;
}

interface MappingParts {
  config: LayoutConfig;
  order: number[];
  lines: CopyLine[];
  tape: TapeEntry[];
  initialGrid: MappingGrid;
  grid: MappingGrid;
  doubled: ReadonlySet<CellKey>;
  /** Extracted graph before source weights */
  baseGraph: GridGraph;
  centers: readonly Readonly<GridPoint>[];
  overhead: number;
  sourceWeights: number[] | null;
}

export class MappingResult {
  readonly mode: LayoutMode;
  readonly order: readonly number[];
  readonly lines: readonly CopyLine[];
  readonly tape: readonly TapeEntry[];
  readonly centers: readonly Readonly<GridPoint>[];
  readonly overhead: number;
  /** Grid after every gadget */
  readonly grid: MappingGrid;
  /** Grid with only the copy lines and crossing markers */
  readonly initialGrid: MappingGrid;
  readonly gridGraph: GridGraph;
  readonly sourceWeights: readonly number[] | null;

  private readonly parts: MappingParts;

  constructor(parts: MappingParts) {
    this.parts = parts;
    this.mode = parts.config.mode;
    this.order = parts.order;
    this.lines = parts.lines;
    this.tape = parts.tape;
    this.centers = parts.centers;
    this.overhead = parts.overhead;
    this.grid = parts.grid;
    this.initialGrid = parts.initialGrid;
    this.sourceWeights = parts.sourceWeights;
    this.gridGraph = withSourceWeights(parts.baseGraph, parts.centers, parts.sourceWeights);
  }

  get spacing(): number {
    return this.parts.config.spacing;
  }

  get padding(): number {
    return this.parts.config.padding;
  }

  get gridSize(): { rows: number; cols: number } {
    return { rows: this.grid.rows, cols: this.grid.cols };
  }

  /**
   * Input-vertex configuration for a 0/1 configuration of the grid graph's vertices
   */
  mapConfigBack(config: readonly number[]): number[] {
    const { config: layout, lines, tape, doubled } = this.parts;
    if (layout.weighted) {
      return readCenters(this.gridGraph, this.centers, config);
    }
    return unapplyTape(this.gridGraph, lines, tape, doubled, layout, config);
  }

  /**
   * The same mapping with different source weights
   */
  mapWeights(weights: readonly number[]): MappingResult {
    checkSourceWeights(this.mode, this.lines.length, weights);
    return new MappingResult({ ...this.parts, sourceWeights: [...weights] });
  }

  /**
   * Text rendering of the final grid, with selected cells marked when a
   * grid configuration is given
   */
  format(config?: readonly number[]): string {
    if (!config) {
      return this.grid.format();
    }
    const selected = new Set<CellKey>();
    this.gridGraph.vertices.forEach((p, i) => {
      if (config[i] === 1) selected.add(cellKey(p.row, p.col));
    });
    return this.grid.format(selected);
  }
}

function withSourceWeights(
  graph: GridGraph,
  centers: readonly GridPoint[],
  sourceWeights: readonly number[] | null
): GridGraph {
  if (!sourceWeights) {
    return graph;
  }
  const weights = [...graph.weights];
  const index = new Map(graph.vertices.map((p, i) => [cellKey(p.row, p.col), i]));
  centers.forEach((c, v) => {
    const i = index.get(cellKey(c.row, c.col));
    if (i === undefined) {
      throw new ConfigurationError(`Center of vertex ${v} at (${c.row}, ${c.col}) is not a grid vertex`);
    }
    weights[i] += sourceWeights[v];
  });
  return { ...graph, weights };
}

function gridDimensions(lines: readonly CopyLine[], config: LayoutConfig): { rows: number; cols: number } {
  if (lines.length === 0) {
    return { rows: 0, cols: 0 };
  }
  const { spacing, padding } = config;
  const maxHslot = Math.max(...lines.map((l) => l.hslot));
  // Triangular lines may reach below their own slot row
  const slots = config.lattice === "triangular" ? Math.max(maxHslot, ...lines.map((l) => l.vstop)) : maxHslot;
  return {
    rows: slots * spacing + 2 + 2 * padding,
    cols: (lines.length - 1) * spacing + 2 + 2 * padding,
  };
}

/**
 * Draw every copy line and mark each edge at its crossing: the cell left of
 * the crossing and the one above it (or below, when above is empty).
 */
function embedGraph(lines: readonly CopyLine[], edges: readonly Edge[], config: LayoutConfig): MappingGrid {
  const { rows, cols } = gridDimensions(lines, config);
  const grid = new MappingGrid(rows, cols, config.spacing, config.padding);

  for (const line of lines) {
    for (const loc of copyLineLocations(line, config.padding, config.spacing)) {
      grid.addNode(loc.row, loc.col, config.weighted ? loc.weight : 1);
    }
  }

  for (const [u, v] of edges) {
    const [first, second] = lines[u].vslot < lines[v].vslot ? [lines[u], lines[v]] : [lines[v], lines[u]];
    const { row, col } = grid.crossAt(first.vslot, second.vslot, first.hslot);
    if (grid.get(row, col - 1).kind !== "occupied") {
      throw new ConfigurationError(`Copy line of ${first.vertex} does not reach the crossing with ${second.vertex}`);
    }
    grid.connect(row, col - 1);
    if (grid.isOccupied(row - 1, col)) {
      grid.connect(row - 1, col);
    } else {
      grid.connect(row + 1, col);
    }
  }

  return grid;
}

/**
 * Map a graph with vertices 0..vertexCount-1 onto a grid graph
 */
export function mapGraph(vertexCount: number, edges: readonly Edge[], options: MapGraphOptions = {}): MappingResult {
  const { onStatsReady, ...rest } = options;
  const input = validateInput(vertexCount, edges, rest);
  const config = LAYOUTS[input.mode];

  const order = input.order ?? pathwidth(input.vertexCount, input.edges, input.pathMethod).vertices;
  const lines = createCopyLines(input.vertexCount, input.edges, order);

  const initialGrid = embedGraph(lines, input.edges, config);
  const doubled = initialGrid.doubledCells();

  const grid = initialGrid.clone();
  const ruleset = rulesetFor(config.mode);
  const crossingTape = applyCrossingGadgets(grid, lines, ruleset, config);
  assertCrossingsResolved(grid);
  const tape = [...crossingTape, ...applySimplifierGadgets(grid, ruleset, config)];

  const overhead = lines.reduce((sum, line) => sum + copyLineOverhead(line, config), 0) + tapeOverhead(tape);

  const baseGraph = extractGridGraph(grid, config.lattice, config.weighted);
  // Frozen copies: back-mapping reads these cells
  const centers = Object.freeze(traceCenters(lines, tape, config).map((c) => Object.freeze({ ...c })));
  const sourceWeights = config.weighted
    ? (input.weights ?? new Array<number>(input.vertexCount).fill(config.defaultSourceWeight))
    : null;

  const result = new MappingResult({
    config,
    order,
    lines,
    tape,
    initialGrid,
    grid,
    doubled,
    baseGraph,
    centers,
    overhead,
    sourceWeights,
  });

  onStatsReady?.({
    mode: config.mode,
    gridRows: grid.rows,
    gridCols: grid.cols,
    vertices: result.gridGraph.vertices.length,
    edges: result.gridGraph.edges.length,
    tapeLength: tape.length,
    overhead,
  });

  return result;
}
