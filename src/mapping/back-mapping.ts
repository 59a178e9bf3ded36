/**
 * Back-Mapping
 *
 * Recovers an input-graph configuration from a grid configuration.
 *
 * Weighted grids read each vertex's center cell directly. Plain grids undo
 * the tape in reverse, replacing every gadget's mapped selection with a
 * matching source selection, and then count the selected cells along each
 * copy line: a line carrying its vertex has one more selected cell than
 * half its length.
 */

import { cellKey, type CellKey } from "../utils/cellKey";
import { copyLineLocations } from "./copyline";
import { ConfigurationError, DimensionMismatchError } from "./errors";
import type { CopyLine, GridGraph, GridPoint } from "./graph-types";
import { vertexIndex } from "./grid-graph";
import type { LayoutConfig } from "./layout-config";
import { sourceSelection } from "./pattern-tables";
import type { TapeEntry } from "./rewrite";

export function checkGridConfig(graph: GridGraph, config: readonly number[]): void {
  if (config.length !== graph.vertices.length) {
    throw new DimensionMismatchError("Grid configuration", graph.vertices.length, config.length);
  }
  const bad = config.findIndex((x) => x !== 0 && x !== 1);
  if (bad >= 0) {
    throw new ConfigurationError(`Grid configuration entry ${bad} is ${config[bad]}, expected 0 or 1`);
  }
}

/**
 * Value of each input vertex's center cell
 */
export function readCenters(graph: GridGraph, centers: readonly GridPoint[], config: readonly number[]): number[] {
  checkGridConfig(graph, config);
  const index = vertexIndex(graph);
  return centers.map((c) => {
    const i = index.get(cellKey(c.row, c.col));
    return i === undefined ? 0 : config[i];
  });
}

/**
 * Undo one gadget on a 2-D configuration
 */
function unapplyConfig(entry: TapeEntry, cells: number[][]): void {
  const { pattern, row, col } = entry;
  const at = (r: number, c: number) => cells[r]?.[c] ?? 0;

  const mappedPins = pattern.mappedPins.reduce((mask, node, k) => {
    const loc = pattern.mappedLocs[node];
    return at(row + loc.row - 1, col + loc.col - 1) > 0 ? mask | (1 << k) : mask;
  }, 0);
  const selection = sourceSelection(pattern, mappedPins);

  for (let r = row; r < row + pattern.rows; r++) {
    for (let c = col; c < col + pattern.cols; c++) {
      if (r < cells.length && c < cells[r].length) cells[r][c] = 0;
    }
  }
  pattern.sourceLocs.forEach((loc, v) => {
    const r = row + loc.row - 1;
    const c = col + loc.col - 1;
    if (r < cells.length && c < cells[r].length) cells[r][c] += selection[v];
  });
}

/**
 * Plain-grid back-mapping through the tape and copy-line counting.
 * `doubled` holds the cells two copy lines shared before any rewrite.
 */
export function unapplyTape(
  graph: GridGraph,
  lines: readonly CopyLine[],
  tape: readonly TapeEntry[],
  doubled: ReadonlySet<CellKey>,
  layout: LayoutConfig,
  config: readonly number[]
): number[] {
  checkGridConfig(graph, config);
  const cells = Array.from({ length: graph.rows }, () => new Array<number>(graph.cols).fill(0));
  graph.vertices.forEach((p, i) => {
    cells[p.row][p.col] = config[i];
  });

  for (let k = tape.length - 1; k >= 0; k--) {
    unapplyConfig(tape[k], cells);
  }

  const at = (p: GridPoint) => cells[p.row]?.[p.col] ?? 0;
  return lines.map((line) => {
    const locs = copyLineLocations(line, layout.padding, layout.spacing);
    let count = 0;
    locs.forEach((loc, k) => {
      const value = at(loc);
      if (!doubled.has(cellKey(loc.row, loc.col))) {
        count += value;
        return;
      }
      // A shared cell counts for this line when both lines selected it,
      // or when it is the only selected cell around it on this line.
      if (value === 2) {
        count++;
      } else if (value === 1) {
        const before = k > 0 ? at(locs[k - 1]) : 0;
        const after = k + 1 < locs.length ? at(locs[k + 1]) : 0;
        if (before === 0 && after === 0) count++;
      }
    });
    return Math.max(count - Math.floor(locs.length / 2), 0);
  });
}
