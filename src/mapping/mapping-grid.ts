/**
 * Mapping Grid
 *
 * The 2-D cell array that copy lines are drawn on and gadgets rewrite.
 * One grid is owned by one mapping computation; gadgets mutate it in place
 * through set/addNode/connect only.
 */

import { cellKey, type CellKey } from "../utils/cellKey";
import { GadgetMismatchError } from "./errors";
import type { GridPoint } from "./graph-types";

/**
 * State of one grid cell.
 * - occupied: a single copy line passes through
 * - doubled: two copy lines share the cell (an unresolved crossing)
 * - connected: the cell marks an input edge at a crossing
 */
export type CellState =
  | { kind: "empty" }
  | { kind: "occupied"; weight: number }
  | { kind: "doubled"; weight: number }
  | { kind: "connected"; weight: number };

export type CellKind = CellState["kind"];

export const EMPTY_CELL: CellState = { kind: "empty" };

export function cellWeight(cell: CellState): number {
  return cell.kind === "empty" ? 0 : cell.weight;
}

export class MappingGrid {
  readonly rows: number;
  readonly cols: number;
  readonly spacing: number;
  readonly padding: number;
  private cells: CellState[][];

  constructor(rows: number, cols: number, spacing: number, padding: number) {
    this.rows = rows;
    this.cols = cols;
    this.spacing = spacing;
    this.padding = padding;
    this.cells = Array.from({ length: rows }, () => Array.from({ length: cols }, () => EMPTY_CELL));
  }

  inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  /** Out-of-bounds cells read as empty */
  get(row: number, col: number): CellState {
    return this.inBounds(row, col) ? this.cells[row][col] : EMPTY_CELL;
  }

  /** Out-of-bounds writes are dropped */
  set(row: number, col: number, state: CellState): void {
    if (this.inBounds(row, col)) {
      this.cells[row][col] = state;
    }
  }

  isOccupied(row: number, col: number): boolean {
    return this.get(row, col).kind !== "empty";
  }

  /**
   * Place a copy-line cell. A second line on the same cell makes it doubled;
   * the weight of the first line is kept.
   */
  addNode(row: number, col: number, weight: number): void {
    const cell = this.get(row, col);
    switch (cell.kind) {
      case "empty":
        this.set(row, col, { kind: "occupied", weight });
        break;
      case "occupied":
        this.set(row, col, { kind: "doubled", weight: cell.weight });
        break;
      default:
        throw new GadgetMismatchError({ row, col }, `Three copy lines overlap at (${row}, ${col})`);
    }
  }

  /** Mark an occupied cell as an edge connection point */
  connect(row: number, col: number): void {
    const cell = this.get(row, col);
    if (cell.kind === "occupied") {
      this.set(row, col, { kind: "connected", weight: cell.weight });
    }
  }

  /**
   * Crossing location of the lines in vertical slots v and w,
   * on the horizontal slot of the line further left.
   */
  crossAt(v: number, w: number, hslot: number): GridPoint {
    return {
      row: (hslot - 1) * this.spacing + 1 + this.padding,
      col: (Math.max(v, w) - 1) * this.spacing + this.padding,
    };
  }

  /** Occupied cells in row-major order */
  occupiedCells(): GridPoint[] {
    const result: GridPoint[] = [];
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (this.cells[row][col].kind !== "empty") {
          result.push({ row, col });
        }
      }
    }
    return result;
  }

  doubledCells(): Set<CellKey> {
    return this.cellsOfKind("doubled");
  }

  connectedCells(): Set<CellKey> {
    return this.cellsOfKind("connected");
  }

  private cellsOfKind(kind: CellKind): Set<CellKey> {
    const result = new Set<CellKey>();
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (this.cells[row][col].kind === kind) {
          result.add(cellKey(row, col));
        }
      }
    }
    return result;
  }

  clone(): MappingGrid {
    const copy = new MappingGrid(this.rows, this.cols, this.spacing, this.padding);
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        copy.cells[row][col] = this.cells[row][col];
      }
    }
    return copy;
  }

  /**
   * Text rendering: "." empty, "o" occupied, "D" doubled, "C" connected.
   * With a configuration, selected cells print as "●".
   */
  format(selected?: ReadonlySet<CellKey>): string {
    const lines: string[] = [];
    for (let row = 0; row < this.rows; row++) {
      const chars: string[] = [];
      for (let col = 0; col < this.cols; col++) {
        const cell = this.cells[row][col];
        if (selected?.has(cellKey(row, col))) {
          chars.push("●");
          continue;
        }
        switch (cell.kind) {
          case "empty":
            chars.push(".");
            break;
          case "occupied":
            chars.push("o");
            break;
          case "doubled":
            chars.push("D");
            break;
          case "connected":
            chars.push("C");
            break;
        }
      }
      lines.push(chars.join(" "));
    }
    return lines.join("\n");
  }
}
