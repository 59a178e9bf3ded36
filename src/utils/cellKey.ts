/**
 * String keys for grid cells, usable in Sets and Maps.
 */

/** A cell stored as "row,col" */
export type CellKey = string;

export function cellKey(row: number, col: number): CellKey {
  return `${row},${col}`;
}
