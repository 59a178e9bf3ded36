/**
 * Vertex Centers
 *
 * Each input vertex owns one cell whose selection decides its membership.
 * It starts beside the corner of the vertex's copy line and follows any
 * gadget that moves it.
 */

import { centerLocation } from "./copyline";
import type { CopyLine, GridPoint } from "./graph-types";
import type { LayoutConfig } from "./layout-config";
import type { TapeEntry } from "./rewrite";

export function traceCenters(lines: readonly CopyLine[], tape: readonly TapeEntry[], config: LayoutConfig): GridPoint[] {
  const centers = lines.map((line) => {
    const { row, col } = centerLocation(line, config.padding, config.spacing);
    return { row, col: col + 1 };
  });

  for (const { pattern, row, col } of tape) {
    const move = pattern.centerMove;
    if (!move) continue;
    for (const center of centers) {
      // 1-indexed position inside the gadget window
      const localRow = center.row - row + 1;
      const localCol = center.col - col + 1;
      if (localRow === move.source.row && localCol === move.source.col) {
        center.row += move.mapped.row - move.source.row;
        center.col += move.mapped.col - move.source.col;
      }
    }
  }

  return centers;
}
