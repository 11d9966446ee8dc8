// src/ui/board/boardView.ts
//
// Plain-text board rendering.
//
// Convention:
// - '#' laid track, '.' free, 'x' free but closed off by the current board type.
// - Row 0 is printed first (top of the board).

import type { Board } from "../../engine/board";
import { NUM_COLS } from "../../engine/constants";
import { formatConstraint } from "../../engine/notation";

export function cellGlyph(board: Board, row: number, col: number): string {
  const c = { row, col };
  if (board.occupied(c)) return "#";
  return board.compatible(c) ? "." : "x";
}

/**
 * Render the grid with row/column indices and the board type underneath.
 *
 *      0 1 2 3 4
 *   0  . # # # .
 *   ...
 *   board type: unresolved
 */
export function formatBoard(board: Board): string[] {
  const header = "    " + Array.from({ length: NUM_COLS }, (_, i) => String(i)).join(" ");
  const rows = board
    .cells()
    .map((cells, row) => ` ${row}  ` + cells.map((_, col) => cellGlyph(board, row, col)).join(" "));
  return [header, ...rows, `board type: ${formatConstraint(board.constraint)}`];
}
