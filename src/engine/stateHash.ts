import type { Board } from "./board";

/**
 * Deterministic key of a board's occupancy and board type.
 * Two boards with equal keys are bit-identical for move generation.
 * History is not part of the key.
 */
export function hashBoard(board: Board): string {
  const rows = board.cells().map((row) => row.map((x) => (x ? "1" : "0")).join(""));
  return `${rows.join("/")}|${board.constraint ?? "-"}`;
}
