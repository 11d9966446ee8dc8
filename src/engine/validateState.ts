import type { Board } from "./board";
import { boardConfig } from "../config";
import { inConstrainedRegion } from "./geometry";
import { coveredCells } from "./moveShape";
import { REGION_CONSTRAINTS } from "./constants";
import { EngineInvariantError } from "./errors";

/**
 * validateBoard (gated by MONORAIL_VALIDATE_BOARD)
 *
 * Checks, without recomputing legal moves:
 * - every cell a history entry placed is occupied
 * - the constraint is a known board type (or unset)
 * - every occupied region cell placed during play is allowed by the current type
 *
 * Cells occupied in the initial layout are not checked against the type;
 * the layout is opaque input.
 */
export function validateBoard(board: Board, where = "unknown"): void {
  if (!boardConfig.validateBoard) return;
  assertBoardConsistent(board, where);
}

export function assertBoardConsistent(board: Board, where = "unknown"): void {
  const current = board.constraint;
  assert(current === null || REGION_CONSTRAINTS.includes(current), `unknown board type: ${String(current)}`, where);

  const placed = board.history().flatMap((h) => coveredCells(h.move));
  for (const c of placed) {
    assert(board.occupied(c), `history cell (${c.row},${c.col}) is not occupied`, where);
    if (inConstrainedRegion(c)) {
      assert(board.compatible(c), `(${c.row},${c.col}) conflicts with board type ${String(current)}`, where);
    }
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new EngineInvariantError("INCONSISTENT_BOARD", message, `validateBoard @ ${where}`);
}
