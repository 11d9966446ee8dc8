import type { Board } from "./board";
import type { MoveResponse } from "./errors";
import { MOVE_SHAPES, REGION_CONSTRAINTS } from "./constants";
import { onGrid } from "./geometry";
import { hashBoard } from "./stateHash";
import { movesEqual } from "./stateUtils";
import type { Move } from "../types";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function parseMove(x: unknown): Move | null {
  if (!isRecord(x) || !isRecord(x.anchor)) return null;

  const { row, col } = x.anchor;
  if (typeof row !== "number" || typeof col !== "number") return null;
  if (!Number.isInteger(row) || !Number.isInteger(col) || !onGrid({ row, col })) return null;

  const shape = MOVE_SHAPES.find((s) => s === x.shape);
  if (!shape) return null;

  if (x.resultingConstraint === undefined) return { anchor: { row, col }, shape };
  const resultingConstraint = REGION_CONSTRAINTS.find((t) => t === x.resultingConstraint);
  if (!resultingConstraint) return null;

  return { anchor: { row, col }, shape, resultingConstraint };
}

/**
 * Validate a proposed move against legalMoves() and apply it.
 *
 * - Malformed input => INVALID_INPUT
 * - Well-formed but not generated for this board => ILLEGAL_MOVE
 * - The board is untouched on error.
 */
export function tryMakeMove(board: Board, proposedMove: unknown): MoveResponse {
  const move = parseMove(proposedMove);
  if (!move) {
    return {
      ok: false,
      error: {
        code: "INVALID_INPUT",
        message: "Move needs an on-grid anchor, a known shape and an optional known board type.",
      },
    };
  }

  const legal = board.legalMoves().find((m) => movesEqual(m, move));
  if (!legal) {
    return {
      ok: false,
      error: {
        code: "ILLEGAL_MOVE",
        message: "Move is not legal for the current board.",
      },
    };
  }

  board.makeMove(legal);
  return { ok: true, move: legal, hash: hashBoard(board) };
}
