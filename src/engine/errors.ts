import type { Move } from "../types";

export type EngineErrorCode =
  | "CONSTRAINT_MISMATCH"
  | "EMPTY_HISTORY"
  | "OFF_GRID"
  | "INVALID_LAYOUT"
  | "INCONSISTENT_BOARD"
  | "ILLEGAL_MOVE"
  | "INVALID_INPUT";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

/**
 * Thrown for caller misuse that correct callers never reach:
 * applying a move the generator would not have produced (wrong board type,
 * cells off the grid), undoing an empty history, or building a board from a
 * malformed layout.
 */
export class EngineInvariantError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, where = "unknown") {
    super(`[${code} @ ${where}] ${message}`);
    this.name = "EngineInvariantError";
    this.code = code;
  }

  toEngineError(): EngineError {
    return { code: this.code, message: this.message };
  }
}

export type MoveOk = {
  ok: true;
  move: Move;

  // hashBoard() after the move was applied.
  hash: string;
};

export type MoveErr = {
  ok: false;
  error: EngineError;
};

export type MoveResponse = MoveOk | MoveErr;
