import { describe, expect, it } from "vitest";

import { Board } from "../src/engine/board";
import { STARTING_LAYOUT } from "../src/engine/constants";
import { EngineInvariantError } from "../src/engine/errors";
import { hashBoard } from "../src/engine/stateHash";
import { assertBoardConsistent } from "../src/engine/validateState";
import { boardFrom, C, mv } from "./helpers";

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("Board", () => {
  it("lists the frontier in row-major order", () => {
    const board = new Board(STARTING_LAYOUT);
    expect([...board.frontier()]).toEqual([
      C(0, 0),
      C(0, 4),
      C(1, 1),
      C(1, 2),
      C(1, 4),
      C(2, 2),
      C(2, 4),
      C(3, 3),
    ]);
  });

  it("leaves cells closed off by the board type out of the frontier", () => {
    const board = boardFrom(["#####", "#.###", "#####", "#####"], "left");
    expect(board.compatible(C(1, 1))).toBe(false);
    expect([...board.frontier()]).toEqual([]);
    expect(board.legalMoves()).toEqual([]);
  });

  it("applies a move, narrows the board type and records history", () => {
    const board = new Board(STARTING_LAYOUT);
    board.makeMove(mv(0, 0, "oneDown", "leftOrMiddle"));

    expect(board.occupied(C(0, 0))).toBe(true);
    expect(board.occupied(C(1, 0))).toBe(true);
    expect(board.constraint).toBe("leftOrMiddle");
    expect(board.historyDepth).toBe(1);
    expect(board.history()[0].previousConstraint).toBeNull();
  });

  it("undoes the last move exactly", () => {
    const board = new Board(STARTING_LAYOUT);
    const before = hashBoard(board);

    board.makeMove(mv(2, 2, "twoLeft", "middle"));
    expect(hashBoard(board)).toBe("01110/00010/11110/00000|middle");

    expect(board.undoMove()).toEqual(mv(2, 2, "twoLeft", "middle"));
    expect(hashBoard(board)).toBe(before);
    expect(board.historyDepth).toBe(0);
  });

  it("keeps the board type when a move carries none", () => {
    const board = new Board(STARTING_LAYOUT, "rightOrMiddle");
    board.makeMove(mv(0, 4, "single"));
    expect(board.constraint).toBe("rightOrMiddle");
  });

  it("rejects a board-type change the current type cannot narrow to", () => {
    const board = new Board(STARTING_LAYOUT, "left");
    const before = hashBoard(board);

    const err = catchError(() => board.makeMove(mv(0, 0, "oneDown", "right")));
    expect(err).toBeInstanceOf(EngineInvariantError);
    expect(err instanceof EngineInvariantError && err.code).toBe("CONSTRAINT_MISMATCH");

    expect(hashBoard(board)).toBe(before);
    expect(board.historyDepth).toBe(0);
  });

  it("rejects a shape that leaves the grid without touching the board", () => {
    const board = new Board(STARTING_LAYOUT);
    const before = hashBoard(board);

    const err = catchError(() => board.makeMove(mv(0, 0, "oneUp", "left")));
    expect(err).toBeInstanceOf(EngineInvariantError);
    expect(err instanceof EngineInvariantError && err.code).toBe("OFF_GRID");

    expect(hashBoard(board)).toBe(before);
    expect(board.constraint).toBeNull();
    expect(board.historyDepth).toBe(0);

    const undoErr = catchError(() => board.undoMove());
    expect(undoErr instanceof EngineInvariantError && undoErr.code).toBe("EMPTY_HISTORY");
  });

  it("rejects an anchor off the grid", () => {
    const board = new Board(STARTING_LAYOUT);
    const err = catchError(() => board.makeMove(mv(4, 0, "single")));
    expect(err instanceof EngineInvariantError && err.code).toBe("OFF_GRID");
    expect(board.historyDepth).toBe(0);
  });

  it("hands out a copy of the history", () => {
    const board = new Board(STARTING_LAYOUT);
    board.makeMove(mv(0, 0, "oneDown", "leftOrMiddle"));

    const snapshot = board.history();
    board.makeMove(mv(2, 2, "single"));

    expect(snapshot).toHaveLength(1);
    expect(board.history()).toHaveLength(2);
  });

  it("rejects undo on an empty history", () => {
    const err = catchError(() => new Board(STARTING_LAYOUT).undoMove());
    expect(err instanceof EngineInvariantError && err.code).toBe("EMPTY_HISTORY");
  });

  it("rejects layouts that are not 4x5", () => {
    const err = catchError(() => new Board([[true, false]]));
    expect(err instanceof EngineInvariantError && err.code).toBe("INVALID_LAYOUT");
  });

  it("does not share the caller's layout", () => {
    const layout = STARTING_LAYOUT.map((row) => [...row]);
    const board = new Board(layout);
    layout[3][0] = true;
    expect(board.occupied(C(3, 0))).toBe(false);
  });

  it("clones into an independent board", () => {
    const board = new Board(STARTING_LAYOUT);
    board.makeMove(mv(0, 4, "oneDown"));

    const copy = board.clone();
    expect(hashBoard(copy)).toBe(hashBoard(board));
    expect(copy.historyDepth).toBe(1);

    copy.makeMove(mv(3, 3, "twoLeft", "rightOrMiddle"));
    expect(board.constraint).toBeNull();
    expect(board.occupied(C(3, 1))).toBe(false);

    copy.undoMove();
    copy.undoMove();
    expect(board.historyDepth).toBe(1);
    expect(board.occupied(C(1, 4))).toBe(true);
  });

  it("stays consistent along generated moves", () => {
    const board = new Board(STARTING_LAYOUT);
    board.makeMove(mv(0, 0, "oneDown", "leftOrMiddle"));
    board.makeMove(mv(2, 2, "twoLeft", "middle"));
    expect(() => assertBoardConsistent(board, "test")).not.toThrow();
  });

  it("flags region cells placed against the board type", () => {
    const board = new Board(STARTING_LAYOUT, "left");
    // Bypasses the generator: (1,1) is closed off on a left board.
    board.makeMove(mv(1, 1, "single"));

    const err = catchError(() => assertBoardConsistent(board, "test"));
    expect(err instanceof EngineInvariantError && err.code).toBe("INCONSISTENT_BOARD");
  });
});
