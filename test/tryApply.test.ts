import { describe, expect, it } from "vitest";

import { Board } from "../src/engine/board";
import { STARTING_LAYOUT } from "../src/engine/constants";
import { hashBoard } from "../src/engine/stateHash";
import { tryMakeMove } from "../src/engine/tryApply";
import { mv } from "./helpers";

describe("tryMakeMove", () => {
  it("applies a generated move and returns the new hash", () => {
    const board = new Board(STARTING_LAYOUT);
    const res = tryMakeMove(board, { anchor: { row: 0, col: 0 }, shape: "oneDown", resultingConstraint: "leftOrMiddle" });

    expect(res).toEqual({
      ok: true,
      move: mv(0, 0, "oneDown", "leftOrMiddle"),
      hash: "11110/10010/00010/00000|leftOrMiddle",
    });
    expect(board.historyDepth).toBe(1);
  });

  it("returns ILLEGAL_MOVE for a move the generator does not produce", () => {
    const board = new Board(STARTING_LAYOUT);
    const before = hashBoard(board);

    // Region placement without its board type.
    const res = tryMakeMove(board, mv(0, 0, "oneDown"));
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("ILLEGAL_MOVE");

    // Anchor not on the frontier.
    const far = tryMakeMove(board, mv(3, 0, "single"));
    expect(far.ok).toBe(false);
    if (!far.ok) expect(far.error.code).toBe("ILLEGAL_MOVE");

    expect(hashBoard(board)).toBe(before);
    expect(board.historyDepth).toBe(0);
  });

  it("returns INVALID_INPUT for malformed proposals", () => {
    const board = new Board(STARTING_LAYOUT);
    const bad: unknown[] = [
      null,
      "single@(0,0)",
      { anchor: { row: 9, col: 0 }, shape: "single" },
      { anchor: { row: 0, col: 0.5 }, shape: "single" },
      { anchor: { row: 0, col: 0 }, shape: "diagonal" },
      { anchor: { row: 0, col: 0 }, shape: "oneDown", resultingConstraint: "center" },
    ];

    for (const proposal of bad) {
      const res = tryMakeMove(board, proposal);
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe("INVALID_INPUT");
    }
    expect(board.historyDepth).toBe(0);
  });
});
