import { Board } from "../src/engine/board";
import { hashBoard } from "../src/engine/stateHash";
import { layoutFromRows } from "../src/engine/stateUtils";
import type { Coordinate, Move, MoveShape, RegionConstraint } from "../src/types";

export const C = (row: number, col: number): Coordinate => ({ row, col });

export function mv(row: number, col: number, shape: MoveShape, resultingConstraint?: RegionConstraint): Move {
  return resultingConstraint ? { anchor: C(row, col), shape, resultingConstraint } : { anchor: C(row, col), shape };
}

export function boardFrom(rows: string[], constraint: RegionConstraint | null = null): Board {
  return new Board(layoutFromRows(...rows), constraint);
}

// Every cell laid.
export const FULL = ["#####", "#####", "#####", "#####"];

// Two free cells side by side on the top row.
export const TOP_PAIR = ["###..", "#####", "#####", "#####"];

// Two free cells that cannot be covered by one move.
export const SPLIT_CORNERS = [".###.", "#####", "#####", "#####"];

/**
 * Boards reached from `board` within `depth` plies, including `board` itself.
 * Each visit runs while the position is on the board; the board is restored afterwards.
 */
export function walk(board: Board, depth: number, visit: (b: Board) => void): void {
  visit(board);
  if (depth === 0) return;
  for (const m of board.legalMoves()) {
    board.makeMove(m);
    walk(board, depth - 1, visit);
    board.undoMove();
  }
}

export function snapshot(board: Board): { hash: string; depth: number } {
  return { hash: hashBoard(board), depth: board.historyDepth };
}
