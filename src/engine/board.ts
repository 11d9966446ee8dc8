// src/engine/board.ts

import type { BoardLayout, Coordinate, HistoryEntry, Move, RegionConstraint } from "../types";
import { DIRECTIONS, NUM_COLS, NUM_ROWS } from "./constants";
import { stepFrom } from "./geometry";
import { listLegalMoves } from "./legalMoves";
import { coveredCells } from "./moveShape";
import { appliesTo, permits } from "./regionConstraint";
import { EngineInvariantError } from "./errors";
import { cloneLayout } from "./stateUtils";
import { validateBoard } from "./validateState";

/**
 * Occupancy grid plus the lower-left board type.
 *
 * The search threads a single instance through its recursion, applying a
 * move before recursing and undoing it after. Use clone() for independent
 * copies.
 */
export class Board {
  private readonly grid: boolean[][];
  private current: RegionConstraint | null;
  private readonly stack: HistoryEntry[] = [];

  constructor(initialOccupancy: BoardLayout, initialConstraint: RegionConstraint | null = null) {
    this.grid = cloneLayout(initialOccupancy, "Board");
    this.current = initialConstraint;
  }

  get constraint(): RegionConstraint | null {
    return this.current;
  }

  get historyDepth(): number {
    return this.stack.length;
  }

  // Oldest first. A copy; entries are shared with the board.
  history(): readonly HistoryEntry[] {
    return [...this.stack];
  }

  occupied(c: Coordinate): boolean {
    return this.grid[c.row][c.col];
  }

  compatible(c: Coordinate): boolean {
    return permits(this.current, c);
  }

  /**
   * Free, compatible cells next to the laid track, row-major.
   */
  *frontier(): Generator<Coordinate> {
    for (let row = 0; row < NUM_ROWS; row++) {
      for (let col = 0; col < NUM_COLS; col++) {
        const c = { row, col };
        if (this.occupied(c) || !this.compatible(c)) continue;

        const touchesTrack = DIRECTIONS.some((dir) => {
          const n = stepFrom(c, dir);
          return n !== null && this.occupied(n);
        });
        if (touchesTrack) yield c;
      }
    }
  }

  legalMoves(): Move[] {
    return listLegalMoves(this);
  }

  makeMove(move: Move): void {
    const target = move.resultingConstraint;
    if (target !== undefined && !appliesTo(target, this.current)) {
      throw new EngineInvariantError(
        "CONSTRAINT_MISMATCH",
        `board type is ${String(this.current)}, cannot become ${target}`,
        "makeMove"
      );
    }

    // Throws OFF_GRID before anything changes.
    const cells = coveredCells(move);

    this.stack.push({ move, previousConstraint: this.current });
    if (target !== undefined) this.current = target;
    this.setCells(cells, true);

    validateBoard(this, "makeMove");
  }

  undoMove(): Move {
    const top = this.stack.pop();
    if (!top) {
      throw new EngineInvariantError("EMPTY_HISTORY", "no move to undo", "undoMove");
    }

    this.current = top.previousConstraint;
    this.setCells(coveredCells(top.move), false);

    validateBoard(this, "undoMove");
    return top.move;
  }

  // Copies grid, board type and history.
  clone(): Board {
    const copy = new Board(this.grid, this.current);
    for (const entry of this.stack) copy.stack.push({ ...entry });
    return copy;
  }

  cells(): boolean[][] {
    return this.grid.map((row) => [...row]);
  }

  private setCells(cells: readonly Coordinate[], value: boolean): void {
    for (const c of cells) this.grid[c.row][c.col] = value;
  }
}
