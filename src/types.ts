// src/types.ts

export type Player = "yeonSeung" | "junSeok";

export type Outcome = "yeonSeungWin" | "junSeokWin";

export interface Coordinate {
  readonly row: number;
  readonly col: number;
}

export type Direction = "up" | "down" | "left" | "right";

export type MoveShape =
  | "single"
  | "oneUp"
  | "oneDown"
  | "oneLeft"
  | "oneRight"
  | "twoUp"
  | "twoDown"
  | "twoLeft"
  | "twoRight"
  | "upAndDown"
  | "leftAndRight";

/**
 * Board type of the lower-left region.
 *
 * The board itself holds `RegionConstraint | null`; null is the unresolved
 * state and may narrow to any of these.
 */
export type RegionConstraint = "left" | "leftOrMiddle" | "middle" | "rightOrMiddle" | "right";

export interface Move {
  anchor: Coordinate;
  shape: MoveShape;

  // Present only when applying the move narrows the board type.
  resultingConstraint?: RegionConstraint;
}

export interface HistoryEntry {
  move: Move;
  previousConstraint: RegionConstraint | null;
}

// Row-major occupancy, NUM_ROWS rows of NUM_COLS cells. true = occupied.
export type BoardLayout = readonly (readonly boolean[])[];

export interface SearchResult {
  outcome: Outcome;

  // Set only when the player to move has a forced win.
  move?: Move;

  // Positions visited, root included.
  nodes: number;
}

export interface MoveAnalysis {
  move: Move;
  outcome: Outcome;

  // Opponent's forcing reply, when the opponent wins after `move`.
  reply?: Move;
}
