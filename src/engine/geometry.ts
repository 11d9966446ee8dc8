// src/engine/geometry.ts

import type { Coordinate, Direction } from "../types";
import { NUM_COLS, NUM_ROWS } from "./constants";

export function coord(row: number, col: number): Coordinate {
  return { row, col };
}

export function coordsEqual(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.col === b.col;
}

export function onGrid(c: Coordinate): boolean {
  return c.row >= 0 && c.row < NUM_ROWS && c.col >= 0 && c.col < NUM_COLS;
}

const ROW_DELTA: Record<Direction, number> = { up: -1, down: 1, left: 0, right: 0 };
const COL_DELTA: Record<Direction, number> = { up: 0, down: 0, left: -1, right: 1 };

/**
 * Step `distance` cells from `c`. Returns null when the target is off the grid.
 */
export function stepFrom(c: Coordinate, dir: Direction, distance = 1): Coordinate | null {
  const next = { row: c.row + ROW_DELTA[dir] * distance, col: c.col + COL_DELTA[dir] * distance };
  return onGrid(next) ? next : null;
}

// The lower-left 3x2 block whose final layout the board type decides.
export function inConstrainedRegion(c: Coordinate): boolean {
  return c.col < 2 && c.row >= 1;
}

export function allCoordinates(): Coordinate[] {
  const out: Coordinate[] = [];
  for (let row = 0; row < NUM_ROWS; row++) {
    for (let col = 0; col < NUM_COLS; col++) out.push({ row, col });
  }
  return out;
}
