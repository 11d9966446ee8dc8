// src/engine/constants.ts

import type { BoardLayout, Direction, MoveShape, RegionConstraint } from "../types";

export const NUM_ROWS = 4;
export const NUM_COLS = 5;

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

// Canonical generation order.
export const MOVE_SHAPES: readonly MoveShape[] = [
  "single",
  "oneUp",
  "oneDown",
  "oneLeft",
  "oneRight",
  "twoUp",
  "twoDown",
  "twoLeft",
  "twoRight",
  "upAndDown",
  "leftAndRight",
];

// Canonical ordering; candidate board types are emitted in this order.
export const REGION_CONSTRAINTS: readonly RegionConstraint[] = [
  "left",
  "leftOrMiddle",
  "middle",
  "rightOrMiddle",
  "right",
];

// Opening position: the track already laid across the top and down column 3.
export const STARTING_LAYOUT: BoardLayout = [
  [false, true, true, true, false],
  [false, false, false, true, false],
  [false, false, false, true, false],
  [false, false, false, false, false],
];
