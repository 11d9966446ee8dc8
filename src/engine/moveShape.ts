// src/engine/moveShape.ts

import type { Coordinate, Direction, Move, MoveShape } from "../types";
import { NUM_COLS, NUM_ROWS } from "./constants";
import { EngineInvariantError } from "./errors";
import { onGrid, stepFrom } from "./geometry";

type ShapeStep = { dir: Direction; distance: 1 | 2 };

// Cells beyond the anchor, in footprint order.
const SHAPE_STEPS: Record<MoveShape, readonly ShapeStep[]> = {
  single: [],
  oneUp: [{ dir: "up", distance: 1 }],
  oneDown: [{ dir: "down", distance: 1 }],
  oneLeft: [{ dir: "left", distance: 1 }],
  oneRight: [{ dir: "right", distance: 1 }],
  twoUp: [
    { dir: "up", distance: 1 },
    { dir: "up", distance: 2 },
  ],
  twoDown: [
    { dir: "down", distance: 1 },
    { dir: "down", distance: 2 },
  ],
  twoLeft: [
    { dir: "left", distance: 1 },
    { dir: "left", distance: 2 },
  ],
  twoRight: [
    { dir: "right", distance: 1 },
    { dir: "right", distance: 2 },
  ],
  upAndDown: [
    { dir: "up", distance: 1 },
    { dir: "down", distance: 1 },
  ],
  leftAndRight: [
    { dir: "left", distance: 1 },
    { dir: "right", distance: 1 },
  ],
};

function stepInBounds(anchor: Coordinate, step: ShapeStep): boolean {
  switch (step.dir) {
    case "up":
      return anchor.row >= step.distance;
    case "down":
      return anchor.row < NUM_ROWS - step.distance;
    case "left":
      return anchor.col >= step.distance;
    case "right":
      return anchor.col < NUM_COLS - step.distance;
  }
}

/**
 * Row/col limits of the shape (e.g. twoUp needs row >= 2).
 * Must hold before footprint() is called.
 */
export function inBounds(move: Pick<Move, "anchor" | "shape">): boolean {
  return SHAPE_STEPS[move.shape].every((s) => stepInBounds(move.anchor, s));
}

export function footprint(move: Pick<Move, "anchor" | "shape">): Coordinate[] {
  return SHAPE_STEPS[move.shape].map((s) => {
    const cell = stepFrom(move.anchor, s.dir, s.distance);
    if (!cell) {
      throw new EngineInvariantError(
        "OFF_GRID",
        `${move.shape} leaves the grid at (${move.anchor.row},${move.anchor.col})`,
        "footprint"
      );
    }
    return cell;
  });
}

// Anchor first, then footprint.
export function coveredCells(move: Pick<Move, "anchor" | "shape">): Coordinate[] {
  if (!onGrid(move.anchor)) {
    throw new EngineInvariantError("OFF_GRID", `anchor (${move.anchor.row},${move.anchor.col}) is off the grid`, "coveredCells");
  }
  return [move.anchor, ...footprint(move)];
}

export function shapeSize(shape: MoveShape): number {
  return SHAPE_STEPS[shape].length + 1;
}
