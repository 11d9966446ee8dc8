// src/engine/legalMoves.ts

import type { Coordinate, Move, MoveShape, RegionConstraint } from "../types";
import type { Board } from "./board";
import { MOVE_SHAPES, REGION_CONSTRAINTS } from "./constants";
import { inConstrainedRegion } from "./geometry";
import { footprint, inBounds } from "./moveShape";
import { appliesTo, inducedBy, isFinalConstraint } from "./regionConstraint";

/* ---------- BOARD-TYPE CANDIDATES ---------- */
/*
- A candidate must be reachable from the current type and allow every covered cell.
- leftOrMiddle dominates left and middle; rightOrMiddle dominates right and middle.
  Both refinements stay reachable from the open value, so listing them now
  only duplicates search branches.
*/

export function candidateConstraints(
  current: RegionConstraint | null,
  cells: readonly Coordinate[]
): RegionConstraint[] {
  const ok = new Set<RegionConstraint>(
    REGION_CONSTRAINTS.filter((t) => appliesTo(t, current) && cells.every((c) => inducedBy(t, c)))
  );

  if (ok.has("leftOrMiddle")) {
    ok.delete("left");
    ok.delete("middle");
  }
  if (ok.has("rightOrMiddle")) {
    ok.delete("right");
    ok.delete("middle");
  }

  // Canonical order.
  return REGION_CONSTRAINTS.filter((t) => ok.has(t));
}

/* ---------- MAIN ---------- */

function listPlacements(board: Board, anchor: Coordinate, shape: MoveShape): Move[] {
  const base = { anchor, shape };
  if (!inBounds(base)) return [];

  const extra = footprint(base);
  if (extra.some((c) => board.occupied(c) || !board.compatible(c))) return [];

  const touchesRegion = inConstrainedRegion(anchor) || extra.some(inConstrainedRegion);
  if (!touchesRegion || isFinalConstraint(board.constraint)) {
    return [{ anchor, shape }];
  }

  return candidateConstraints(board.constraint, [anchor, ...extra]).map((resultingConstraint) => ({
    anchor,
    shape,
    resultingConstraint,
  }));
}

/**
 * Every legal placement, frontier cells in row-major order, shapes in
 * canonical order, board types in canonical order.
 */
export function listLegalMoves(board: Board): Move[] {
  const moves: Move[] = [];
  for (const anchor of board.frontier()) {
    for (const shape of MOVE_SHAPES) {
      moves.push(...listPlacements(board, anchor, shape));
    }
  }
  return moves;
}
