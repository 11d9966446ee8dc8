// src/engine/regionConstraint.ts
//
// Board-type lattice for the lower-left region.
//
//   (unset) -> leftOrMiddle  -> left | middle
//   (unset) -> rightOrMiddle -> right | middle
//   (unset) -> left | middle | right
//
// Terminal values only ever narrow to themselves.

import type { Coordinate, RegionConstraint } from "../types";
import { coord, coordsEqual, inConstrainedRegion } from "./geometry";

type RegionRule =
  | { kind: "forbid"; cells: readonly Coordinate[] }
  | { kind: "only"; cells: readonly Coordinate[] };

// What a placement must satisfy for the board to end up as this type.
const INDUCED_RULES: Record<RegionConstraint, RegionRule> = {
  left: { kind: "forbid", cells: [coord(2, 1), coord(1, 1)] },
  leftOrMiddle: { kind: "only", cells: [coord(1, 0)] },
  middle: { kind: "forbid", cells: [coord(3, 0), coord(1, 1)] },
  rightOrMiddle: { kind: "only", cells: [coord(3, 1)] },
  right: { kind: "forbid", cells: [coord(3, 0), coord(2, 0)] },
};

// Cells closed off once the board already is this type.
const BLOCKED_CELLS: Record<RegionConstraint, readonly Coordinate[]> = {
  left: [coord(2, 1), coord(1, 1)],
  leftOrMiddle: [coord(1, 1)],
  middle: [coord(3, 0), coord(1, 1)],
  rightOrMiddle: [coord(3, 0)],
  right: [coord(3, 0), coord(2, 0)],
};

const NARROWS_TO: Record<RegionConstraint, readonly RegionConstraint[]> = {
  left: ["left"],
  leftOrMiddle: ["leftOrMiddle", "left", "middle"],
  middle: ["middle"],
  rightOrMiddle: ["rightOrMiddle", "right", "middle"],
  right: ["right"],
};

export function isFinal(t: RegionConstraint): boolean {
  return t === "left" || t === "middle" || t === "right";
}

/**
 * Can a board currently of type `current` become `target`?
 */
export function appliesTo(target: RegionConstraint, current: RegionConstraint | null): boolean {
  if (current === null) return true;
  return NARROWS_TO[current].includes(target);
}

/**
 * Is a tile at `c` consistent with the board eventually being `target`?
 * Cells outside the region always are.
 */
export function inducedBy(target: RegionConstraint, c: Coordinate): boolean {
  if (!inConstrainedRegion(c)) return true;

  const rule = INDUCED_RULES[target];
  const listed = rule.cells.some((x) => coordsEqual(x, c));
  return rule.kind === "only" ? listed : !listed;
}

/**
 * Same question as inducedBy, asked of the board's current (possibly unset) type.
 */
export function permits(current: RegionConstraint | null, c: Coordinate): boolean {
  if (!inConstrainedRegion(c)) return true;
  if (current === null) return true;
  return !BLOCKED_CELLS[current].some((x) => coordsEqual(x, c));
}

export function isFinalConstraint(current: RegionConstraint | null): boolean {
  return current !== null && isFinal(current);
}
