import type { Coordinate, Move, Outcome, RegionConstraint } from "../types";

/**
 * Move notation for logs, the CLI and test failure messages.
 *
 *   formatMove({ anchor: { row: 0, col: 0 }, shape: "oneDown", resultingConstraint: "leftOrMiddle" })
 *     => "oneDown@(0,0) -> leftOrMiddle"
 */

export function formatCoordinate(c: Coordinate): string {
  return `(${c.row},${c.col})`;
}

export function formatConstraint(t: RegionConstraint | null): string {
  return t ?? "unresolved";
}

export function formatMove(move: Move): string {
  const base = `${move.shape}@${formatCoordinate(move.anchor)}`;
  return move.resultingConstraint ? `${base} -> ${move.resultingConstraint}` : base;
}

export function formatOutcome(outcome: Outcome): string {
  return outcome === "yeonSeungWin" ? "YeonSeung wins" : "JunSeok wins";
}
