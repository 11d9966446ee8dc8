// src/engine/stateUtils.ts

import type { BoardLayout, Move } from "../types";
import { NUM_COLS, NUM_ROWS } from "./constants";
import { coordsEqual } from "./geometry";
import { EngineInvariantError } from "./errors";

export function emptyLayout(): boolean[][] {
  return Array.from({ length: NUM_ROWS }, () => Array.from({ length: NUM_COLS }, () => false));
}

/**
 * Copy a layout, rejecting anything that is not NUM_ROWS x NUM_COLS.
 */
export function cloneLayout(layout: BoardLayout, where = "cloneLayout"): boolean[][] {
  if (layout.length !== NUM_ROWS) {
    throw new EngineInvariantError("INVALID_LAYOUT", `expected ${NUM_ROWS} rows, got ${layout.length}`, where);
  }
  return layout.map((row, i) => {
    if (row.length !== NUM_COLS) {
      throw new EngineInvariantError("INVALID_LAYOUT", `row ${i}: expected ${NUM_COLS} cells, got ${row.length}`, where);
    }
    return [...row];
  });
}

/**
 * Build a layout from rows drawn as text: '#' occupied, '.' free.
 *
 *   layoutFromRows(".###.", "...#.", "...#.", ".....")
 */
export function layoutFromRows(...rows: string[]): boolean[][] {
  const layout = rows.map((r, i) =>
    Array.from(r).map((ch) => {
      if (ch === "#") return true;
      if (ch === ".") return false;
      throw new EngineInvariantError("INVALID_LAYOUT", `row ${i}: unexpected '${ch}'`, "layoutFromRows");
    })
  );
  return cloneLayout(layout, "layoutFromRows");
}

export function movesEqual(a: Move, b: Move): boolean {
  return (
    coordsEqual(a.anchor, b.anchor) &&
    a.shape === b.shape &&
    (a.resultingConstraint ?? null) === (b.resultingConstraint ?? null)
  );
}
