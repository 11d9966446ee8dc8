// src/engine/player.ts

import type { Outcome, Player } from "../types";

export const PLAYERS: readonly Player[] = ["yeonSeung", "junSeok"];

export function opponent(player: Player): Player {
  return player === "yeonSeung" ? "junSeok" : "yeonSeung";
}

export function winOf(player: Player): Outcome {
  return player === "yeonSeung" ? "yeonSeungWin" : "junSeokWin";
}

export function winnerOf(outcome: Outcome): Player {
  return outcome === "yeonSeungWin" ? "yeonSeung" : "junSeok";
}

export function displayName(player: Player): string {
  return player === "yeonSeung" ? "YeonSeung" : "JunSeok";
}
