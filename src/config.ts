// src/config.ts
//
// Environment-driven settings.
//
//   MONORAIL_VALIDATE_BOARD=1         check board consistency after every make/undo
//   MONORAIL_SEARCH=forced|alphaBeta  search used by the CLI (default forced)
//   MONORAIL_STARTING_PLAYER=yeonSeung|junSeok

import type { Player } from "./types";

export type SearchKind = "forced" | "alphaBeta";

type Env = Readonly<Record<string, string | undefined>>;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envChoice<T extends string>(env: Env, name: string, choices: readonly T[], defaultValue: T): T {
  const v = env[name];
  if (v == null) return defaultValue;
  const found = choices.find((c) => c === v.trim());
  if (!found) {
    throw new Error(`${name} must be one of ${choices.join(", ")} (got "${v}")`);
  }
  return found;
}

export const boardConfig = {
  validateBoard: envFlag(process.env, "MONORAIL_VALIDATE_BOARD"),
};

export interface CliConfig {
  search: SearchKind;
  startingPlayer: Player;
  listLegalMoves: boolean;
  bestMove: boolean;
  analyze: boolean;
}

export function interactive(config: CliConfig): boolean {
  return !config.listLegalMoves && !config.bestMove && !config.analyze;
}

export function loadCliConfig(argv: readonly string[], env: Env = process.env): CliConfig {
  return {
    search: envChoice<SearchKind>(env, "MONORAIL_SEARCH", ["forced", "alphaBeta"], "forced"),
    startingPlayer: envChoice<Player>(env, "MONORAIL_STARTING_PLAYER", ["yeonSeung", "junSeok"], "yeonSeung"),
    listLegalMoves: argv.includes("-l"),
    bestMove: argv.includes("-b"),
    analyze: argv.includes("-a"),
  };
}
