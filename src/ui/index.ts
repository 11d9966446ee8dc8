#!/usr/bin/env node
// src/ui/index.ts
//
// CLI entry point.
//
//   -l   list legal moves from the starting position
//   -b   forced result and best move
//   -a   forced result after every legal move
//   (no flag) interactive play
//
// Env: see src/config.ts

import { interactive, loadCliConfig } from "../config";
import { Board } from "../engine/board";
import { STARTING_LAYOUT } from "../engine/constants";
import { printAllResponses, printBestMove, printLegalMoves, searchFor } from "./commands";
import { runTextClient } from "./textClient";

async function main() {
  const config = loadCliConfig(process.argv.slice(2));
  const board = new Board(STARTING_LAYOUT, null);
  const searchFn = searchFor(config.search);

  if (config.listLegalMoves) printLegalMoves(board);
  if (config.bestMove) printBestMove(config.startingPlayer, board, searchFn);
  if (config.analyze) printAllResponses(config.startingPlayer, board, searchFn);

  if (interactive(config)) {
    await runTextClient(board, config.startingPlayer, searchFn);
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
