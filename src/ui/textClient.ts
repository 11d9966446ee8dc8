// src/ui/textClient.ts
//
// Line-based interactive play on stdin/stdout.
//
// Usage (interactive):
//   <index>     play the numbered move
//   a           analyze every move
//   b           best move for the player to move
//   q           quit

import readline from "node:readline";

import type { Board } from "../engine/board";
import type { SearchFn } from "../engine/search";
import type { Player } from "../types";
import { TextSession } from "./commands";

export function runTextClient(board: Board, startingPlayer: Player, searchFn: SearchFn): Promise<void> {
  const session = new TextSession(board, startingPlayer, searchFn);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  return new Promise((resolve, reject) => {
    rl.on("close", () => resolve());
    rl.on("line", (line) => {
      try {
        if (!session.handleLine(line)) rl.close();
        else rl.prompt();
      } catch (err) {
        rl.close();
        reject(err);
      }
    });

    rl.setPrompt("> ");
    session.showTurn();
    if (session.isFinished) rl.close();
    else rl.prompt();
  });
}
