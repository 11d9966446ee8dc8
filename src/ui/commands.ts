// src/ui/commands.ts
//
// Output for the -l / -b / -a flags and the interactive commands.
// Every handler writes through `log` so tests can collect lines.

import type { Board } from "../engine/board";
import { formatMove, formatOutcome } from "../engine/notation";
import { displayName, opponent } from "../engine/player";
import { analyzeResponses, search, searchAlphaBeta } from "../engine/search";
import type { SearchFn } from "../engine/search";
import type { SearchKind } from "../config";
import type { Player } from "../types";
import { formatBoard } from "./board/boardView";

export type Log = (line: string) => void;

const consoleLog: Log = (line) => console.log(line);

export function searchFor(kind: SearchKind): SearchFn {
  return kind === "alphaBeta" ? searchAlphaBeta : search;
}

export function printLegalMoves(board: Board, log: Log = consoleLog): void {
  board.legalMoves().forEach((m, i) => log(`${i} ${formatMove(m)}`));
}

export function printBestMove(player: Player, board: Board, searchFn: SearchFn = search, log: Log = consoleLog): void {
  const result = searchFn(player, board);
  log(formatOutcome(result.outcome));
  log(result.move ? `${displayName(player)} plays ${formatMove(result.move)}` : `${displayName(player)} has no forcing move`);
  log(`(${result.nodes} positions searched)`);

  if (result.move) {
    board.makeMove(result.move);
    formatBoard(board).forEach((line) => log(line));
    board.undoMove();
  }
}

export function printAllResponses(
  player: Player,
  board: Board,
  searchFn: SearchFn = search,
  log: Log = consoleLog
): void {
  for (const a of analyzeResponses(player, board, searchFn)) {
    const head = `If ${displayName(player)} plays ${formatMove(a.move)}:`;
    if (!a.reply) {
      log(`${head} ${formatOutcome(a.outcome)}`);
      continue;
    }

    log(`${head} ${displayName(opponent(player))} replies ${formatMove(a.reply)}, ${formatOutcome(a.outcome)}`);
    board.makeMove(a.move);
    board.makeMove(a.reply);
    formatBoard(board).forEach((line) => log(line));
    board.undoMove();
    board.undoMove();
  }
}

/**
 * Interactive turn loop state. One line of input per call.
 *
 *   <index>        play the listed move
 *   a | analyze    every move and the opponent's reply
 *   b | best       forced result and move for the player to move
 *   q | quit       leave
 */
export class TextSession {
  private player: Player;
  private turn = 1;
  private finished = false;

  constructor(
    private readonly board: Board,
    startingPlayer: Player,
    private readonly searchFn: SearchFn = search,
    private readonly log: Log = consoleLog
  ) {
    this.player = startingPlayer;
  }

  get currentPlayer(): Player {
    return this.player;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Print the turn banner, board and numbered moves. Ends the session when
   * the player to move has no legal move.
   */
  showTurn(): void {
    this.log(`=================== Turn ${this.turn} ===================`);
    const moves = this.board.legalMoves();
    if (moves.length === 0) {
      this.log(`No moves left, ${displayName(opponent(this.player))} wins`);
      this.finished = true;
      return;
    }

    formatBoard(this.board).forEach((line) => this.log(line));
    moves.forEach((m, i) => this.log(`${i} ${formatMove(m)}`));
    this.log(`It's ${displayName(this.player)}'s turn. What move?`);
  }

  // Returns false once the session is over.
  handleLine(raw: string): boolean {
    if (this.finished) return false;
    const input = raw.trim();

    if (input === "q" || input === "quit") {
      this.finished = true;
      return false;
    }

    if (input === "a" || input === "analyze") {
      printAllResponses(this.player, this.board, this.searchFn, this.log);
      return true;
    }

    if (input === "b" || input === "best") {
      printBestMove(this.player, this.board, this.searchFn, this.log);
      return true;
    }

    if (!/^\d+$/.test(input)) {
      this.log("Not a number.");
      return true;
    }

    const moves = this.board.legalMoves();
    const move = moves[Number(input)];
    if (!move) {
      this.log("Move not found.");
      return true;
    }

    this.board.makeMove(move);
    this.player = opponent(this.player);
    this.turn++;
    this.showTurn();
    return !this.finished;
  }
}
