// src/engine/search.ts
//
// Forced-result search. The game has no draws and every line ends, so a
// position is won for the mover iff some child is won for the mover.
//
// The board is mutated in place: apply, recurse, undo. Callers get it back
// exactly as they passed it in.

import type { Move, MoveAnalysis, Outcome, Player, SearchResult } from "../types";
import type { Board } from "./board";
import { opponent, winOf } from "./player";

type Counter = { nodes: number };

function forced(player: Player, board: Board, counter: Counter): { outcome: Outcome; move?: Move } {
  counter.nodes++;

  const moves = board.legalMoves();
  // No moves left: the opponent completed the track.
  if (moves.length === 0) return { outcome: winOf(opponent(player)) };

  const mine = winOf(player);
  for (const move of moves) {
    board.makeMove(move);
    let reply: Outcome;
    try {
      reply = forced(opponent(player), board, counter).outcome;
    } finally {
      board.undoMove();
    }
    if (reply === mine) return { outcome: mine, move };
  }

  return { outcome: winOf(opponent(player)) };
}

/**
 * Result with `player` to move. The reported move is the first forcing win
 * in generation order.
 */
export function search(player: Player, board: Board): SearchResult {
  const counter: Counter = { nodes: 0 };
  const { outcome, move } = forced(player, board, counter);
  return move ? { outcome, move, nodes: counter.nodes } : { outcome, nodes: counter.nodes };
}

/* ---------- RANKED ALPHA-BETA ---------- */

// lossLikelyForJunSeok < junSeokWin < yeonSeungWin < lossLikelyForYeonSeung.
// The outer two are window sentinels only; searches return the inner two.
const LOSS_LIKELY_FOR_JUNSEOK = 0;
const JUNSEOK_WIN = 1;
const YEONSEUNG_WIN = 2;
const LOSS_LIKELY_FOR_YEONSEUNG = 3;

function rankToOutcome(rank: number): Outcome {
  return rank >= YEONSEUNG_WIN ? "yeonSeungWin" : "junSeokWin";
}

function alphaBeta(
  player: Player,
  board: Board,
  initialAlpha: number,
  initialBeta: number,
  counter: Counter
): { rank: number; move?: Move } {
  counter.nodes++;

  const moves = board.legalMoves();
  if (moves.length === 0) {
    return { rank: player === "yeonSeung" ? JUNSEOK_WIN : YEONSEUNG_WIN };
  }

  // YeonSeung maximizes, JunSeok minimizes.
  const maximizing = player === "yeonSeung";
  let best = maximizing ? initialAlpha : initialBeta;
  let alpha = initialAlpha;
  let beta = initialBeta;
  let bestMove: Move | undefined;

  for (const move of moves) {
    board.makeMove(move);
    let reply: number;
    try {
      reply = alphaBeta(opponent(player), board, alpha, beta, counter).rank;
    } finally {
      board.undoMove();
    }

    if (maximizing) {
      if (reply > best) {
        best = reply;
        alpha = reply;
        bestMove = move;
      }
      if (best >= YEONSEUNG_WIN) return { rank: best, move: bestMove };
    } else {
      if (reply < best) {
        best = reply;
        beta = reply;
        bestMove = move;
      }
      if (best <= JUNSEOK_WIN) return { rank: best, move: bestMove };
    }

    if (alpha >= beta) return { rank: best, move: bestMove };
  }

  return { rank: best, move: bestMove };
}

/**
 * Same answer as search(), computed as alpha-beta over the ranked outcome
 * domain. The move is reported only when the mover wins.
 */
export function searchAlphaBeta(player: Player, board: Board): SearchResult {
  const counter: Counter = { nodes: 0 };
  const { rank, move } = alphaBeta(player, board, LOSS_LIKELY_FOR_JUNSEOK, LOSS_LIKELY_FOR_YEONSEUNG, counter);
  const outcome = rankToOutcome(rank);
  return move && outcome === winOf(player)
    ? { outcome, move, nodes: counter.nodes }
    : { outcome, nodes: counter.nodes };
}

/* ---------- ANALYSIS ---------- */

export type SearchFn = (player: Player, board: Board) => SearchResult;

/**
 * For each legal move of `player`: the forced result after it, and the
 * opponent's forcing reply when there is one.
 */
export function analyzeResponses(player: Player, board: Board, searchFn: SearchFn = search): MoveAnalysis[] {
  const out: MoveAnalysis[] = [];
  for (const move of board.legalMoves()) {
    board.makeMove(move);
    let result: SearchResult;
    try {
      result = searchFn(opponent(player), board);
    } finally {
      board.undoMove();
    }
    out.push(result.move ? { move, outcome: result.outcome, reply: result.move } : { move, outcome: result.outcome });
  }
  return out;
}
