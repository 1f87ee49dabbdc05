import { GameError, GameErrorCode } from "@flipside/core";
import { EMPTY, opponentOf, squares } from "./state";
import type { Color, OthelloSnapshot } from "./state";
import {
  applyMove,
  applyPass,
  generateLegalMoves,
  isTerminal,
  legalMovesFor,
} from "./rules";
import { evaluate } from "./evaluation";

/** Returned by the search when the side to move has no legal placement */
export const PASS = "pass";

export type SearchMove = number | typeof PASS;

export interface RootScore {
  move: number;
  score: number;
}

export interface SearchResult {
  /** Best move, or PASS when there is none */
  move: SearchMove;
  /** Score of the best move from the mover's side; null on a pass */
  score: number | null;
  /** Score of every legal move, ascending by index */
  scores: RootScore[];
  /** Positions visited below the root */
  nodes: number;
}

/** Mutable counter threaded through a search */
export interface SearchStats {
  nodes: number;
}

/**
 * Minimax with alpha-beta pruning, children in ascending index order.
 *
 * A side with no legal move passes without using up a ply, so a forced
 * pass recurses at the same depth with the roles swapped. Leaves are scored
 * by `evaluate` from `perspective`.
 */
export function minimax(
  snapshot: OthelloSnapshot,
  depth: number,
  alpha: number,
  beta: number,
  maximizing: boolean,
  perspective: Color,
  stats?: SearchStats
): number {
  if (stats) stats.nodes++;

  if (depth === 0) {
    return evaluate(snapshot, perspective);
  }

  const legal = generateLegalMoves(snapshot);
  const otherLegal = legalMovesFor(snapshot, opponentOf(snapshot.activeColor));
  if (isTerminal(snapshot, legal, otherLegal)) {
    return evaluate(snapshot, perspective);
  }

  if (legal === EMPTY) {
    return minimax(applyPass(snapshot), depth, alpha, beta, !maximizing, perspective, stats);
  }

  if (maximizing) {
    let maxEval = -Infinity;
    for (const move of squares(legal)) {
      const score = minimax(applyMove(snapshot, move), depth - 1, alpha, beta, false, perspective, stats);
      maxEval = Math.max(maxEval, score);
      alpha = Math.max(alpha, maxEval);
      if (beta <= alpha) {
        break; // beta cutoff
      }
    }
    return maxEval;
  }

  let minEval = Infinity;
  for (const move of squares(legal)) {
    const score = minimax(applyMove(snapshot, move), depth - 1, alpha, beta, true, perspective, stats);
    minEval = Math.min(minEval, score);
    beta = Math.min(beta, minEval);
    if (beta <= alpha) {
      break; // alpha cutoff
    }
  }
  return minEval;
}

/** The same tree as `minimax` without cut-offs */
export function minimaxUnpruned(
  snapshot: OthelloSnapshot,
  depth: number,
  maximizing: boolean,
  perspective: Color
): number {
  const legal = generateLegalMoves(snapshot);
  const otherLegal = legalMovesFor(snapshot, opponentOf(snapshot.activeColor));
  if (depth === 0 || isTerminal(snapshot, legal, otherLegal)) {
    return evaluate(snapshot, perspective);
  }
  if (legal === EMPTY) {
    return minimaxUnpruned(applyPass(snapshot), depth, !maximizing, perspective);
  }

  const scores = squares(legal).map((move) =>
    minimaxUnpruned(applyMove(snapshot, move), depth - 1, !maximizing, perspective)
  );
  return maximizing ? Math.max(...scores) : Math.min(...scores);
}

/**
 * Score every legal move of the side to move at `depth` plies and pick the
 * highest. Ties keep the lowest index.
 */
export function analyze(snapshot: OthelloSnapshot, depth: number): SearchResult {
  assertDepth(depth);

  const legal = generateLegalMoves(snapshot);
  if (legal === EMPTY) {
    return { move: PASS, score: null, scores: [], nodes: 0 };
  }

  const mover = snapshot.activeColor;
  const stats: SearchStats = { nodes: 0 };
  const scores: RootScore[] = squares(legal).map((move) => ({
    move,
    score: minimax(applyMove(snapshot, move), depth - 1, -Infinity, Infinity, false, mover, stats),
  }));

  let best = scores[0];
  for (const entry of scores) {
    if (entry.score > best.score) best = entry;
  }

  return { move: best.move, score: best.score, scores, nodes: stats.nodes };
}

/** Best move for the side to move at a fixed depth, or PASS */
export function findBestMove(snapshot: OthelloSnapshot, depth: number): SearchMove {
  return analyze(snapshot, depth).move;
}

function assertDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new GameError(
      GameErrorCode.CONFIGURATION_ERROR,
      `Search depth must be a positive integer, got ${depth}`,
      { depth }
    );
  }
}
