import { GameError, GameErrorCode } from "@flipside/core";
import { z } from "zod";
import { CELL_COUNT, BOARD_SIZE, count, opponentOf, squares } from "./state";
import type { Bitboard, Color, OthelloSnapshot } from "./state";
import { legalMovesFor } from "./rules";
import weightTable from "./positionWeights.json";

/** Points per legal move */
export const MOBILITY_WEIGHT = 5;

/**
 * Per-cell weights, row-major from A1. Corners are worth most; the cells
 * touching a corner are penalised since taking them tends to give the
 * corner away.
 */
export const POSITION_WEIGHTS: readonly number[] = loadWeights(weightTable);

export interface EvaluationBreakdown {
  mobility: number;
  positional: number;
  discs: number;
  total: number;
}

/**
 * Disc-differential multiplier by stage of the game: raw disc count barely
 * matters while the board is sparse and dominates near the end.
 */
export function phaseMultiplier(totalDiscs: number): number {
  if (totalDiscs <= 20) return 0.5;
  if (totalDiscs <= 40) return 2.0;
  return 5.0;
}

export function positionalScore(mask: Bitboard): number {
  let score = 0;
  for (const i of squares(mask)) score += POSITION_WEIGHTS[i];
  return score;
}

/** The three heuristic terms and their sum, each signed from `perspective` */
export function evaluateBreakdown(
  snapshot: OthelloSnapshot,
  perspective: Color
): EvaluationBreakdown {
  const other = opponentOf(perspective);

  const mobility =
    MOBILITY_WEIGHT *
    (count(legalMovesFor(snapshot, perspective)) -
      count(legalMovesFor(snapshot, other)));

  const positional =
    positionalScore(snapshot.discs[perspective]) -
    positionalScore(snapshot.discs[other]);

  const own = count(snapshot.discs[perspective]);
  const opp = count(snapshot.discs[other]);
  // `| 0` truncates toward zero, keeping the score antisymmetric
  const discs = ((own - opp) * phaseMultiplier(own + opp)) | 0;

  return { mobility, positional, discs, total: mobility + positional + discs };
}

/** Static score of a position; positive favours `perspective` */
export function evaluate(snapshot: OthelloSnapshot, perspective: Color): number {
  return evaluateBreakdown(snapshot, perspective).total;
}

const WeightTableSchema = z.array(z.number().int()).length(CELL_COUNT);

/** Check the table's shape and its symmetry across both board axes */
export function loadWeights(table: unknown): readonly number[] {
  const result = WeightTableSchema.safeParse(table);
  if (!result.success) {
    throw new GameError(
      GameErrorCode.CONFIGURATION_ERROR,
      `Position weights must be ${CELL_COUNT} integers`,
      { issues: result.error.issues.map((issue) => issue.message) }
    );
  }
  const weights = result.data;

  for (let i = 0; i < CELL_COUNT; i++) {
    const row = Math.floor(i / BOARD_SIZE);
    const col = i % BOARD_SIZE;
    const mirroredCol = row * BOARD_SIZE + (BOARD_SIZE - 1 - col);
    const mirroredRow = (BOARD_SIZE - 1 - row) * BOARD_SIZE + col;
    if (weights[i] !== weights[mirroredCol] || weights[i] !== weights[mirroredRow]) {
      throw new GameError(
        GameErrorCode.CONFIGURATION_ERROR,
        "Position weights must be symmetric across both board axes",
        { index: i }
      );
    }
  }
  return Object.freeze(weights);
}
