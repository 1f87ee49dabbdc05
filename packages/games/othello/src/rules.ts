import { GameError, GameErrorCode } from "@flipside/core";
import type { Bitboard, Color, OthelloSnapshot } from "./state";
import {
  EMPTY,
  FULL_BOARD,
  CELL_COUNT,
  bit,
  countDiscs,
  freeze,
  indexToCoordinate,
  isValidIndex,
  occupied,
  opponentOf,
} from "./state";

/** Why a position is over */
export type TerminalReason = "board_full" | "double_pass" | "wipeout" | "no_moves";

/** Every cell except file A / file H */
const NOT_A_FILE: Bitboard = 0xfefefefefefefefen;
const NOT_H_FILE: Bitboard = 0x7f7f7f7f7f7f7f7fn;

interface Direction {
  /** Index delta of one step */
  delta: number;
  /**
   * Source cells allowed to take the step. A step that moves a column
   * east must not start on file H, one that moves west must not start on
   * file A, or it would wrap into the neighbouring rank.
   */
  from: Bitboard;
}

const DIRECTIONS: readonly Direction[] = [
  { delta: 1, from: NOT_H_FILE }, // east
  { delta: -1, from: NOT_A_FILE }, // west
  { delta: 8, from: FULL_BOARD }, // north (towards rank 8)
  { delta: -8, from: FULL_BOARD }, // south
  { delta: 9, from: NOT_H_FILE }, // north-east
  { delta: 7, from: NOT_A_FILE }, // north-west
  { delta: -7, from: NOT_H_FILE }, // south-east
  { delta: -9, from: NOT_A_FILE }, // south-west
];

function shift(mask: Bitboard, dir: Direction): Bitboard {
  const src = mask & dir.from;
  return dir.delta > 0
    ? (src << BigInt(dir.delta)) & FULL_BOARD
    : src >> BigInt(-dir.delta);
}

/**
 * Opponent discs captured by a disc of `own` at `origin`, over all 8 rays.
 * A ray captures only when its run of opponent discs ends on an own disc.
 */
function capturesFrom(origin: Bitboard, own: Bitboard, opp: Bitboard): Bitboard {
  let flips = EMPTY;
  for (const dir of DIRECTIONS) {
    let line = EMPTY;
    let cur = shift(origin, dir);
    while ((cur & opp) !== 0n) {
      line |= cur;
      cur = shift(cur, dir);
    }
    if (line !== 0n && (cur & own) !== 0n) {
      flips |= line;
    }
  }
  return flips;
}

function sides(snapshot: OthelloSnapshot): { own: Bitboard; opp: Bitboard } {
  const color = snapshot.activeColor;
  return {
    own: snapshot.discs[color],
    opp: snapshot.discs[opponentOf(color)],
  };
}

/**
 * Cells where the side to move may place a disc.
 *
 * Fills every direction at once: a run of up to 6 opponent discs grown
 * from the mover's discs, then one more step onto an empty cell. A cell is
 * set exactly when a walk from it would capture in that direction.
 */
export function generateLegalMoves(snapshot: OthelloSnapshot): Bitboard {
  const { own, opp } = sides(snapshot);
  const empty = ~(own | opp) & FULL_BOARD;
  let moves = EMPTY;

  for (const dir of DIRECTIONS) {
    let run = shift(own, dir) & opp;
    for (let k = 0; k < 5; k++) {
      run |= shift(run, dir) & opp;
    }
    moves |= shift(run, dir) & empty;
  }
  return moves;
}

/** Legal moves for `color`, whoever is to move in `snapshot` */
export function legalMovesFor(snapshot: OthelloSnapshot, color: Color): Bitboard {
  return generateLegalMoves(withActiveColor(snapshot, color));
}

/**
 * Discs flipped by the side to move playing at `move`. Expects a legal
 * move; the origin cell itself is not checked for emptiness.
 */
export function getFlips(snapshot: OthelloSnapshot, move: number): Bitboard {
  const { own, opp } = sides(snapshot);
  return capturesFrom(bit(move), own, opp);
}

/**
 * Place the mover's disc at `move` and flip what it captures.
 * Throws MOVE_ILLEGAL when `move` is not in `generateLegalMoves(snapshot)`.
 */
export function applyMove(snapshot: OthelloSnapshot, move: number): OthelloSnapshot {
  const color = snapshot.activeColor;
  const moveMask = isValidIndex(move) ? bit(move) : EMPTY;
  const flips =
    moveMask !== EMPTY && (occupied(snapshot) & moveMask) === 0n
      ? getFlips(snapshot, move)
      : EMPTY;

  if (flips === EMPTY) {
    throw new GameError(
      GameErrorCode.MOVE_ILLEGAL,
      `${indexToCoordinate(move)} is not a legal move for ${color}`,
      { move, color }
    );
  }

  const opp = opponentOf(color);
  const own = snapshot.discs[color] | moveMask | flips;
  const rest = snapshot.discs[opp] & ~flips;
  return freeze({
    discs: color === "B" ? { B: own, W: rest } : { B: rest, W: own },
    activeColor: opp,
    consecutivePasses: 0,
    lastMove: move,
  });
}

/** Hand the turn over without placing a disc. The caller checks there is no legal move. */
export function applyPass(snapshot: OthelloSnapshot): OthelloSnapshot {
  return freeze({
    discs: snapshot.discs,
    activeColor: opponentOf(snapshot.activeColor),
    consecutivePasses: snapshot.consecutivePasses + 1,
    lastMove: "pass",
  });
}

/** Same position with a different side to move */
export function withActiveColor(snapshot: OthelloSnapshot, color: Color): OthelloSnapshot {
  if (snapshot.activeColor === color) return snapshot;
  return freeze({ ...snapshot, activeColor: color });
}

/**
 * Reason the position is over, judged from the caller's legal-move sets
 * for both colours, or null while play continues.
 */
export function getTerminalReason(
  snapshot: OthelloSnapshot,
  legalForMover: Bitboard,
  legalForOther: Bitboard
): TerminalReason | null {
  const { B, W } = countDiscs(snapshot);
  const total = B + W;

  if (total === CELL_COUNT) return "board_full";
  if (snapshot.consecutivePasses >= 2) return "double_pass";
  if (B === 0 || W === 0) return "wipeout";
  if (legalForMover === EMPTY && legalForOther === EMPTY) return "no_moves";
  return null;
}

/**
 * True when the board is full, two passes happened in a row, a colour has
 * no discs left, or neither side can move. Does not recompute legal moves.
 */
export function isTerminal(
  snapshot: OthelloSnapshot,
  legalForMover: Bitboard,
  legalForOther: Bitboard
): boolean {
  return getTerminalReason(snapshot, legalForMover, legalForOther) !== null;
}

/** `getTerminalReason` with both legal-move sets generated */
export function terminalReasonOf(snapshot: OthelloSnapshot): TerminalReason | null {
  return getTerminalReason(
    snapshot,
    generateLegalMoves(snapshot),
    legalMovesFor(snapshot, opponentOf(snapshot.activeColor))
  );
}

export function isGameOver(snapshot: OthelloSnapshot): boolean {
  return terminalReasonOf(snapshot) !== null;
}

/** Colour with more discs, or null on equal counts */
export function getWinner(snapshot: OthelloSnapshot): Color | null {
  const { B, W } = countDiscs(snapshot);
  if (B > W) return "B";
  if (W > B) return "W";
  return null;
}
