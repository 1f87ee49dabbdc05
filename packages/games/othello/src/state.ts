import { GameError, GameErrorCode } from "@flipside/core";

/** Disc colours: "B" (Black) or "W" (White) */
export type Color = "B" | "W";

/**
 * A set of cells as a 64-bit mask: bit `i` is cell `i`.
 * Cells are row-major, row 0 = rank 1, column 0 = file A (A1 = 0, H8 = 63).
 */
export type Bitboard = bigint;

/** The last thing that happened: a cell index, a pass, or the start of the game */
export type LastMove = number | "pass" | "start";

/** Board dimension */
export const BOARD_SIZE = 8;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

/** Returned by `coordinateToIndex` for text that is not a cell */
export const NOT_FOUND = -1;

/** Returned by `indexToCoordinate` for an index outside the board */
export const INVALID_COORDINATE = "XX";

export const EMPTY: Bitboard = 0n;
export const FULL_BOARD: Bitboard = 0xffffffffffffffffn;

/**
 * An immutable position. Every transition in `rules.ts` returns a new
 * snapshot; none is ever modified after creation.
 */
export interface OthelloSnapshot {
  readonly discs: Readonly<Record<Color, Bitboard>>;
  /** The colour whose turn it is */
  readonly activeColor: Color;
  /** Number of consecutive passes (game ends at 2) */
  readonly consecutivePasses: number;
  /** Diagnostic only; not read by the rules */
  readonly lastMove: LastMove;
}

export function opponentOf(color: Color): Color {
  return color === "B" ? "W" : "B";
}

/** Single-cell mask */
export function bit(index: number): Bitboard {
  return 1n << BigInt(index);
}

export function hasCell(mask: Bitboard, index: number): boolean {
  return (mask & bit(index)) !== 0n;
}

/** Population count */
export function count(mask: Bitboard): number {
  let n = 0;
  let rest = mask;
  while (rest !== 0n) {
    rest &= rest - 1n;
    n++;
  }
  return n;
}

/** Indices of the set cells, ascending */
export function squares(mask: Bitboard): number[] {
  const result: number[] = [];
  for (let i = 0; i < CELL_COUNT && mask >> BigInt(i) !== 0n; i++) {
    if (hasCell(mask, i)) result.push(i);
  }
  return result;
}

export function maskOf(indices: Iterable<number>): Bitboard {
  let mask = EMPTY;
  for (const i of indices) mask |= bit(i);
  return mask;
}

export function isValidIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < CELL_COUNT;
}

/**
 * Parse "D3" / "d3" into a cell index. Anything that is not a file A-H
 * followed by a rank 1-8 yields `NOT_FOUND`.
 */
export function coordinateToIndex(text: string): number {
  const trimmed = text.trim().toUpperCase();
  if (trimmed.length !== 2) return NOT_FOUND;

  const col = trimmed.charCodeAt(0) - "A".charCodeAt(0);
  const row = trimmed.charCodeAt(1) - "1".charCodeAt(0);

  if (col < 0 || col >= BOARD_SIZE || row < 0 || row >= BOARD_SIZE) {
    return NOT_FOUND;
  }
  return row * BOARD_SIZE + col;
}

/** Inverse of `coordinateToIndex`: 0 → "A1", 63 → "H8" */
export function indexToCoordinate(index: number): string {
  if (!isValidIndex(index)) return INVALID_COORDINATE;
  const file = String.fromCharCode("A".charCodeAt(0) + (index % BOARD_SIZE));
  const rank = Math.floor(index / BOARD_SIZE) + 1;
  return `${file}${rank}`;
}

/** The standard start: Black on D4 and E5, White on E4 and D5, Black to move */
export function initialSnapshot(): OthelloSnapshot {
  return freeze({
    discs: {
      B: bit(27) | bit(36),
      W: bit(28) | bit(35),
    },
    activeColor: "B",
    consecutivePasses: 0,
    lastMove: "start",
  });
}

export interface SnapshotFields {
  black: Iterable<number> | Bitboard;
  white: Iterable<number> | Bitboard;
  activeColor?: Color;
  consecutivePasses?: number;
  lastMove?: LastMove;
}

/**
 * Build a position by hand. Throws GAME_INVALID_STATE when the discs overlap,
 * fall outside the board, or total fewer than 4.
 */
export function createSnapshot(fields: SnapshotFields): OthelloSnapshot {
  const black = toMask(fields.black);
  const white = toMask(fields.white);
  const consecutivePasses = fields.consecutivePasses ?? 0;

  if ((black & white) !== 0n) {
    throw invalidState("Black and white discs overlap", {
      cells: squares(black & white),
    });
  }
  if (((black | white) & ~FULL_BOARD) !== 0n) {
    throw invalidState("Discs outside the 64-cell board");
  }
  const total = count(black) + count(white);
  if (total < 4) {
    throw invalidState(`A position holds at least 4 discs, got ${total}`);
  }
  if (!Number.isInteger(consecutivePasses) || consecutivePasses < 0) {
    throw invalidState("consecutivePasses must be a non-negative integer", {
      consecutivePasses,
    });
  }

  return freeze({
    discs: { B: black, W: white },
    activeColor: fields.activeColor ?? "B",
    consecutivePasses,
    lastMove: fields.lastMove ?? "start",
  });
}

/** Count discs of each color on the board */
export function countDiscs(snapshot: OthelloSnapshot): { B: number; W: number } {
  return { B: count(snapshot.discs.B), W: count(snapshot.discs.W) };
}

export function occupied(snapshot: OthelloSnapshot): Bitboard {
  return snapshot.discs.B | snapshot.discs.W;
}

/** Colour on a cell, or null when empty */
export function colorAt(snapshot: OthelloSnapshot, index: number): Color | null {
  if (hasCell(snapshot.discs.B, index)) return "B";
  if (hasCell(snapshot.discs.W, index)) return "W";
  return null;
}

export function freeze(snapshot: OthelloSnapshot): OthelloSnapshot {
  Object.freeze(snapshot.discs);
  return Object.freeze(snapshot);
}

function toMask(cells: Iterable<number> | Bitboard): Bitboard {
  if (typeof cells === "bigint") return cells;
  const list = [...cells];
  for (const i of list) {
    if (!isValidIndex(i)) {
      throw invalidState(`Cell index ${i} is outside the board`, { index: i });
    }
  }
  return maskOf(list);
}

function invalidState(
  message: string,
  context: Record<string, unknown> = {}
): GameError {
  return new GameError(GameErrorCode.GAME_INVALID_STATE, message, context);
}
