import { EMPTY, NOT_FOUND, coordinateToIndex, hasCell } from "@flipside/game-othello";
import type { Bitboard } from "@flipside/game-othello";

/** One line of player input, classified. Parsing never throws. */
export type PlayerCommand =
  | { type: "move"; index: number }
  | { type: "pass" }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "hint" }
  | { type: "quit" }
  | { type: "help" }
  | { type: "invalid"; message: string };

export const HELP_TEXT = [
  "Commands:",
  "  MOVE D3 (or just D3)  place a disc",
  "  PASS                  pass when you have no legal move",
  "  UNDO / REDO           step back or forward through your moves",
  "  HINT                  ask the engine for a move",
  "  HELP                  show this list",
  "  QUIT                  leave the game",
].join("\n");

/**
 * Classify `input` against the mover's legal moves. Keywords are
 * case-insensitive; a bare coordinate is a move.
 */
export function parseCommand(input: string, legal: Bitboard): PlayerCommand {
  const parts = input.trim().split(/\s+/);
  const first = parts[0];
  const second: string | undefined = parts[1];
  const token = first.toLowerCase();

  switch (token) {
    case "quit":
    case "exit":
      return { type: "quit" };
    case "undo":
      return { type: "undo" };
    case "redo":
      return { type: "redo" };
    case "hint":
      return { type: "hint" };
    case "help":
    case "?":
      return { type: "help" };
    case "pass":
      if (legal !== EMPTY) {
        return { type: "invalid", message: "Cannot pass: you still have a legal move." };
      }
      return { type: "pass" };
    case "move":
      if (second === undefined) {
        return { type: "invalid", message: "MOVE needs a coordinate (e.g. MOVE D3)." };
      }
      return parseMove(second, legal);
    case "":
      return { type: "invalid", message: "Enter a command. Type HELP for the list." };
  }

  if (coordinateToIndex(first) !== NOT_FOUND) {
    return parseMove(first, legal);
  }
  return {
    type: "invalid",
    message: "Unknown command. Try MOVE D3, UNDO, REDO, HINT, PASS or QUIT.",
  };
}

function parseMove(coord: string, legal: Bitboard): PlayerCommand {
  const index = coordinateToIndex(coord);
  if (index === NOT_FOUND) {
    return {
      type: "invalid",
      message: `${coord} is not a valid coordinate. Use A1-H8 (e.g. D3).`,
    };
  }
  if (!hasCell(legal, index)) {
    return {
      type: "invalid",
      message: `${coord.toUpperCase()} is not a legal move. Try a cell marked ·.`,
    };
  }
  return { type: "move", index };
}
