import type { GameUISpec } from "@flipside/engine";
import type { OthelloSnapshot } from "./state";
import {
  BOARD_SIZE,
  NOT_FOUND,
  colorAt,
  coordinateToIndex,
  countDiscs,
  indexToCoordinate,
} from "./state";
import { isPlaceAction, passAction, placeAction } from "./actions";
import type { OthelloAction } from "./actions";

export const OthelloUI: GameUISpec<OthelloSnapshot, OthelloAction> = {
  pieces: {
    B: { symbol: "●", label: "B" },
    W: { symbol: "○", label: "W" },
  },

  inputHint: "Enter position (e.g. D3) or pass",

  renderBoard(snapshot: OthelloSnapshot, highlight: OthelloAction[] = []): string {
    const marked = new Set<number>();
    for (const action of highlight) {
      if (isPlaceAction(action)) marked.add(action.data.index);
    }

    const colLetters = "ABCDEFGH";
    const lines: string[] = [];

    // Column header
    lines.push("    " + colLetters.split("").join("   "));
    // Top border
    lines.push("  ┌" + "───┬".repeat(BOARD_SIZE - 1) + "───┐");

    for (let r = 0; r < BOARD_SIZE; r++) {
      const cells: string[] = [];
      for (let c = 0; c < BOARD_SIZE; c++) {
        const index = r * BOARD_SIZE + c;
        const color = colorAt(snapshot, index);
        if (color === "B") {
          cells.push(" ● ");
        } else if (color === "W") {
          cells.push(" ○ ");
        } else if (marked.has(index)) {
          cells.push(" · ");
        } else {
          cells.push("   ");
        }
      }
      lines.push(`${r + 1} │${cells.join("│")}│`);

      if (r < BOARD_SIZE - 1) {
        lines.push("  ├" + "───┼".repeat(BOARD_SIZE - 1) + "───┤");
      }
    }

    // Bottom border
    lines.push("  └" + "───┴".repeat(BOARD_SIZE - 1) + "───┘");

    return lines.join("\n");
  },

  renderStatus(snapshot: OthelloSnapshot): string {
    const { B, W } = countDiscs(snapshot);
    return `Black: ${B}  White: ${W}`;
  },

  parseInput(raw: string): OthelloAction | null {
    const trimmed = raw.trim().toLowerCase();

    if (trimmed === "pass") {
      return passAction();
    }

    // Parse coordinate like "d3" → index 19
    const index = coordinateToIndex(trimmed);
    return index === NOT_FOUND ? null : placeAction(index);
  },

  formatAction(action: OthelloAction): string {
    if (isPlaceAction(action)) {
      return indexToCoordinate(action.data.index);
    }
    return "pass";
  },

  sideLabel(side: string): string {
    if (side === "B") return "Black";
    if (side === "W") return "White";
    return "?";
  },
};
