import type { Outcome } from "@flipside/core";
import { OthelloUI, indexToCoordinate } from "@flipside/game-othello";
import type { LastMove, OthelloSnapshot, SearchResult } from "@flipside/game-othello";

export function formatOutcome(outcome: Outcome): string {
  const black = outcome.scores.B;
  const white = outcome.scores.W;
  if (outcome.winner === "B") {
    return `=== GAME OVER: Black (●) wins! (${black} - ${white}) ===`;
  }
  if (outcome.winner === "W") {
    return `=== GAME OVER: White (○) wins! (${white} - ${black}) ===`;
  }
  return `=== GAME OVER: Draw! (${black} - ${white}) ===`;
}

export function formatLastMove(lastMove: LastMove): string {
  if (lastMove === "start") return "-";
  if (lastMove === "pass") return "pass";
  return indexToCoordinate(lastMove);
}

/** Disc counts, side to move and last move */
export function formatStatus(snapshot: OthelloSnapshot): string {
  return [
    OthelloUI.renderStatus(snapshot),
    `Turn: ${OthelloUI.sideLabel(snapshot.activeColor)}`,
    `Last move: ${formatLastMove(snapshot.lastMove)}`,
  ].join("\n");
}

export function formatSearch(result: SearchResult): string[] {
  const best = typeof result.move === "number" ? indexToCoordinate(result.move) : "pass";
  const lines = [`Best move: ${best}`];
  if (result.score !== null) {
    lines.push(`Score: ${result.score}`);
  }
  for (const entry of result.scores) {
    lines.push(`  ${indexToCoordinate(entry.move)}  ${entry.score}`);
  }
  lines.push(`Nodes: ${result.nodes}`);
  return lines;
}
