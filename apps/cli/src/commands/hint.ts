import type { Command } from "commander";
import { GameError, GameErrorCode } from "@flipside/core";
import { MatchOrchestrator } from "@flipside/engine";
import {
  OthelloModule,
  OthelloUI,
  analyze,
  evaluateBreakdown,
} from "@flipside/game-othello";
import type { OthelloAction, OthelloSnapshot } from "@flipside/game-othello";
import { guarded } from "../errors.js";
import { initConfig, setCliOverride } from "../config/index.js";
import { formatOutcome, formatSearch, formatStatus } from "./format.js";

export function registerHintCommand(program: Command): void {
  program
    .command("hint")
    .description("Replay moves from the start position and ask the engine for the next one")
    .argument("[moves...]", "Moves such as E3 F5 or pass")
    .option("-d, --depth <plies>", "AI search depth (1-10)")
    .option("--verbose", "Show the evaluation breakdown")
    .action(
      guarded(async (moves: string[], opts: { depth?: string; verbose?: boolean }) => {
        if (opts.depth !== undefined) setCliOverride("depth", opts.depth);
        const config = await initConfig();
        const match = replayMoves(moves, config.depth);
        for (const line of describeHint(match, opts.verbose === true)) {
          console.log(line);
        }
      }),
    );
}

/** Apply `moves` in order from the start. Throws on the first bad one. */
export function replayMoves(
  moves: string[],
  depth: number,
): MatchOrchestrator<OthelloSnapshot, OthelloAction> {
  const match = new MatchOrchestrator({ game: OthelloModule, depth });

  moves.forEach((token, i) => {
    const action = OthelloUI.parseInput(token);
    if (action === null) {
      throw new GameError(
        GameErrorCode.MOVE_INVALID,
        `Move ${i + 1} "${token}" is neither a coordinate nor pass`,
        { token, position: i + 1 },
      );
    }
    const state = match.getState();
    if (!OthelloModule.validateAction(state, action)) {
      throw new GameError(
        GameErrorCode.MOVE_ILLEGAL,
        `Move ${i + 1} (${token}) is not legal for ${OthelloUI.sideLabel(state.activeColor)}`,
        { token, position: i + 1 },
      );
    }
    match.submitAction(action);
  });

  return match;
}

export function describeHint(
  match: MatchOrchestrator<OthelloSnapshot, OthelloAction>,
  verbose: boolean,
): string[] {
  const state = match.getState();
  const lines = [OthelloUI.renderBoard(state, match.getLegalActions()), formatStatus(state)];

  if (match.isTerminal()) {
    lines.push(formatOutcome(match.getOutcome()));
    return lines;
  }

  lines.push(...formatSearch(analyze(state, match.getDepth())));

  if (verbose) {
    const { mobility, positional, discs, total } = evaluateBreakdown(state, state.activeColor);
    lines.push(
      `Evaluation for ${OthelloUI.sideLabel(state.activeColor)}: ` +
        `mobility ${mobility}, positional ${positional}, discs ${discs}, total ${total}`,
    );
  }
  return lines;
}
