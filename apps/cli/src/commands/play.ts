import { setTimeout as sleep } from "node:timers/promises";
import type { Command } from "commander";
import type { Outcome } from "@flipside/core";
import { MatchOrchestrator } from "@flipside/engine";
import {
  EMPTY,
  OthelloModule,
  OthelloUI,
  generateLegalMoves,
  isPassAction,
  opponentOf,
  passAction,
  placeAction,
} from "@flipside/game-othello";
import type { Color, OthelloAction, OthelloSnapshot } from "@flipside/game-othello";
import log from "../logger.js";
import { guarded } from "../errors.js";
import { createPrompter } from "../prompter.js";
import type { Prompter } from "../prompter.js";
import { createSearchAI } from "../searchAI.js";
import { initConfig, setCliOverride } from "../config/index.js";
import type { PlayerColor } from "../config/index.js";
import { HELP_TEXT, parseCommand } from "./parseCommand.js";
import { formatOutcome, formatStatus } from "./format.js";

export type OthelloMatch = MatchOrchestrator<OthelloSnapshot, OthelloAction>;

export interface PlaySettings {
  depth: number;
  color: PlayerColor;
  delayMs: number;
}

export interface PlayIO {
  prompter: Prompter;
  print: (text: string) => void;
}

interface PlayOptions {
  depth?: string;
  color?: string;
  delay?: string;
}

export function createMatch(depth: number, aiSides: Color[]): OthelloMatch {
  return new MatchOrchestrator({
    game: OthelloModule,
    ai: createSearchAI(log),
    aiSides,
    depth,
  });
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play against the engine in the terminal")
    .option("-d, --depth <plies>", "AI search depth (1-10)")
    .option("-c, --color <color>", "Your colour: black or white")
    .option("--delay <ms>", "Pause before each AI move")
    .action(
      guarded(async (opts: PlayOptions) => {
        if (opts.depth !== undefined) setCliOverride("depth", opts.depth);
        if (opts.color !== undefined) setCliOverride("color", opts.color);
        if (opts.delay !== undefined) setCliOverride("delayMs", opts.delay);

        const config = await initConfig();
        const prompter = createPrompter();
        try {
          await runPlay(config, { prompter, print: (text) => console.log(text) });
        } finally {
          prompter.close();
        }
      }),
    );
}

/**
 * Human against the engine until the game ends, the player quits, or input
 * closes. Returns the match so callers can inspect where it stopped.
 */
export async function runPlay(settings: PlaySettings, io: PlayIO): Promise<OthelloMatch> {
  const human: Color = settings.color === "black" ? "B" : "W";
  const ai = opponentOf(human);
  const match = createMatch(settings.depth, [ai]);

  io.print("======================================");
  io.print("OTHELLO");
  io.print("======================================");
  io.print(
    `You (${symbolOf(human)} ${OthelloUI.sideLabel(human)}) vs AI ` +
      `(${symbolOf(ai)} ${OthelloUI.sideLabel(ai)}, depth ${settings.depth})`,
  );
  io.print(`${OthelloUI.inputHint}. Commands: MOVE D3, UNDO, REDO, PASS, HINT, HELP, QUIT`);

  const outcome = await playLoop(match, human, settings, io);
  if (outcome) {
    log.info({ outcome }, "game finished");
  }
  io.print("\nThanks for playing!");
  return match;
}

async function playLoop(
  match: OthelloMatch,
  human: Color,
  settings: PlaySettings,
  io: PlayIO,
): Promise<Outcome | null> {
  const humanLabel = OthelloUI.sideLabel(human);

  for (;;) {
    const state = match.getState();

    if (match.isTerminal()) {
      io.print(OthelloUI.renderBoard(state));
      const outcome = match.getOutcome();
      io.print(`\n${formatOutcome(outcome)}`);
      return outcome;
    }

    if (match.isAiTurn()) {
      const label = OthelloUI.sideLabel(state.activeColor);
      io.print(OthelloUI.renderBoard(state));
      io.print(formatStatus(state));
      io.print(`\n${symbolOf(state.activeColor)} ${label} (AI) is thinking...`);
      if (settings.delayMs > 0) {
        await sleep(settings.delayMs);
      }
      const { action } = match.playAiTurn();
      io.print(
        isPassAction(action)
          ? `>> AI passes (${label} has no legal move).`
          : `>> AI plays ${OthelloUI.formatAction(action)}`,
      );
      continue;
    }

    const legal = generateLegalMoves(state);
    io.print(OthelloUI.renderBoard(state, match.getLegalActions()));
    io.print(formatStatus(state));

    if (legal === EMPTY) {
      io.print(`\n(${humanLabel} has no legal move. Passing automatically.)`);
      match.submitAction(passAction());
      continue;
    }

    const input = await io.prompter.ask(`\n${symbolOf(human)} ${humanLabel} > `);
    if (input === null) {
      return null;
    }

    const command = parseCommand(input, legal);
    switch (command.type) {
      case "move":
        match.submitAction(placeAction(command.index));
        break;
      case "pass":
        match.submitAction(passAction());
        io.print(`>> ${humanLabel} passes.`);
        break;
      case "undo":
        io.print(
          match.undo()
            ? describeUndo(match, humanLabel)
            : ">> Error: Nothing left to undo (only the start position remains).",
        );
        break;
      case "redo":
        io.print(match.redo() ? ">> Redone." : ">> Error: Nothing to redo.");
        break;
      case "hint":
        io.print(">> Searching for a hint...");
        io.print(`>> Hint: ${OthelloUI.formatAction(match.hint())}`);
        break;
      case "help":
        io.print(HELP_TEXT);
        break;
      case "quit":
        return null;
      case "invalid":
        io.print(`>> Error: ${command.message}`);
        break;
    }
  }
}

/** The AI's opening move can be taken back, leaving the AI to move again */
function describeUndo(match: OthelloMatch, humanLabel: string): string {
  if (match.isAiTurn()) {
    const aiLabel = OthelloUI.sideLabel(match.getState().activeColor);
    return `>> Undone. Back to the start position; ${aiLabel} (AI) moves first.`;
  }
  return `>> Undone. Back to ${humanLabel}'s turn.`;
}

function symbolOf(color: Color): string {
  return OthelloUI.pieces[color].symbol;
}
