import type { Command } from "commander";
import type { Outcome } from "@flipside/core";
import { OthelloUI } from "@flipside/game-othello";
import { guarded } from "../errors.js";
import { initConfig, setCliOverride } from "../config/index.js";
import { createMatch } from "./play.js";
import { formatOutcome } from "./format.js";

export function registerSelfPlayCommand(program: Command): void {
  program
    .command("selfplay")
    .description("Let the engine play both colours to the end")
    .option("-d, --depth <plies>", "AI search depth (1-10)")
    .action(
      guarded(async (opts: { depth?: string }) => {
        if (opts.depth !== undefined) setCliOverride("depth", opts.depth);
        const config = await initConfig();
        runSelfPlay(config.depth, (text) => console.log(text));
      }),
    );
}

/** Play the engine against itself, one line per ply */
export function runSelfPlay(depth: number, print: (text: string) => void): Outcome {
  const match = createMatch(depth, ["B", "W"]);

  let ply = 0;
  while (!match.isTerminal()) {
    const side = match.getSideToMove();
    const { action } = match.playAiTurn();
    ply++;
    print(`${String(ply).padStart(2)}. ${OthelloUI.sideLabel(side)}: ${OthelloUI.formatAction(action)}`);
  }

  const outcome = match.getOutcome();
  print(OthelloUI.renderBoard(match.getState()));
  print(formatOutcome(outcome));
  return outcome;
}
