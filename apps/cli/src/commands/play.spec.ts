import { strict as assert } from "assert";
import { GameError, GameErrorCode } from "@flipside/core";
import type { Prompter } from "../prompter.js";
import { runPlay } from "./play.js";
import type { PlaySettings } from "./play.js";
import { runSelfPlay } from "./selfplay.js";
import { describeHint, replayMoves } from "./hint.js";
import { formatStatus } from "./format.js";

/** Answers prompts from a fixed script, then reports closed input */
function scripted(answers: string[]): Prompter & { prompts: string[] } {
  const queue = [...answers];
  const prompts: string[] = [];
  return {
    prompts,
    ask(prompt: string): Promise<string | null> {
      prompts.push(prompt);
      return Promise.resolve(queue.shift() ?? null);
    },
    close() {},
  };
}

const BLACK: PlaySettings = { depth: 1, color: "black", delayMs: 0 };

describe("play", () => {
  it("should give a hint, play, and undo both plies", async () => {
    const printed: string[] = [];
    const prompter = scripted(["hint", "e3", "undo", "quit"]);

    const match = await runPlay(BLACK, { prompter, print: (t) => printed.push(t) });

    assert.ok(printed.includes(">> Hint: E3"));
    assert.ok(printed.includes(">> Undone. Back to Black's turn."));
    assert.equal(printed[printed.length - 1], "\nThanks for playing!");
    assert.equal(prompter.prompts.length, 4);
    assert.equal(prompter.prompts[0], "\n● Black > ");
    assert.equal(match.getHistory().length, 1);
  });

  it("should redo a paired undo", async () => {
    const printed: string[] = [];
    const prompter = scripted(["e3", "undo", "redo", "quit"]);

    const match = await runPlay(BLACK, { prompter, print: (t) => printed.push(t) });

    assert.ok(printed.includes(">> Redone."));
    assert.equal(match.getHistory().length, 3);
  });

  it("should report bad input and keep going", async () => {
    const printed: string[] = [];
    const prompter = scripted(["pass", "move a1", "undo"]);

    const match = await runPlay(BLACK, { prompter, print: (t) => printed.push(t) });

    assert.ok(printed.includes(">> Error: Cannot pass: you still have a legal move."));
    assert.ok(printed.includes(">> Error: A1 is not a legal move. Try a cell marked ·."));
    assert.ok(
      printed.includes(">> Error: Nothing left to undo (only the start position remains)."),
    );
    assert.equal(match.getHistory().length, 1);
  });

  it("should stop when input closes", async () => {
    const printed: string[] = [];
    const match = await runPlay(BLACK, { prompter: scripted([]), print: (t) => printed.push(t) });

    assert.equal(match.getHistory().length, 1);
    assert.equal(printed[printed.length - 1], "\nThanks for playing!");
  });

  it("should let the AI open when the human plays white", async () => {
    const printed: string[] = [];
    const prompter = scripted(["quit"]);

    const match = await runPlay(
      { depth: 1, color: "white", delayMs: 0 },
      { prompter, print: (t) => printed.push(t) },
    );

    assert.ok(printed.includes(">> AI plays E3"));
    assert.equal(prompter.prompts[0], "\n○ White > ");
    assert.equal(match.getHistory().length, 2);
  });

  it("should say when undo hands the opening back to the AI", async () => {
    const printed: string[] = [];
    const prompter = scripted(["undo", "quit"]);

    const match = await runPlay(
      { depth: 1, color: "white", delayMs: 0 },
      { prompter, print: (t) => printed.push(t) },
    );

    assert.ok(printed.includes(">> Undone. Back to the start position; Black (AI) moves first."));
    assert.ok(!printed.includes(">> Undone. Back to White's turn."));
    assert.equal(printed.filter((line) => line === ">> AI plays E3").length, 2);
    assert.equal(prompter.prompts.length, 2);
    assert.equal(match.getHistory().length, 2);
  });
});

describe("selfplay", () => {
  it("should play a whole game and print the result", () => {
    const printed: string[] = [];
    const outcome = runSelfPlay(1, (t) => printed.push(t));

    assert.ok(["board_full", "double_pass", "wipeout", "no_moves"].includes(outcome.reason));
    assert.ok(printed[printed.length - 1].startsWith("=== GAME OVER: "));
    assert.equal(printed[0], " 1. Black: E3");

    const plies = printed.filter((line) => /^\s*\d+\. (Black|White): /.test(line));
    assert.equal(plies.length, printed.length - 2);
    assert.ok(outcome.scores.B + outcome.scores.W <= 64);
  });
});

describe("hint", () => {
  it("should score every opening move", () => {
    const lines = describeHint(replayMoves([], 1), false);
    assert.equal(lines[1], "Black: 2  White: 2\nTurn: Black\nLast move: -");
    assert.deepEqual(lines.slice(2), [
      "Best move: E3",
      "Score: 5",
      "  E3  5",
      "  F4  5",
      "  C5  5",
      "  D6  5",
      "Nodes: 4",
    ]);
  });

  it("should add the evaluation breakdown when verbose", () => {
    const lines = describeHint(replayMoves([], 1), true);
    assert.equal(
      lines[lines.length - 1],
      "Evaluation for Black: mobility 0, positional 0, discs 0, total 0",
    );
  });

  it("should replay moves for both colours", () => {
    const match = replayMoves(["e3", "F5"], 1);
    assert.equal(match.getHistory().length, 3);
    assert.equal(
      formatStatus(match.getState()),
      "Black: 3  White: 3\nTurn: Black\nLast move: F5",
    );
  });

  it("should reject text that is not a move", () => {
    assert.throws(
      () => replayMoves(["e3", "zz"], 1),
      (err: unknown) =>
        err instanceof GameError &&
        err.code === GameErrorCode.MOVE_INVALID &&
        err.message === 'Move 2 "zz" is neither a coordinate nor pass',
    );
  });

  it("should reject an illegal move or pass", () => {
    for (const moves of [["a1"], ["pass"]]) {
      assert.throws(
        () => replayMoves(moves, 1),
        (err: unknown) =>
          err instanceof GameError &&
          err.code === GameErrorCode.MOVE_ILLEGAL &&
          err.message === `Move 1 (${moves[0]}) is not legal for Black`,
      );
    }
  });

  it("should reject a depth of 0", () => {
    assert.throws(
      () => replayMoves([], 0),
      (err: unknown) =>
        err instanceof GameError && err.code === GameErrorCode.CONFIGURATION_ERROR,
    );
  });
});
