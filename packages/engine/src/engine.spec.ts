import { strict as assert } from "assert";
import { GameError, GameErrorCode } from "@flipside/core";
import type { GameConfig, Outcome } from "@flipside/core";
import { MatchOrchestrator } from "./MatchOrchestrator";
import type { IGameModule, GameAI } from "./interfaces/IGameModule";

// Inline a minimal tic-tac-toe module for testing (avoids circular workspace dep)
type Mark = "X" | "O";
type CellValue = Mark | "";

interface TicTacToeState {
  board: CellValue[];
  toMove: Mark;
}

interface PlaceAction {
  type: "place";
  data: { position: number };
}

const WIN_LINES = [
  [0, 1, 2], [3, 4, 5], [6, 7, 8],
  [0, 3, 6], [1, 4, 7], [2, 5, 8],
  [0, 4, 8], [2, 4, 6],
];

function checkWinner(board: CellValue[]): CellValue {
  for (const [a, b, c] of WIN_LINES) {
    if (board[a] !== "" && board[a] === board[b] && board[b] === board[c]) {
      return board[a];
    }
  }
  return "";
}

function place(position: number): PlaceAction {
  return { type: "place", data: { position } };
}

const TestTicTacToe: IGameModule<TicTacToeState, PlaceAction> = {
  gameId: "tictactoe",
  name: "Tic-Tac-Toe",
  description: "Test game",
  sides: ["X", "O"],

  init(_config: GameConfig): TicTacToeState {
    return { board: ["", "", "", "", "", "", "", "", ""], toMove: "X" };
  },

  sideToMove(state) {
    return state.toMove;
  },

  validateAction(state, action) {
    if (action.type !== "place") return false;
    const pos = action.data.position;
    if (pos < 0 || pos > 8) return false;
    return state.board[pos] === "";
  },

  applyAction(state, action) {
    const board = [...state.board];
    board[action.data.position] = state.toMove;
    return { board, toMove: state.toMove === "X" ? "O" : "X" };
  },

  isTerminal(state) {
    return checkWinner(state.board) !== "" || state.board.every((c) => c !== "");
  },

  getOutcome(state): Outcome {
    const w = checkWinner(state.board);
    if (w !== "") {
      return {
        winner: w,
        draw: false,
        scores: { X: w === "X" ? 1 : 0, O: w === "O" ? 1 : 0 },
        reason: "three_in_a_row",
      };
    }
    if (state.board.every((c) => c !== "")) {
      return { winner: null, draw: true, scores: { X: 0.5, O: 0.5 }, reason: "board_full" };
    }
    return { winner: null, draw: false, scores: {}, reason: "game_in_progress" };
  },

  getLegalActions(state) {
    const actions: PlaceAction[] = [];
    for (let i = 0; i < 9; i++) {
      if (state.board[i] === "") actions.push(place(i));
    }
    return actions;
  },
};

// Always takes the lowest free cell; records the depth it was asked for
class FirstFreeAI implements GameAI<TicTacToeState, PlaceAction> {
  depths: number[] = [];

  chooseAction(state: TicTacToeState, depth: number): PlaceAction {
    this.depths.push(depth);
    return place(state.board.indexOf(""));
  }
}

describe("MatchOrchestrator", () => {
  it("should orchestrate X winning with top row", () => {
    const orch = new MatchOrchestrator({ game: TestTicTacToe });

    // X: 0, O: 3, X: 1, O: 4, X: 2 (top row win)
    orch.submitAction(place(0));
    orch.submitAction(place(3));
    orch.submitAction(place(1));
    orch.submitAction(place(4));
    const result = orch.submitAction(place(2));

    assert.equal(result.terminal, true);
    assert.equal(result.outcome?.winner, "X");
    assert.equal(result.outcome?.reason, "three_in_a_row");
    assert.equal(orch.isTerminal(), true);
    assert.equal(orch.getHistory().length, 6);
  });

  it("should reject invalid actions with a MOVE_INVALID error", () => {
    const orch = new MatchOrchestrator({ game: TestTicTacToe });
    orch.submitAction(place(4));

    assert.throws(
      () => orch.submitAction(place(4)),
      (err: unknown) =>
        err instanceof GameError && err.code === GameErrorCode.MOVE_INVALID
    );
    assert.equal(orch.getHistory().length, 2);
  });

  it("should reject moves after game is over", () => {
    const orch = new MatchOrchestrator({ game: TestTicTacToe });

    orch.submitAction(place(0));
    orch.submitAction(place(3));
    orch.submitAction(place(1));
    orch.submitAction(place(4));
    orch.submitAction(place(2)); // X wins

    assert.throws(() => orch.submitAction(place(5)), /Game is already over/);
  });

  it("should handle a draw game", () => {
    const orch = new MatchOrchestrator({ game: TestTicTacToe });

    // X O X / X X O / O X O (draw)
    for (const pos of [0, 1, 2, 5, 3, 6, 4, 8]) {
      orch.submitAction(place(pos));
    }
    const result = orch.submitAction(place(7));

    assert.equal(result.terminal, true);
    assert.equal(result.outcome?.draw, true);
    assert.equal(result.outcome?.reason, "board_full");
  });

  it("should list legal actions for the side to move", () => {
    const orch = new MatchOrchestrator({ game: TestTicTacToe });
    orch.submitAction(place(4));

    assert.equal(orch.getSideToMove(), "O");
    assert.equal(orch.getLegalActions().length, 8);
  });

  it("should reject a non-positive depth", () => {
    assert.throws(
      () => new MatchOrchestrator({ game: TestTicTacToe, depth: 0 }),
      (err: unknown) =>
        err instanceof GameError &&
        err.code === GameErrorCode.CONFIGURATION_ERROR
    );
  });

  it("should refuse AI sides without an AI", () => {
    assert.throws(
      () => new MatchOrchestrator({ game: TestTicTacToe, aiSides: ["O"] }),
      /without an AI/
    );
  });

  describe("AI turns and hints", () => {
    it("should hand the configured depth to the AI", () => {
      const ai = new FirstFreeAI();
      const orch = new MatchOrchestrator({ game: TestTicTacToe, ai, depth: 3 });

      assert.deepEqual(orch.hint(), place(0));
      assert.deepEqual(ai.depths, [3]);
      // a hint does not change the state
      assert.equal(orch.getHistory().length, 1);
    });

    it("should play the AI's choice", () => {
      const ai = new FirstFreeAI();
      const orch = new MatchOrchestrator({
        game: TestTicTacToe,
        ai,
        aiSides: ["O"],
      });

      orch.submitAction(place(4));
      assert.equal(orch.isAiTurn(), true);

      const result = orch.playAiTurn();
      assert.deepEqual(result.action, place(0));
      assert.equal(result.state.board[0], "O");
      assert.equal(orch.isAiTurn(), false);
    });

    it("should throw when hinting without an AI", () => {
      const orch = new MatchOrchestrator({ game: TestTicTacToe });
      assert.throws(
        () => orch.hint(),
        (err: unknown) =>
          err instanceof GameError &&
          err.code === GameErrorCode.AI_NOT_CONFIGURED
      );
    });
  });

  describe("undo / redo", () => {
    it("should return false at the start state", () => {
      const orch = new MatchOrchestrator({ game: TestTicTacToe });
      assert.equal(orch.undo(), false);
      assert.equal(orch.redo(), false);
    });

    it("should step back one ply without an AI", () => {
      const orch = new MatchOrchestrator({ game: TestTicTacToe });
      orch.submitAction(place(0));
      orch.submitAction(place(1));

      assert.equal(orch.undo(), true);
      assert.equal(orch.getHistory().length, 2);
      assert.equal(orch.getSideToMove(), "O");
    });

    it("should unwind two plies when the AI would be to move", () => {
      const orch = new MatchOrchestrator({
        game: TestTicTacToe,
        ai: new FirstFreeAI(),
        aiSides: ["O"],
      });
      orch.submitAction(place(4)); // X
      orch.playAiTurn(); // O takes 0
      orch.submitAction(place(8)); // X
      orch.playAiTurn(); // O takes 1

      assert.equal(orch.undo(), true);
      // the AI reply and X's move before it are both gone
      assert.equal(orch.getHistory().length, 3);
      assert.equal(orch.getSideToMove(), "X");
      assert.deepEqual(orch.getState().board, ["O", "", "", "", "X", "", "", "", ""]);
    });

    it("should redo what a paired undo removed", () => {
      const orch = new MatchOrchestrator({
        game: TestTicTacToe,
        ai: new FirstFreeAI(),
        aiSides: ["O"],
      });
      orch.submitAction(place(4));
      orch.playAiTurn();
      orch.submitAction(place(8));
      orch.playAiTurn();
      const before = orch.getState();

      orch.undo();
      orch.undo();
      assert.equal(orch.getHistory().length, 1);

      assert.equal(orch.redo(), true);
      assert.equal(orch.getHistory().length, 3);
      assert.equal(orch.redo(), true);
      assert.equal(orch.getState(), before);
      assert.equal(orch.redo(), false);
    });

    it("should clear redo after a new move", () => {
      const orch = new MatchOrchestrator({ game: TestTicTacToe });
      orch.submitAction(place(0));
      orch.undo();
      orch.submitAction(place(1));

      assert.equal(orch.redo(), false);
      assert.equal(orch.getState().board[1], "X");
    });
  });
});
