import { GameError, GameErrorCode } from "@flipside/core";
import type { Action, Outcome, Side } from "@flipside/core";
import type { IGameModule, GameAI } from "./interfaces/IGameModule";

export interface MatchOrchestratorOptions<S, A extends Action> {
  game: IGameModule<S, A>;
  /** Move chooser for AI sides and hints */
  ai?: GameAI<S, A>;
  /** Sides played by the AI */
  aiSides?: Side[];
  /** Fixed search depth handed to the AI */
  depth?: number;
  settings?: Record<string, unknown>;
}

export interface SubmitResult<S> {
  state: S;
  terminal: boolean;
  outcome?: Outcome;
}

const DEFAULT_DEPTH = 5;

/**
 * Orchestrates a single match: validates moves, applies state transitions,
 * and owns the history of states used for undo and redo.
 */
export class MatchOrchestrator<S, A extends Action = Action> {
  private game: IGameModule<S, A>;
  private ai?: GameAI<S, A>;
  private aiSides: Set<Side>;
  private depth: number;
  private history: S[];
  private redoStack: S[] = [];

  constructor(opts: MatchOrchestratorOptions<S, A>) {
    this.game = opts.game;
    this.ai = opts.ai;
    this.aiSides = new Set(opts.aiSides ?? []);
    this.depth = opts.depth ?? DEFAULT_DEPTH;

    if (!Number.isInteger(this.depth) || this.depth < 1) {
      throw new GameError(
        GameErrorCode.CONFIGURATION_ERROR,
        `Search depth must be a positive integer, got ${this.depth}`,
        { depth: this.depth }
      );
    }
    if (this.aiSides.size > 0 && !this.ai) {
      throw new GameError(
        GameErrorCode.AI_NOT_CONFIGURED,
        "AI sides were given without an AI"
      );
    }

    const config = {
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    };
    this.history = [opts.game.init(config)];
  }

  getState(): S {
    return this.history[this.history.length - 1];
  }

  /** Every state from the start up to the current one */
  getHistory(): readonly S[] {
    return this.history;
  }

  getSideToMove(): Side {
    return this.game.sideToMove(this.getState());
  }

  getDepth(): number {
    return this.depth;
  }

  isAiTurn(): boolean {
    return !this.isTerminal() && this.aiSides.has(this.getSideToMove());
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.getState());
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.getState());
  }

  getLegalActions(): A[] {
    return this.game.getLegalActions(this.getState());
  }

  /**
   * Submit a move for the side to move. Returns the new state or throws if
   * the game is over or the action is not legal.
   */
  submitAction(action: A): SubmitResult<S> {
    if (this.isTerminal()) {
      throw new GameError(
        GameErrorCode.GAME_ALREADY_COMPLETED,
        "Game is already over"
      );
    }

    const current = this.getState();
    if (!this.game.validateAction(current, action)) {
      throw new GameError(GameErrorCode.MOVE_INVALID, "Invalid action", {
        action,
        side: this.game.sideToMove(current),
      });
    }

    const next = this.game.applyAction(current, action);
    this.history.push(next);
    this.redoStack = [];

    const terminal = this.game.isTerminal(next);
    return {
      state: next,
      terminal,
      outcome: terminal ? this.game.getOutcome(next) : undefined,
    };
  }

  /** The AI's choice for the side to move, without applying it. */
  hint(): A {
    return this.requireAi().chooseAction(this.getState(), this.depth);
  }

  /** Let the AI choose and play for the side to move. */
  playAiTurn(): { action: A } & SubmitResult<S> {
    const action = this.hint();
    return { action, ...this.submitAction(action) };
  }

  /**
   * Step back one state. When that lands on a turn the AI plays, step back
   * once more so a human gets their own turn back. Returns false at the
   * start state.
   */
  undo(): boolean {
    if (this.history.length <= 1) {
      return false;
    }

    this.popInto(this.redoStack);
    if (this.isAiTurn() && this.history.length > 1) {
      this.popInto(this.redoStack);
    }
    return true;
  }

  /** Re-apply the most recently undone step (both plies of a paired undo). */
  redo(): boolean {
    const restored = this.redoStack.pop();
    if (restored === undefined) {
      return false;
    }
    this.history.push(restored);

    // keep redo symmetric with the paired undo
    if (this.isAiTurn()) {
      const next = this.redoStack.pop();
      if (next !== undefined) this.history.push(next);
    }
    return true;
  }

  private popInto(stack: S[]): void {
    const popped = this.history.pop();
    if (popped !== undefined) stack.push(popped);
  }

  private requireAi(): GameAI<S, A> {
    if (!this.ai) {
      throw new GameError(
        GameErrorCode.AI_NOT_CONFIGURED,
        "No AI configured for this match"
      );
    }
    return this.ai;
  }
}
