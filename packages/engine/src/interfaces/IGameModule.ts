import type { GameConfig, Action, Outcome, Side } from "@flipside/core";

// ---------------------------------------------------------------------------
// Game UI specification, shipped by each game module for text rendering
// ---------------------------------------------------------------------------

export interface PieceDisplay {
  /** Unicode or ASCII character (e.g. "●") */
  symbol: string;
  /** Short text label (e.g. "B") */
  label: string;
}

/**
 * UI specification that each game module provides so that a controller can
 * render and drive any game generically.
 */
export interface GameUISpec<S, A extends Action = Action> {
  /** Map of piece identifiers to display info */
  pieces: Record<string, PieceDisplay>;

  /** Hint text shown to the side to move (e.g. "Enter position (e.g. D3) or pass") */
  inputHint: string;

  /** Render the board as text. `highlight` marks the given actions' targets. */
  renderBoard(state: S, highlight?: A[]): string;

  /** Render a one-line status string, or null if nothing to show. */
  renderStatus(state: S): string | null;

  /** Parse raw user input into an action, or return null if it is not one. */
  parseInput(raw: string): A | null;

  /** Format an action for move history (e.g. "D3"). */
  formatAction(action: A): string;

  /** Display label for a side (e.g. "Black"). */
  sideLabel(side: Side): string;
}

// ---------------------------------------------------------------------------
// Game module ABI
// ---------------------------------------------------------------------------

/**
 * The functions every game module implements.
 *
 * Every function must be deterministic given the same inputs and must not
 * mutate the state it is handed: a transition returns a new state.
 */
export interface IGameModule<S, A extends Action = Action> {
  /** Unique identifier for this game (e.g. "othello") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  /** Short description of the game */
  readonly description: string;

  /** Sides in turn order at the start of a game */
  readonly sides: readonly Side[];

  /** UI rendering specification. */
  readonly ui?: GameUISpec<S, A>;

  /** Create the start state */
  init(config: GameConfig): S;

  /** The side whose turn it is */
  sideToMove(state: S): Side;

  /** Check if an action is valid in the current state */
  validateAction(state: S, action: A): boolean;

  /** Apply a validated action and return the new state */
  applyAction(state: S, action: A): S;

  /** Check if the game has ended */
  isTerminal(state: S): boolean;

  /** Get the outcome of a state (reason "game_in_progress" while running) */
  getOutcome(state: S): Outcome;

  /** All legal actions for the side to move */
  getLegalActions(state: S): A[];
}

/**
 * A fixed-depth move chooser. Calls are synchronous and deterministic:
 * the same state and depth always yield the same action.
 */
export interface GameAI<S, A extends Action = Action> {
  chooseAction(state: S, depth: number): A;
}
