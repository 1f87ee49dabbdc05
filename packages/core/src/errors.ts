/**
 * Structured errors shared by every layer (rules, search, orchestration, CLI).
 *
 * Rule and search code throw a `GameError` when a caller breaks a contract
 * (an illegal move handed to `applyMove`, a non-positive search depth).
 * Expected negative results, such as an unparseable coordinate, are returned
 * as sentinels instead and never reach this module.
 */

export enum GameErrorCode {
  // Game state
  GAME_ALREADY_COMPLETED = "GAME_ALREADY_COMPLETED",
  GAME_INVALID_STATE = "GAME_INVALID_STATE",

  // Moves
  MOVE_INVALID = "MOVE_INVALID",
  MOVE_ILLEGAL = "MOVE_ILLEGAL",

  // AI
  AI_NOT_CONFIGURED = "AI_NOT_CONFIGURED",

  // Internal
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
}

export interface GameErrorJSON {
  error: true;
  code: GameErrorCode;
  message: string;
  context: Record<string, unknown>;
}

export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "GameError";
    this.code = code;
    this.context = context;

    Object.setPrototypeOf(this, GameError.prototype);
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
