import { GameError, GameErrorCode } from "@flipside/core";
import type { GameConfig, Outcome } from "@flipside/core";
import type { IGameModule } from "@flipside/engine";
import { OthelloUI } from "./ui";
import { EMPTY, countDiscs, hasCell, initialSnapshot, isValidIndex } from "./state";
import type { OthelloSnapshot } from "./state";
import {
  applyMove,
  applyPass,
  generateLegalMoves,
  getWinner,
  isGameOver,
  terminalReasonOf,
} from "./rules";
import { isPlaceAction, isPassAction, getLegalActions } from "./actions";
import type { OthelloAction } from "./actions";

export const OthelloModule: IGameModule<OthelloSnapshot, OthelloAction> = {
  gameId: "othello",
  name: "Othello",
  description: "Place discs to outflank your opponent. Most discs wins.",
  sides: ["B", "W"],
  ui: OthelloUI,

  init(_config: GameConfig): OthelloSnapshot {
    return initialSnapshot();
  },

  sideToMove(snapshot: OthelloSnapshot): string {
    return snapshot.activeColor;
  },

  validateAction(snapshot: OthelloSnapshot, action: OthelloAction): boolean {
    if (isGameOver(snapshot)) {
      return false;
    }

    if (isPlaceAction(action)) {
      const { index } = action.data;
      return isValidIndex(index) && hasCell(generateLegalMoves(snapshot), index);
    }

    if (isPassAction(action)) {
      // Pass is only legal if the player has no legal placements
      return generateLegalMoves(snapshot) === EMPTY;
    }

    return false;
  },

  applyAction(snapshot: OthelloSnapshot, action: OthelloAction): OthelloSnapshot {
    const type: string = action.type;

    if (isPlaceAction(action)) {
      return applyMove(snapshot, action.data.index);
    }

    if (isPassAction(action)) {
      if (generateLegalMoves(snapshot) !== EMPTY) {
        throw new GameError(
          GameErrorCode.MOVE_INVALID,
          "Cannot pass while a legal move exists",
          { color: snapshot.activeColor }
        );
      }
      return applyPass(snapshot);
    }

    throw new GameError(GameErrorCode.MOVE_INVALID, "Invalid action type", { type });
  },

  isTerminal(snapshot: OthelloSnapshot): boolean {
    return isGameOver(snapshot);
  },

  getOutcome(snapshot: OthelloSnapshot): Outcome {
    const { B, W } = countDiscs(snapshot);
    const reason = terminalReasonOf(snapshot);

    if (reason === null) {
      return {
        winner: null,
        draw: false,
        scores: { B, W },
        reason: "game_in_progress",
      };
    }

    const winner = getWinner(snapshot);
    return {
      winner,
      draw: winner === null,
      scores: { B, W },
      reason,
    };
  },

  getLegalActions(snapshot: OthelloSnapshot): OthelloAction[] {
    return getLegalActions(snapshot);
  },
};
