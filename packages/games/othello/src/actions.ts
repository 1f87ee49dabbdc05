import type { Action } from "@flipside/core";
import type { OthelloSnapshot } from "./state";
import { squares } from "./state";
import { generateLegalMoves, isGameOver } from "./rules";

/** An Othello action: place a disc on cell `index` (0 = A1 … 63 = H8) */
export interface PlaceAction extends Action {
  type: "place";
  data: { index: number };
}

/** An Othello action: pass (when no legal placements exist) */
export interface PassAction extends Action {
  type: "pass";
  data: Record<string, never>;
}

export type OthelloAction = PlaceAction | PassAction;

export function placeAction(index: number): PlaceAction {
  return { type: "place", data: { index } };
}

export function passAction(): PassAction {
  return { type: "pass", data: {} };
}

export function isPlaceAction(action: Action): action is PlaceAction {
  return action.type === "place" && typeof action.data.index === "number";
}

export function isPassAction(action: Action): action is PassAction {
  return action.type === "pass";
}

/**
 * Placements for the side to move in ascending cell order; a lone pass when
 * there are none; nothing once the game is over.
 */
export function getLegalActions(snapshot: OthelloSnapshot): OthelloAction[] {
  if (isGameOver(snapshot)) {
    return [];
  }

  const actions: OthelloAction[] = squares(generateLegalMoves(snapshot)).map(placeAction);

  // If no placements available, the only legal action is to pass
  if (actions.length === 0) {
    return [passAction()];
  }

  return actions;
}
