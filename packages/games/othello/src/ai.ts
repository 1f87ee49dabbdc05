import type { GameAI } from "@flipside/engine";
import type { OthelloSnapshot } from "./state";
import { passAction, placeAction } from "./actions";
import type { OthelloAction } from "./actions";
import { PASS, findBestMove } from "./search";

/** Fixed-depth alpha-beta player */
export const OthelloAI: GameAI<OthelloSnapshot, OthelloAction> = {
  chooseAction(snapshot: OthelloSnapshot, depth: number): OthelloAction {
    const move = findBestMove(snapshot, depth);
    return move === PASS ? passAction() : placeAction(move);
  },
};
