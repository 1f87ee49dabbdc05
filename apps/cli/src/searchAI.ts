import type { GameAI } from "@flipside/engine";
import {
  PASS,
  analyze,
  indexToCoordinate,
  passAction,
  placeAction,
} from "@flipside/game-othello";
import type { OthelloAction, OthelloSnapshot } from "@flipside/game-othello";
import type Logger from "bunyan";

/** Alpha-beta player that logs every search it runs */
export function createSearchAI(log: Logger): GameAI<OthelloSnapshot, OthelloAction> {
  return {
    chooseAction(snapshot: OthelloSnapshot, depth: number): OthelloAction {
      const started = Date.now();
      const result = analyze(snapshot, depth);
      const move = result.move === PASS ? PASS : indexToCoordinate(result.move);

      log.info(
        {
          depth,
          move,
          score: result.score,
          nodes: result.nodes,
          ms: Date.now() - started,
        },
        "search finished",
      );

      return result.move === PASS ? passAction() : placeAction(result.move);
    },
  };
}
