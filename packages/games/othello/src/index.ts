export { OthelloModule } from "./module";
export { OthelloAI } from "./ai";
export { OthelloUI } from "./ui";
export {
  BOARD_SIZE,
  CELL_COUNT,
  NOT_FOUND,
  INVALID_COORDINATE,
  EMPTY,
  bit,
  hasCell,
  count,
  squares,
  maskOf,
  opponentOf,
  colorAt,
  countDiscs,
  coordinateToIndex,
  indexToCoordinate,
  initialSnapshot,
  createSnapshot,
} from "./state";
export type {
  Bitboard,
  Color,
  LastMove,
  OthelloSnapshot,
  SnapshotFields,
} from "./state";
export {
  generateLegalMoves,
  legalMovesFor,
  getFlips,
  applyMove,
  applyPass,
  withActiveColor,
  getTerminalReason,
  terminalReasonOf,
  isTerminal,
  isGameOver,
  getWinner,
} from "./rules";
export type { TerminalReason } from "./rules";
export {
  evaluate,
  evaluateBreakdown,
  phaseMultiplier,
  positionalScore,
  MOBILITY_WEIGHT,
  POSITION_WEIGHTS,
} from "./evaluation";
export type { EvaluationBreakdown } from "./evaluation";
export {
  PASS,
  analyze,
  findBestMove,
  minimax,
  minimaxUnpruned,
} from "./search";
export type { RootScore, SearchMove, SearchResult, SearchStats } from "./search";
export {
  placeAction,
  passAction,
  isPlaceAction,
  isPassAction,
  getLegalActions,
} from "./actions";
export type { OthelloAction, PlaceAction, PassAction } from "./actions";
