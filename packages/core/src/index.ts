export * from "./types/game";
export { GameError, GameErrorCode, isGameError } from "./errors";
export type { GameErrorJSON } from "./errors";
