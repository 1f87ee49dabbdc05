export { MatchOrchestrator } from "./MatchOrchestrator";
export type {
  MatchOrchestratorOptions,
  SubmitResult,
} from "./MatchOrchestrator";
export type {
  IGameModule,
  GameAI,
  GameUISpec,
  PieceDisplay,
} from "./interfaces/IGameModule";
