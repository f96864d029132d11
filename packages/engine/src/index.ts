export { MatchOrchestrator } from "./MatchOrchestrator";
export type { MatchOrchestratorOptions, SubmitResult } from "./MatchOrchestrator";
export type { IGameModule, GameUISpec } from "./interfaces/IGameModule";
