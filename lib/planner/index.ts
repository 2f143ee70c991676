/**
 * Public API of the activity planner.
 */

export * from "./types";
export { ok, err } from "./result";
export type { Result } from "./result";
export {
  GenerationFailure,
  NoParticipantsError,
  TimeoutError,
  describeError,
} from "./errors";
export type { GenerationFailureKind } from "./errors";
export { createLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";
export { DEFAULT_PLANNER_CONFIG, loadPlannerConfig } from "./config";
export type { PlannerConfig } from "./config";
export { createRequestContext, withTimeout } from "./context";
export type { RequestContext, RequestContextOptions } from "./context";
export { createOpenRouterClient } from "./openrouter";
export type { GenerationOutcome, GenerationResult, TextGenerationClient } from "./openrouter";

export { normalizeWorkItem, normalizeBatch, dependencyWaves } from "./normalizer";
export { parseResponse, createDefaultStrategies } from "./parsers/response-parser";
export type {
  ParseAttempt,
  ParseFailureReason,
  ParseHints,
  ParseOutcome,
  ParseStrategy,
  ReplayFn,
  StrategyName,
} from "./parsers/types";

export { ParticipantRepository, deriveProfile } from "./participants";
export { ParticipantInputSchema, PreferenceWeightsSchema, parsePreferenceWeights } from "./validation";
export type { ParticipantInput } from "./validation";

export { assignWorkItems } from "./assignment/engine";
export type { AssignmentOptions, AssignmentOutcome, AssignmentPath } from "./assignment/engine";
export { createTextOptimizer, validateOptimizerMapping } from "./assignment/optimizer";
export type {
  AssignmentOptimizer,
  OptimizerMapping,
  ValidationFailure,
  ValidationFailureReason,
} from "./assignment/optimizer";
export { scoreCompatibility, loadCap } from "./assignment/scoring";

export { ConsensusCoordinator, DEFAULT_CONSENSUS_CONFIG } from "./consensus/coordinator";
export type {
  ConsensusDecision,
  ConsensusFailure,
  ConsensusRequest,
  ConsensusState,
  DecisionType,
  ProposalCollaborator,
  ProposalCollaborators,
} from "./consensus/coordinator";
export { createTextCollaborators } from "./consensus/collaborators";

export { runPlanningPipeline, groupByStage } from "./pipeline";
export type {
  PlanningDependencies,
  PlanningRequest,
  PlanningResult,
  PlanningStatus,
  StageGroup,
} from "./pipeline";
