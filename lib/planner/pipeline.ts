/**
 * Planning pipeline.
 *
 * Stage 1 (Consensus): optional; structural proposal, then the two reviews of it
 * Stage 2 (Generate):  build the decomposition prompt and call the text client
 * Stage 3 (Parse):     strategy chain with a one-shot schema replay, then normalize
 * Stage 4 (Assign):    optimizer or greedy distribution to participants
 *
 * Every stage degrades instead of failing; only an empty participant list
 * aborts the run.
 */

import { DEFAULT_PLANNER_CONFIG } from "./config";
import type { PlannerConfig } from "./config";
import { createRequestContext, withTimeout } from "./context";
import type { RequestContext } from "./context";
import { describeError } from "./errors";
import type { GenerationFailureKind } from "./errors";
import { dependencyWaves } from "./normalizer";
import { createOpenRouterClient } from "./openrouter";
import type { TextGenerationClient } from "./openrouter";
import { ParticipantRepository } from "./participants";
import { parseResponse } from "./parsers/response-parser";
import type { ParseAttempt, ReplayFn, StrategyName } from "./parsers/types";
import { buildDecompositionPrompt, buildSchemaReplayPrompt } from "./prompts";
import { err, ok } from "./result";
import type { Result } from "./result";
import { assignWorkItems } from "./assignment/engine";
import type { AssignmentPath } from "./assignment/engine";
import type { AssignmentOptimizer } from "./assignment/optimizer";
import { ConsensusCoordinator } from "./consensus/coordinator";
import type { ConsensusDecision, ProposalCollaborators } from "./consensus/coordinator";
import { createTextCollaborators } from "./consensus/collaborators";
import type {
  AssignmentRecord,
  ExampleRetriever,
  ParticipantProfile,
  PreferenceWeights,
  RankedExample,
  WorkItem,
} from "./types";
import { parsePreferenceWeights } from "./validation";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlanningRequest {
  intent: string;
  /** Validated; omitted weights default to 0.5 */
  weights?: unknown;
}

export interface PlanningDependencies {
  /** Defaults to an OpenRouter client for `config.model` */
  client?: TextGenerationClient;
  participants: ParticipantRepository | readonly ParticipantProfile[];
  config?: PlannerConfig;
  retriever?: ExampleRetriever;
  optimizer?: AssignmentOptimizer;
  /** Defaults to text-backed proposers over `client` */
  collaborators?: ProposalCollaborators;
  ctx?: RequestContext;
}

export interface StageGroup {
  stage: string;
  itemIds: string[];
}

export type PlanningStatus = "completed" | "aborted";

export interface PlanningResult {
  requestId: string;
  status: PlanningStatus;
  items: WorkItem[];
  record: AssignmentRecord;
  stages: StageGroup[];
  waves: string[][];
  consensus: ConsensusDecision | null;
  parse: {
    strategy: StrategyName;
    confidence: number;
    attempts: ParseAttempt[];
  } | null;
  assignment: {
    path: AssignmentPath;
    overflowed: boolean;
    notes: string[];
  } | null;
  generationFailure: GenerationFailureKind | null;
  /** True whenever any stage fell back from its preferred path */
  degraded: boolean;
  error?: string;
}

/** Parses at or above this confidence count as structured output. */
export const STRUCTURED_CONFIDENCE = 0.75;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Items per stage, stages in first-seen order. */
export function groupByStage(items: WorkItem[]): StageGroup[] {
  const groups = new Map<string, string[]>();
  for (const item of items) {
    const list = groups.get(item.stage) ?? [];
    list.push(item.id);
    groups.set(item.stage, list);
  }
  return [...groups].map(([stage, itemIds]) => ({ stage, itemIds }));
}

function participantList(
  participants: ParticipantRepository | readonly ParticipantProfile[]
): readonly ParticipantProfile[] {
  return participants instanceof ParticipantRepository ? participants.all() : participants;
}

async function retrieveExamples(
  retriever: ExampleRetriever | undefined,
  intent: string,
  config: PlannerConfig,
  ctx: RequestContext
): Promise<RankedExample[]> {
  if (!retriever || config.exampleCount === 0) return [];
  try {
    return await withTimeout(
      retriever.findSimilar(intent, config.exampleCount),
      ctx.timeoutMs,
      "example retrieval"
    );
  } catch (error) {
    ctx.logger.child("examples").warn(`Retrieval failed, continuing without examples: ${describeError(error)}`);
    return [];
  }
}

function createReplay(
  client: TextGenerationClient,
  intent: string,
  config: PlannerConfig
): ReplayFn {
  return async (ctx) => {
    const prompt = buildSchemaReplayPrompt(intent, config.maxItems);
    const generated = await client.generate(prompt, ctx.maxTokens, ctx.timeoutMs);
    return generated.ok ? ok(generated.value.content) : err(generated.error);
  };
}

function abort(
  ctx: RequestContext,
  message: string,
  partial: Partial<PlanningResult> = {}
): PlanningResult {
  ctx.logger.error(`Planning aborted: ${message}`);
  return {
    requestId: ctx.requestId,
    status: "aborted",
    items: [],
    record: {},
    stages: [],
    waves: [],
    consensus: null,
    parse: null,
    assignment: null,
    generationFailure: null,
    degraded: true,
    ...partial,
    error: message,
  };
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

export async function stageConsensus(
  intent: string,
  weights: PreferenceWeights,
  participants: readonly ParticipantProfile[],
  collaborators: ProposalCollaborators,
  ctx: RequestContext
): Promise<ConsensusDecision> {
  const coordinator = new ConsensusCoordinator(collaborators);
  return coordinator.decide({ intent, weights, participants }, ctx);
}

export async function stageGenerate(
  prompt: string,
  client: TextGenerationClient,
  ctx: RequestContext
): Promise<Result<string, GenerationFailureKind>> {
  const generated = await client.generate(prompt, ctx.maxTokens, ctx.timeoutMs);
  if (generated.ok) return ok(generated.value.content);
  ctx.logger
    .child("generate")
    .warn(`Decomposition failed (${generated.error.kind}); parsing continues on empty text`);
  return err(generated.error.kind);
}

// ---------------------------------------------------------------------------
// Full pipeline
// ---------------------------------------------------------------------------

export async function runPlanningPipeline(
  request: PlanningRequest,
  deps: PlanningDependencies
): Promise<PlanningResult> {
  const config = deps.config ?? DEFAULT_PLANNER_CONFIG;
  const ctx =
    deps.ctx ??
    createRequestContext({
      timeoutMs: config.timeoutMs,
      maxTokens: config.maxTokens,
      logLevel: config.logLevel,
    });

  const intent = request.intent.trim();
  if (!intent) return abort(ctx, "Activity intent is empty");

  const weightsResult = parsePreferenceWeights(request.weights);
  if (!weightsResult.ok) return abort(ctx, weightsResult.error);
  const weights = weightsResult.value;

  const participants = participantList(deps.participants);
  const client = deps.client ?? createOpenRouterClient(config.model);
  ctx.logger.info(`Planning "${intent.slice(0, 60)}" for ${participants.length} participants`);

  // Stage 1
  const consensus = config.useConsensus
    ? await stageConsensus(
        intent,
        weights,
        participants,
        deps.collaborators ?? createTextCollaborators(client),
        ctx
      )
    : null;

  // Stage 2
  const examples = await retrieveExamples(deps.retriever, intent, config, ctx);
  const prompt = buildDecompositionPrompt({
    intent,
    weights,
    structure: consensus?.structure,
    adaptations: consensus?.adaptationRequirements,
    adjustments: consensus?.feasibilityAdjustments,
    examples,
    maxItems: config.maxItems,
  });
  const generated = await stageGenerate(prompt, client, ctx);
  const generationFailure = generated.ok ? null : generated.error;

  // Stage 3
  const parsed = await parseResponse(
    generated.ok ? generated.value : "",
    { replay: createReplay(client, intent, config), maxItems: config.maxItems },
    ctx
  );
  const parse = {
    strategy: parsed.strategy,
    confidence: parsed.confidence,
    attempts: parsed.attempts,
  };
  const items = parsed.items;
  const stages = groupByStage(items);
  const { waves } = dependencyWaves(items);

  // Stage 4
  const assigned = await assignWorkItems(items, participants, weights, {
    optimizer: deps.optimizer,
    ctx,
  });
  if (!assigned.ok) {
    return abort(ctx, assigned.error.message, {
      items,
      stages,
      waves,
      consensus,
      parse,
      generationFailure,
    });
  }

  const outcome = assigned.value;
  const degraded =
    generationFailure !== null ||
    parsed.confidence < STRUCTURED_CONFIDENCE ||
    consensus?.state === "fallback" ||
    outcome.degraded ||
    outcome.overflowed;

  ctx.logger.info(
    `Planned ${items.length} items via ${parsed.strategy}, assigned via ${outcome.path}${degraded ? " (degraded)" : ""}`
  );

  return {
    requestId: ctx.requestId,
    status: "completed",
    items,
    record: outcome.record,
    stages,
    waves,
    consensus,
    parse,
    assignment: { path: outcome.path, overflowed: outcome.overflowed, notes: outcome.notes },
    generationFailure,
    degraded,
  };
}
