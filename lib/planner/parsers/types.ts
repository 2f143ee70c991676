/**
 * Parse strategy contract.
 *
 * Each strategy turns raw generator text into drafts or reports why it
 * could not. Strategies never decide whether the chain advances; the
 * driver reads the result tag.
 */

import type { RequestContext } from "../context";
import type { GenerationFailure } from "../errors";
import type { Result } from "../result";
import type { WorkItem, WorkItemDraft } from "../types";

export type ParseFailureReason =
  | "no_blocks"
  | "missing_description"
  | "no_list_structure"
  | "replay_unavailable"
  | "replay_exhausted"
  | "replay_failed"
  | "no_prose_lines"
  | "strategy_error";

export type StrategyName =
  | "strict-field"
  | "tolerant-structural"
  | "schema-replay"
  | "minimal-line"
  | "canonical-fallback";

/** Re-requests the decomposition under the stricter template. */
export type ReplayFn = (ctx: RequestContext) => Promise<Result<string, GenerationFailure>>;

export interface ParseHints {
  replay?: ReplayFn;
  /** Batches longer than this are truncated */
  maxItems?: number;
}

export interface ParseInput {
  text: string;
  hints: ParseHints;
  ctx: RequestContext;
}

export type StrategyResult = Result<WorkItemDraft[], ParseFailureReason>;

export interface ParseStrategy {
  readonly name: StrategyName;
  readonly confidence: number;
  attempt(input: ParseInput): Promise<StrategyResult>;
}

export interface ParseAttempt {
  strategy: StrategyName;
  ok: boolean;
  reason?: ParseFailureReason;
  itemCount: number;
}

export interface ParseOutcome {
  items: WorkItem[];
  confidence: number;
  strategy: StrategyName;
  attempts: ParseAttempt[];
}
