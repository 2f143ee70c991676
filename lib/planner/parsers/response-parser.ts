/**
 * Response parser: drives the strategy chain over raw generator text.
 *
 * Strategies run in fixed priority order. The first one that yields a
 * non-empty list in which every draft has a description wins; its drafts
 * are truncated to `hints.maxItems` and normalized. Exceptions never leave
 * the chain: a throwing strategy is recorded as `strategy_error` and the
 * chain moves on.
 */

import { createRequestContext } from "../context";
import type { RequestContext } from "../context";
import { describeError } from "../errors";
import { normalizeBatch } from "../normalizer";
import { err } from "../result";
import type { WorkItemDraft } from "../types";
import { canonicalDrafts, canonicalFallbackStrategy } from "./canonical-fallback";
import { minimalLineStrategy } from "./minimal-line";
import { SchemaReplayStrategy } from "./schema-replay";
import { strictFieldStrategy } from "./strict-field";
import { tolerantStructuralStrategy } from "./tolerant-structural";
import type {
  ParseAttempt,
  ParseFailureReason,
  ParseHints,
  ParseOutcome,
  ParseStrategy,
  StrategyResult,
} from "./types";

/** A fresh chain per parse, so the replay budget is per parse. */
export function createDefaultStrategies(): ParseStrategy[] {
  return [
    strictFieldStrategy,
    tolerantStructuralStrategy,
    new SchemaReplayStrategy(),
    minimalLineStrategy,
    canonicalFallbackStrategy,
  ];
}

function rejectReason(drafts: WorkItemDraft[]): ParseFailureReason | null {
  if (drafts.length === 0) return "no_blocks";
  if (drafts.some((draft) => !draft.description.trim())) return "missing_description";
  return null;
}

export async function parseResponse(
  rawText: string,
  hints: ParseHints = {},
  ctx: RequestContext = createRequestContext(),
  strategies: ParseStrategy[] = createDefaultStrategies()
): Promise<ParseOutcome> {
  const log = ctx.logger.child("parser");
  const attempts: ParseAttempt[] = [];

  for (const strategy of strategies) {
    let result: StrategyResult;
    try {
      result = await strategy.attempt({ text: rawText, hints, ctx });
    } catch (error) {
      log.error(`Strategy ${strategy.name} threw: ${describeError(error)}`);
      result = err("strategy_error");
    }

    if (!result.ok) {
      log.debug(`Strategy ${strategy.name} failed: ${result.error}`);
      attempts.push({ strategy: strategy.name, ok: false, reason: result.error, itemCount: 0 });
      continue;
    }

    const rejected = rejectReason(result.value);
    if (rejected) {
      attempts.push({
        strategy: strategy.name,
        ok: false,
        reason: rejected,
        itemCount: result.value.length,
      });
      continue;
    }

    let drafts = result.value;
    if (hints.maxItems !== undefined && drafts.length > hints.maxItems) {
      log.warn(`Truncating ${drafts.length} items to ${hints.maxItems}`);
      drafts = drafts.slice(0, Math.max(1, hints.maxItems));
    }

    attempts.push({ strategy: strategy.name, ok: true, itemCount: drafts.length });
    log.info(
      `Parsed ${drafts.length} items with ${strategy.name} (confidence ${strategy.confidence})`
    );
    return {
      items: normalizeBatch(drafts, ctx),
      confidence: strategy.confidence,
      strategy: strategy.name,
      attempts,
    };
  }

  // Only reachable with a custom chain that lacks the fallback.
  log.warn("No strategy succeeded, using the canonical decomposition");
  return {
    items: normalizeBatch(canonicalDrafts(), ctx),
    confidence: canonicalFallbackStrategy.confidence,
    strategy: canonicalFallbackStrategy.name,
    attempts,
  };
}
