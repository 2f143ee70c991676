/**
 * Optimizer-assisted assignment: an external optimizer proposes a
 * participant → items mapping in its own local ids, and this module
 * checks it against the canonical batch.
 *
 * Unknown item ids are bridged by ordinal position: both id lists are
 * sorted in natural order and paired index by index. That is a best-effort
 * heuristic, accepted only when the two lists have the same length.
 */

import { z } from "zod";
import type { RequestContext } from "../context";
import { describeError } from "../errors";
import type { Logger } from "../logger";
import type { TextGenerationClient } from "../openrouter";
import { extractJson } from "../parsers/json-extract";
import { buildOptimizerPrompt } from "../prompts";
import { err, ok } from "../result";
import type { Result } from "../result";
import type { ParticipantProfile, WorkItem } from "../types";

/** Local participant id → local item ids, exactly as the optimizer wrote them. */
export type OptimizerMapping = Record<string, string[]>;

export interface AssignmentOptimizer {
  optimize(
    items: WorkItem[],
    participants: readonly ParticipantProfile[],
    ctx: RequestContext
  ): Promise<Result<OptimizerMapping, string>>;
}

export type ValidationFailureReason =
  | "count_mismatch"
  | "duplicate_item"
  | "missing_item"
  | "empty_mapping";

export interface ValidationFailure {
  reason: ValidationFailureReason;
  detail: string;
}

export interface ValidatedMapping {
  /** Canonical participant id → canonical item ids */
  assignments: Record<string, string[]>;
  remapped: boolean;
  droppedParticipants: string[];
}

// ---------------------------------------------------------------------------
// Id reconciliation
// ---------------------------------------------------------------------------

const PARTICIPANT_PREFIX = /^(?:participant|student)[\s_#-]*/i;

export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true, sensitivity: "base" });
}

/**
 * Pair two id lists by sorted position. Null when the lengths differ.
 */
export function ordinalRemap(localIds: string[], canonicalIds: string[]): Map<string, string> | null {
  const local = [...new Set(localIds)].sort(naturalCompare);
  const canonical = [...new Set(canonicalIds)].sort(naturalCompare);
  if (local.length !== canonical.length) return null;
  return new Map(local.map((id, index) => [id, canonical[index]]));
}

function resolveParticipant(localId: string, known: ReadonlySet<string>): string | null {
  const trimmed = localId.trim();
  if (known.has(trimmed)) return trimmed;
  const stripped = trimmed.replace(PARTICIPANT_PREFIX, "");
  return known.has(stripped) ? stripped : null;
}

/**
 * Reconcile the optimizer's ids with the canonical batch. Any failure
 * abandons the optimizer path; the caller falls back to greedy.
 */
export function validateOptimizerMapping(
  mapping: OptimizerMapping,
  items: WorkItem[],
  participants: readonly ParticipantProfile[],
  log?: Logger
): Result<ValidatedMapping, ValidationFailure> {
  const knownParticipants = new Set(participants.map((p) => p.id));
  const canonicalItems = items.map((item) => item.id);
  const canonicalSet = new Set(canonicalItems);

  const byParticipant = new Map<string, string[]>();
  const droppedParticipants: string[] = [];
  for (const [localId, localItems] of Object.entries(mapping)) {
    const participantId = resolveParticipant(localId, knownParticipants);
    if (participantId === null) {
      log?.warn(`Optimizer named unknown participant "${localId}", dropped.`);
      droppedParticipants.push(localId);
      continue;
    }
    const list = byParticipant.get(participantId) ?? [];
    list.push(...localItems.map((id) => id.trim()));
    byParticipant.set(participantId, list);
  }

  const localItems = [...byParticipant.values()].flat();
  if (localItems.length === 0) {
    return err({ reason: "empty_mapping", detail: "optimizer assigned no items" });
  }

  let remapped = false;
  if (localItems.some((id) => !canonicalSet.has(id))) {
    const remap = ordinalRemap(localItems, canonicalItems);
    if (!remap) {
      const distinct = new Set(localItems).size;
      return err({
        reason: "count_mismatch",
        detail: `optimizer used ${distinct} item ids, batch has ${canonicalItems.length}`,
      });
    }
    for (const [participantId, list] of byParticipant) {
      byParticipant.set(
        participantId,
        list.map((id) => remap.get(id) ?? id)
      );
    }
    remapped = true;
    log?.info("Optimizer item ids remapped by ordinal position.");
  }

  const seen = new Set<string>();
  for (const list of byParticipant.values()) {
    for (const id of list) {
      if (seen.has(id)) return err({ reason: "duplicate_item", detail: `${id} assigned twice` });
      seen.add(id);
    }
  }
  const missing = canonicalItems.filter((id) => !seen.has(id));
  if (missing.length > 0) {
    return err({ reason: "missing_item", detail: `unassigned: ${missing.join(", ")}` });
  }

  return ok({
    assignments: Object.fromEntries(byParticipant),
    remapped,
    droppedParticipants,
  });
}

// ---------------------------------------------------------------------------
// Text-backed optimizer
// ---------------------------------------------------------------------------

const IdListSchema = z.array(z.union([z.string(), z.number()]).transform(String));
const MappingSchema = z.record(IdListSchema);
const WrappedMappingSchema = z.object({ assignments: MappingSchema });

/** Accepts `{"assignments": {...}}` or the bare mapping. */
export function readOptimizerMapping(value: unknown): Result<OptimizerMapping, string> {
  const wrapped = WrappedMappingSchema.safeParse(value);
  if (wrapped.success) return ok(wrapped.data.assignments);
  const bare = MappingSchema.safeParse(value);
  if (bare.success) return ok(bare.data);
  return err(`unexpected shape: ${bare.error.issues.map((issue) => issue.message).join("; ")}`);
}

/**
 * Optimizer backed by the text generator, prompted for JSON.
 */
export function createTextOptimizer(client: TextGenerationClient): AssignmentOptimizer {
  return {
    async optimize(items, participants, ctx) {
      const log = ctx.logger.child("optimizer");
      const prompt = buildOptimizerPrompt(items, participants);
      const generated = await client.generate(prompt, ctx.maxTokens, ctx.timeoutMs);
      if (!generated.ok) {
        return err(`generation ${generated.error.kind}: ${describeError(generated.error)}`);
      }

      const json = extractJson(generated.value.content);
      if (!json.ok) {
        log.warn(`Optimizer output is not JSON: ${json.error}`);
        return err(`unparseable output: ${json.error}`);
      }

      return readOptimizerMapping(json.value);
    },
  };
}
