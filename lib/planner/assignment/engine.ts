/**
 * Assignment engine: optimizer path first when one is supplied, greedy
 * otherwise or whenever the optimizer fails, throws, times out, or
 * returns a mapping that does not validate.
 */

import { createRequestContext, withTimeout } from "../context";
import type { RequestContext } from "../context";
import { NoParticipantsError, describeError } from "../errors";
import { err, ok } from "../result";
import type { Result } from "../result";
import { DEFAULT_PREFERENCE_WEIGHTS } from "../types";
import type {
  AssignmentRecord,
  ParticipantProfile,
  PreferenceWeights,
  WorkItem,
} from "../types";
import { createAssignmentRecord, greedyAssign } from "./greedy";
import { validateOptimizerMapping } from "./optimizer";
import type { AssignmentOptimizer, OptimizerMapping } from "./optimizer";
import { scoreCompatibility } from "./scoring";

export type AssignmentPath = "optimizer" | "greedy" | "none";

export interface AssignmentOutcome {
  record: AssignmentRecord;
  path: AssignmentPath;
  /** The optimizer was supplied but its answer was not used */
  degraded: boolean;
  overflowed: boolean;
  notes: string[];
}

export interface AssignmentOptions {
  optimizer?: AssignmentOptimizer;
  ctx?: RequestContext;
}

/**
 * Distribute normalized items to participants. An empty item list is an
 * empty record; an empty participant list is a NoParticipantsError.
 */
export async function assignWorkItems(
  items: WorkItem[],
  participants: readonly ParticipantProfile[],
  weights: PreferenceWeights = DEFAULT_PREFERENCE_WEIGHTS,
  options: AssignmentOptions = {}
): Promise<Result<AssignmentOutcome, NoParticipantsError>> {
  const ctx = options.ctx ?? createRequestContext();
  const log = ctx.logger.child("assignment");

  if (items.length === 0) {
    const record = createAssignmentRecord(participants.map((p) => p.id));
    return ok({ record, path: "none", degraded: false, overflowed: false, notes: [] });
  }
  if (participants.length === 0) {
    log.error("No participants available, aborting assignment");
    return err(new NoParticipantsError());
  }

  const notes: string[] = [];

  if (options.optimizer) {
    const mapping = await runOptimizer(options.optimizer, items, participants, ctx);
    if (mapping.ok) {
      const validated = validateOptimizerMapping(mapping.value, items, participants, log);
      if (validated.ok) {
        for (const dropped of validated.value.droppedParticipants) {
          notes.push(`optimizer participant "${dropped}" dropped`);
        }
        if (validated.value.remapped) notes.push("optimizer item ids remapped by ordinal position");
        return ok({
          record: toRecord(validated.value.assignments, items, participants, weights),
          path: "optimizer",
          degraded: false,
          overflowed: false,
          notes,
        });
      }
      log.warn(`Optimizer mapping rejected (${validated.error.reason}): ${validated.error.detail}`);
      notes.push(`optimizer rejected: ${validated.error.reason}`);
    } else {
      log.warn(`Optimizer unavailable: ${mapping.error}`);
      notes.push(`optimizer failed: ${mapping.error}`);
    }
  }

  const greedy = greedyAssign(items, participants, weights);
  if (greedy.overflowed) notes.push("some participants exceed their load cap");
  if (greedy.backfilled > 0) notes.push(`${greedy.backfilled} item(s) back-filled`);

  return ok({
    record: greedy.record,
    path: "greedy",
    degraded: options.optimizer !== undefined,
    overflowed: greedy.overflowed,
    notes,
  });
}

async function runOptimizer(
  optimizer: AssignmentOptimizer,
  items: WorkItem[],
  participants: readonly ParticipantProfile[],
  ctx: RequestContext
): Promise<Result<OptimizerMapping, string>> {
  try {
    return await withTimeout(
      optimizer.optimize(items, participants, ctx),
      ctx.timeoutMs,
      "assignment optimizer"
    );
  } catch (error) {
    return err(describeError(error));
  }
}

/** Scores and rationales come from the same rules the greedy path uses. */
function toRecord(
  assignments: Record<string, string[]>,
  items: WorkItem[],
  participants: readonly ParticipantProfile[],
  weights: PreferenceWeights
): AssignmentRecord {
  const byId = new Map(items.map((item) => [item.id, item]));
  const record = createAssignmentRecord([]);
  for (const participant of participants) {
    const assigned = Object.hasOwn(assignments, participant.id) ? assignments[participant.id] : [];
    record[participant.id] = assigned.flatMap((itemId) => {
      const item = byId.get(itemId);
      if (!item) return [];
      const { score, rationale } = scoreCompatibility(item, participant, weights);
      return [{ itemId, score, rationale: `optimizer; ${rationale}` }];
    });
  }
  return record;
}
