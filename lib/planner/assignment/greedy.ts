/**
 * Greedy assignment over a precomputed compatibility matrix.
 *
 * Items go out hardest first, dependency-satisfied before blocked, then in
 * batch order. Each goes to the best-scoring participant still under their
 * load cap. Participants left empty are back-filled from whoever holds the
 * most items. Load counters live in this call only.
 */

import type {
  AssignmentEntry,
  AssignmentRecord,
  ParticipantProfile,
  PreferenceWeights,
  WorkItem,
} from "../types";
import { loadCap, scoreCompatibility } from "./scoring";
import type { CompatibilityScore } from "./scoring";

export interface GreedyResult {
  record: AssignmentRecord;
  /** Some item went to a participant already at their cap */
  overflowed: boolean;
  backfilled: number;
}

type ScoreMatrix = Map<string, Map<string, CompatibilityScore>>;

export function buildScoreMatrix(
  items: WorkItem[],
  participants: readonly ParticipantProfile[],
  weights: PreferenceWeights
): ScoreMatrix {
  const matrix: ScoreMatrix = new Map();
  for (const item of items) {
    const row = new Map<string, CompatibilityScore>();
    for (const participant of participants) {
      row.set(participant.id, scoreCompatibility(item, participant, weights));
    }
    matrix.set(item.id, row);
  }
  return matrix;
}

function lookup(matrix: ScoreMatrix, itemId: string, participantId: string): CompatibilityScore {
  return matrix.get(itemId)?.get(participantId) ?? { score: 0, rationale: "unscored" };
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Next item: highest complexity, then dependencies met, then position. */
function pickNextItem(remaining: WorkItem[], assigned: Set<string>, position: Map<string, number>) {
  const satisfied = (item: WorkItem) => item.dependencies.every((dep) => assigned.has(dep));
  return [...remaining].sort((a, b) => {
    if (a.complexity !== b.complexity) return b.complexity - a.complexity;
    const sa = satisfied(a);
    const sb = satisfied(b);
    if (sa !== sb) return sa ? -1 : 1;
    return (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0);
  })[0];
}

/**
 * Empty list per participant. The record has no prototype, so an id such
 * as "__proto__" or "constructor" is an ordinary key.
 */
export function createAssignmentRecord(participantIds: Iterable<string>): AssignmentRecord {
  const record: AssignmentRecord = Object.create(null);
  for (const id of participantIds) record[id] = [];
  return record;
}

export function greedyAssign(
  items: WorkItem[],
  participants: readonly ParticipantProfile[],
  weights: PreferenceWeights
): GreedyResult {
  const matrix = buildScoreMatrix(items, participants, weights);
  const record = createAssignmentRecord(participants.map((p) => p.id));
  const load = new Map<string, number>();
  const caps = new Map<string, number>();
  for (const participant of participants) {
    load.set(participant.id, 0);
    caps.set(participant.id, loadCap(participant.availability));
  }

  const position = new Map(items.map((item, index) => [item.id, index]));
  const assigned = new Set<string>();
  let remaining = [...items];
  let overflowed = false;

  const loadOf = (id: string) => load.get(id) ?? 0;
  const capOf = (id: string) => caps.get(id) ?? 1;

  while (remaining.length > 0) {
    const item = pickNextItem(remaining, assigned, position);
    const open = participants.filter((p) => loadOf(p.id) < capOf(p.id));

    let chosen: ParticipantProfile;
    if (open.length > 0) {
      chosen = [...open].sort((a, b) => {
        const diff = lookup(matrix, item.id, b.id).score - lookup(matrix, item.id, a.id).score;
        if (diff !== 0) return diff;
        if (loadOf(a.id) !== loadOf(b.id)) return loadOf(a.id) - loadOf(b.id);
        return compareIds(a.id, b.id);
      })[0];
    } else {
      overflowed = true;
      chosen = [...participants].sort((a, b) => {
        const ratio = loadOf(a.id) / capOf(a.id) - loadOf(b.id) / capOf(b.id);
        if (ratio !== 0) return ratio;
        const diff = lookup(matrix, item.id, b.id).score - lookup(matrix, item.id, a.id).score;
        if (diff !== 0) return diff;
        return compareIds(a.id, b.id);
      })[0];
    }

    const { score, rationale } = lookup(matrix, item.id, chosen.id);
    record[chosen.id].push({ itemId: item.id, score, rationale });
    load.set(chosen.id, loadOf(chosen.id) + 1);
    assigned.add(item.id);
    remaining = remaining.filter((other) => other.id !== item.id);
  }

  const backfilled = backfill(record, participants, matrix);
  return { record, overflowed, backfilled };
}

/**
 * Give each empty participant the item they score best on from the donor
 * holding the most items (at least two). Returns the number of moves.
 */
export function backfill(
  record: AssignmentRecord,
  participants: readonly ParticipantProfile[],
  matrix: ScoreMatrix
): number {
  let moves = 0;

  for (const recipient of participants) {
    if ((record[recipient.id] ?? []).length > 0) continue;

    const donor = participants
      .filter((p) => p.id !== recipient.id && (record[p.id] ?? []).length >= 2)
      .sort((a, b) => {
        const diff = record[b.id].length - record[a.id].length;
        return diff !== 0 ? diff : compareIds(a.id, b.id);
      })[0];
    if (!donor) break;

    const donorEntries = record[donor.id];
    let bestIndex = 0;
    for (let i = 1; i < donorEntries.length; i++) {
      const current = lookup(matrix, donorEntries[i].itemId, recipient.id).score;
      const best = lookup(matrix, donorEntries[bestIndex].itemId, recipient.id).score;
      if (current > best) bestIndex = i;
    }

    const [moved] = donorEntries.splice(bestIndex, 1);
    const { score, rationale } = lookup(matrix, moved.itemId, recipient.id);
    const entry: AssignmentEntry = {
      itemId: moved.itemId,
      score,
      rationale: `${rationale}; back-filled from ${donor.id}`,
    };
    record[recipient.id] = [entry];
    moves += 1;
  }

  return moves;
}
