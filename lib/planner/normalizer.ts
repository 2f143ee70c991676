/**
 * Work-item normalizer: turns parser drafts into complete WorkItems.
 *
 * Every field is derived from the draft and its batch position only, so
 * normalizing an already-normalized item changes nothing.
 */

import type { RequestContext } from "./context";
import {
  classifyCollaborationMode,
  inferCompetencies,
  inferStage,
} from "./keyword-table";
import type { CollaborationMode, WorkItem, WorkItemDraft } from "./types";
import { COLLABORATION_MODES } from "./types";

export const DEFAULT_COMPLEXITY = 3;
export const DEFAULT_COLLABORATION_MODE: CollaborationMode = "individual";
export const MIN_DEFAULT_DURATION = 15;
export const MAX_DEFAULT_DURATION = 60;
export const MINUTES_PER_COMPLEXITY_POINT = 12;

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

export function formatItemId(position: number): string {
  return `item_${String(position + 1).padStart(2, "0")}`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/\s+/g, "_");
}

function uniqueNonEmpty(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (value && !seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

export function normalizeComplexity(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_COMPLEXITY;
  return clamp(Math.round(value), 1, 5);
}

export function defaultDuration(complexity: number): number {
  return clamp(
    complexity * MINUTES_PER_COMPLEXITY_POINT,
    MIN_DEFAULT_DURATION,
    MAX_DEFAULT_DURATION
  );
}

function isCollaborationMode(value: unknown): value is CollaborationMode {
  return COLLABORATION_MODES.some((mode) => mode === value);
}

// ---------------------------------------------------------------------------
// Single item
// ---------------------------------------------------------------------------

/**
 * Normalize one draft at its batch position.
 *
 * Dependencies are only trimmed and de-duplicated here; resolving them
 * against the batch is `normalizeBatch`'s job.
 */
export function normalizeWorkItem(draft: WorkItemDraft, position: number): WorkItem {
  const id = formatItemId(position);
  const description =
    draft.description.replace(/\s+/g, " ").trim() || `Work item ${position + 1}`;

  const complexity = normalizeComplexity(draft.complexity);

  const collaborationMode = isCollaborationMode(draft.collaborationMode)
    ? draft.collaborationMode
    : classifyCollaborationMode(description) ?? DEFAULT_COLLABORATION_MODE;

  const duration = draft.estimatedDurationMinutes;
  const estimatedDurationMinutes =
    duration !== undefined && Number.isFinite(duration) && duration > 0
      ? Math.max(1, Math.round(duration))
      : defaultDuration(complexity);

  const providedTags = uniqueNonEmpty((draft.requiredCompetencies ?? []).map(normalizeTag));
  const requiredCompetencies =
    providedTags.length > 0 ? providedTags : inferCompetencies(description);

  const dependencies = uniqueNonEmpty(
    (draft.dependencies ?? []).map((dep) => dep.trim())
  ).filter((dep) => dep !== id);

  const stage = draft.stage?.trim().toLowerCase() || inferStage(description);

  return {
    id,
    description,
    requiredCompetencies,
    complexity,
    collaborationMode,
    estimatedDurationMinutes,
    dependencies,
    stage,
  };
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

const ORDINAL_REFERENCE =
  /^(?:item|task|step|activity|tarea)?[\s_#-]*0*(\d+)$/i;

/**
 * Resolve a dependency reference to a canonical id: first by the
 * generator's own id, then by ordinal ("task 2", "2", "item_02").
 */
function resolveReference(
  reference: string,
  sourceIndex: Map<string, string>,
  count: number
): string | null {
  const key = reference.trim().toLowerCase();
  if (!key) return null;

  const bySource = sourceIndex.get(key);
  if (bySource) return bySource;

  const ordinal = key.match(ORDINAL_REFERENCE);
  if (ordinal) {
    const n = parseInt(ordinal[1], 10);
    if (n >= 1 && n <= count) return formatItemId(n - 1);
  }
  return null;
}

/**
 * Normalize a whole batch: sequential ids, dependencies resolved to those
 * ids, unknown and self references dropped, cycles broken by dropping
 * forward references.
 */
export function normalizeBatch(drafts: WorkItemDraft[], ctx?: RequestContext): WorkItem[] {
  const log = ctx?.logger.child("normalizer");

  const sourceIndex = new Map<string, string>();
  drafts.forEach((draft, index) => {
    const key = draft.sourceId?.trim().toLowerCase();
    if (key && !sourceIndex.has(key)) sourceIndex.set(key, formatItemId(index));
  });

  let items = drafts.map((draft, index) => {
    const item = normalizeWorkItem({ ...draft, dependencies: [] }, index);
    const resolved: string[] = [];
    for (const reference of draft.dependencies ?? []) {
      const target = resolveReference(reference, sourceIndex, drafts.length);
      if (target === null) {
        log?.warn(`Item "${item.id}" references unknown dependency "${reference}", removed`);
      } else if (target === item.id) {
        log?.warn(`Item "${item.id}" has a self-dependency, removed`);
      } else if (!resolved.includes(target)) {
        resolved.push(target);
      }
    }
    return { ...item, dependencies: resolved };
  });

  if (dependencyWaves(items).hasCycle) {
    log?.warn("Dependency cycle detected, dropping forward references");
    items = items.map((item, index) => ({
      ...item,
      dependencies: item.dependencies.filter((dep) => positionOf(dep) < index),
    }));
  }

  return items;
}

function positionOf(itemId: string): number {
  const match = itemId.match(/(\d+)$/);
  return match ? parseInt(match[1], 10) - 1 : Number.POSITIVE_INFINITY;
}

// ---------------------------------------------------------------------------
// Dependency waves
// ---------------------------------------------------------------------------

/**
 * Kahn's algorithm with wave grouping: each wave holds the items whose
 * dependencies are all in earlier waves. References outside the batch are
 * ignored.
 */
export function dependencyWaves(items: WorkItem[]): {
  waves: string[][];
  hasCycle: boolean;
} {
  if (items.length === 0) return { waves: [], hasCycle: false };

  const ids = new Set(items.map((item) => item.id));
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const item of items) {
    const deps = item.dependencies.filter((dep) => ids.has(dep));
    inDegree.set(item.id, deps.length);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(item.id);
      dependents.set(dep, list);
    }
  }

  const waves: string[][] = [];
  const processed = new Set<string>();

  while (processed.size < items.length) {
    const wave = items
      .filter((item) => !processed.has(item.id) && inDegree.get(item.id) === 0)
      .map((item) => item.id);

    if (wave.length === 0) {
      return { waves, hasCycle: true };
    }

    waves.push(wave);
    for (const id of wave) {
      processed.add(id);
      for (const dependent of dependents.get(id) ?? []) {
        inDegree.set(dependent, (inDegree.get(dependent) ?? 1) - 1);
      }
    }
  }

  return { waves, hasCycle: false };
}
