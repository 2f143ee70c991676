/**
 * Compatibility scoring between one work item and one participant.
 *
 *   score = 0.5 + Σ tag bonuses ± neurotype rules ± collaboration preference
 *
 * clamped to [0, 1]. Neurotype bonuses scale by (0.5 + structure) and
 * penalties by (1.5 − flexibility), so the default weights of 0.5 leave
 * the fixed table unchanged.
 */

import { DEFAULT_PREFERENCE_WEIGHTS } from "../types";
import type { Neurotype, ParticipantProfile, PreferenceWeights, WorkItem } from "../types";

export const BASE_SCORE = 0.5;
export const TAG_MATCH_BONUS = 0.15;
export const COLLABORATION_PREFERENCE_FACTOR = 0.2;

export interface NeurotypeRule {
  neurotype: Neurotype;
  label: string;
  delta: number;
  applies: (item: WorkItem) => boolean;
}

const hasTag = (tag: string) => (item: WorkItem) => item.requiredCompetencies.includes(tag);

export const NEUROTYPE_RULES: readonly NeurotypeRule[] = [
  { neurotype: "ASD", label: "improvisation", delta: -0.3, applies: hasTag("improvisation") },
  { neurotype: "ASD", label: "structure", delta: 0.15, applies: hasTag("structure") },
  { neurotype: "ASD", label: "precision", delta: 0.15, applies: hasTag("precision") },
  { neurotype: "ADHD", label: "movement", delta: 0.15, applies: hasTag("movement") },
  { neurotype: "ADHD", label: "dynamic", delta: 0.15, applies: hasTag("dynamic") },
  { neurotype: "ADHD", label: "complexity > 3", delta: -0.2, applies: (item) => item.complexity > 3 },
  { neurotype: "gifted", label: "complexity ≥ 4", delta: 0.2, applies: (item) => item.complexity >= 4 },
  { neurotype: "gifted", label: "simple", delta: -0.2, applies: hasTag("simple") },
];

export interface CompatibilityScore {
  score: number;
  rationale: string;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function signed(value: number): string {
  const fixed = Math.abs(value).toFixed(2);
  return value < 0 ? `-${fixed}` : `+${fixed}`;
}

export function scoreCompatibility(
  item: WorkItem,
  participant: ParticipantProfile,
  weights: PreferenceWeights = DEFAULT_PREFERENCE_WEIGHTS
): CompatibilityScore {
  let score = BASE_SCORE;
  const reasons: string[] = [];

  const strengths = new Set(participant.strengths);
  for (const tag of item.requiredCompetencies) {
    if (strengths.has(tag)) {
      score += TAG_MATCH_BONUS;
      reasons.push(`strength ${tag} ${signed(TAG_MATCH_BONUS)}`);
    }
  }

  for (const rule of NEUROTYPE_RULES) {
    if (rule.neurotype !== participant.neurotype || !rule.applies(item)) continue;
    const factor = rule.delta > 0 ? 0.5 + weights.structure : 1.5 - weights.flexibility;
    const delta = rule.delta * factor;
    score += delta;
    reasons.push(`${rule.neurotype} ${rule.label} ${signed(delta)}`);
  }

  if (item.collaborationMode !== "individual" && strengths.has("collaboration")) {
    const delta = COLLABORATION_PREFERENCE_FACTOR * (weights.collaboration - 0.5);
    if (delta !== 0) {
      score += delta;
      reasons.push(`collaboration preference ${signed(delta)}`);
    }
  }

  const clamped = round(Math.max(0, Math.min(1, score)));
  const rationale =
    reasons.length > 0
      ? `base ${BASE_SCORE.toFixed(2)}; ${reasons.join("; ")}`
      : `base ${BASE_SCORE.toFixed(2)}; no matching rules`;
  return { score: clamped, rationale };
}

/**
 * Items a participant may take before the greedy pass looks elsewhere:
 * 2, plus one above 80 availability, minus one below 70, never below 1.
 */
export function loadCap(availability: number): number {
  const bonus = availability > 80 ? 1 : 0;
  const penalty = availability < 70 ? 1 : 0;
  return Math.max(1, 2 + bonus - penalty);
}
