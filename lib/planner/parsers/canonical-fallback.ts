/**
 * Canonical fallback: the documented three-item decomposition returned
 * when nothing else could be read. Always succeeds.
 */

import { ok } from "../result";
import type { ParseStrategy } from "./types";
import type { WorkItemDraft } from "../types";

export const CANONICAL_COMPLEXITY = 3;
export const CANONICAL_DURATION_MINUTES = 30;

export function canonicalDrafts(): WorkItemDraft[] {
  return [
    {
      sourceId: "preparation",
      description: "Preparation: introduce the activity, set goals and organize materials",
      requiredCompetencies: ["structure", "communication"],
      complexity: CANONICAL_COMPLEXITY,
      collaborationMode: "group",
      estimatedDurationMinutes: CANONICAL_DURATION_MINUTES,
      dependencies: [],
      stage: "preparation",
    },
    {
      sourceId: "execution",
      description: "Execution: carry out the main work of the activity",
      requiredCompetencies: ["collaboration"],
      complexity: CANONICAL_COMPLEXITY,
      collaborationMode: "group",
      estimatedDurationMinutes: CANONICAL_DURATION_MINUTES,
      dependencies: ["preparation"],
      stage: "execution",
    },
    {
      sourceId: "reflection",
      description: "Reflection: review the results and share what was learned",
      requiredCompetencies: ["metacognition"],
      complexity: CANONICAL_COMPLEXITY,
      collaborationMode: "individual",
      estimatedDurationMinutes: CANONICAL_DURATION_MINUTES,
      dependencies: ["execution"],
      stage: "reflection",
    },
  ];
}

export const canonicalFallbackStrategy: ParseStrategy = {
  name: "canonical-fallback",
  confidence: 0.1,
  async attempt() {
    return ok(canonicalDrafts());
  },
};
