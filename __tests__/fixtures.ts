/**
 * Shared builders for planner tests.
 */

import { vi } from "vitest";
import { createRequestContext } from "@/lib/planner/context";
import type { RequestContext } from "@/lib/planner/context";
import { GenerationFailure } from "@/lib/planner/errors";
import type { GenerationFailureKind } from "@/lib/planner/errors";
import type { GenerationOutcome, TextGenerationClient } from "@/lib/planner/openrouter";
import { err, ok } from "@/lib/planner/result";
import type {
  ParticipantProfile,
  ProposalDecision,
  ProposerRole,
  WorkItem,
} from "@/lib/planner/types";

export function quietContext(timeoutMs = 1_000): RequestContext {
  return createRequestContext({ requestId: "test-request", timeoutMs, logLevel: "error" });
}

export function makeItem(id: string, overrides: Partial<WorkItem> = {}): WorkItem {
  return {
    id,
    description: `Work for ${id}`,
    requiredCompetencies: [],
    complexity: 3,
    collaborationMode: "individual",
    estimatedDurationMinutes: 30,
    dependencies: [],
    stage: "execution",
    ...overrides,
  };
}

export function makeProfile(
  id: string,
  overrides: Partial<ParticipantProfile> = {}
): ParticipantProfile {
  return {
    id,
    name: `Participant ${id}`,
    strengths: [],
    supportNeeds: [],
    neurotype: "typical",
    availability: 90,
    roleHistory: [],
    ...overrides,
  };
}

export function makeProposal(
  role: ProposerRole,
  overrides: Partial<ProposalDecision> = {}
): ProposalDecision {
  return {
    proposerId: role,
    structure: {
      activityType: `${role} plan`,
      stages: ["preparation", "execution", "reflection"],
      collaborationEmphasis: "group",
      targetItemCount: 4,
    },
    adaptationRequirements: [],
    feasibilityAdjustments: [],
    verdict: "approved",
    score: 0.8,
    ...overrides,
  };
}

export function generated(content: string): GenerationOutcome {
  return ok({ content, responseTimeMs: 5 });
}

export function failedGeneration(kind: GenerationFailureKind, message = "failed"): GenerationOutcome {
  return err(new GenerationFailure(kind, message));
}

/** A client that answers with the queued outcomes in order, then repeats the last. */
export function scriptedClient(...outcomes: GenerationOutcome[]) {
  let call = 0;
  const generate = vi.fn(async (_prompt: string, _maxTokens: number, _timeoutMs: number) => {
    const outcome = outcomes[Math.min(call, outcomes.length - 1)];
    call += 1;
    return outcome;
  });
  const client: TextGenerationClient = { generate };
  return { client, generate };
}
