/**
 * Consensus coordinator: three proposers settle the activity structure
 * before any work items are generated.
 *
 * States:
 *   collecting  structural proposes, pedagogical evaluates that proposal,
 *               feasibility reviews both; each call under the request timeout
 *   evaluating  every proposal arrived; apply the transition rule
 *   decided     MODIFICATION_PEDAGOGICAL or a weighted CONSENSUS
 *   fallback    the first proposer to throw or time out ends collection;
 *               keep the best survivor
 *
 * The coordinator never throws: proposer failures are recorded on the
 * decision.
 */

import { withTimeout } from "../context";
import type { RequestContext } from "../context";
import { TimeoutError, describeError } from "../errors";
import { PROPOSER_ROLES } from "../types";
import type {
  ActivityStructure,
  ParticipantProfile,
  PreferenceWeights,
  ProposalDecision,
  ProposalVerdict,
  ProposerRole,
} from "../types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConsensusState = "collecting" | "evaluating" | "decided" | "fallback";

export type DecisionType = "CONSENSUS" | "MODIFICATION_PEDAGOGICAL" | "FALLBACK";

export interface ConsensusRequest {
  intent: string;
  weights: PreferenceWeights;
  participants: readonly ParticipantProfile[];
  /** The structural proposal, for the pedagogical and feasibility reviewers */
  proposal?: ProposalDecision;
  /** The pedagogical evaluation, for the feasibility reviewer */
  evaluation?: ProposalDecision;
}

export interface ProposalCollaborator {
  readonly role: ProposerRole;
  propose(request: ConsensusRequest, ctx: RequestContext): Promise<ProposalDecision>;
}

export type ProposalCollaborators = Readonly<Record<ProposerRole, ProposalCollaborator>>;

export interface ConsensusFailure {
  proposerId: ProposerRole;
  kind: "error" | "timeout";
  message: string;
}

export interface ConsensusDecision {
  type: DecisionType;
  state: "decided" | "fallback";
  structure: ActivityStructure;
  adaptationRequirements: string[];
  feasibilityAdjustments: string[];
  verdict: ProposalVerdict;
  score: number;
  /** Whose proposal the structure came from */
  source: ProposerRole | "default";
  proposals: ProposalDecision[];
  failures: ConsensusFailure[];
  states: ConsensusState[];
}

export interface ConsensusConfig {
  weights: Readonly<Record<ProposerRole, number>>;
  /** Pedagogical requires_revision below this score overrides the merge */
  pedagogicalOverrideThreshold: number;
  /** Merged score under which the consensus verdict is requires_revision */
  revisionThreshold: number;
}

export const DEFAULT_CONSENSUS_CONFIG: ConsensusConfig = {
  weights: { structural: 0.4, pedagogical: 0.35, feasibility: 0.25 },
  pedagogicalOverrideThreshold: 0.6,
  revisionThreshold: 0.6,
};

export const DEFAULT_ACTIVITY_STRUCTURE: ActivityStructure = {
  activityType: "collaborative project",
  stages: ["preparation", "execution", "reflection"],
  collaborationEmphasis: "group",
  targetItemCount: 3,
};

// ---------------------------------------------------------------------------
// Pure transition helpers
// ---------------------------------------------------------------------------

function union(lists: string[][]): string[] {
  return [...new Set(lists.flat().map((entry) => entry.trim()).filter(Boolean))];
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Transition rule for a complete set of proposals.
 */
export function evaluateProposals(
  proposals: Record<ProposerRole, ProposalDecision>,
  config: ConsensusConfig = DEFAULT_CONSENSUS_CONFIG
): Omit<ConsensusDecision, "proposals" | "failures" | "states"> {
  const { structural, pedagogical, feasibility } = proposals;

  if (
    pedagogical.verdict === "requires_revision" &&
    pedagogical.score < config.pedagogicalOverrideThreshold
  ) {
    return {
      type: "MODIFICATION_PEDAGOGICAL",
      state: "decided",
      structure: pedagogical.structure,
      adaptationRequirements: union([pedagogical.adaptationRequirements]),
      feasibilityAdjustments: union([
        pedagogical.feasibilityAdjustments,
        feasibility.feasibilityAdjustments,
      ]),
      verdict: pedagogical.verdict,
      score: pedagogical.score,
      source: "pedagogical",
    };
  }

  const all = [structural, pedagogical, feasibility];
  const score = round(
    PROPOSER_ROLES.reduce((sum, role) => sum + config.weights[role] * proposals[role].score, 0)
  );
  const adaptationRequirements = union(all.map((p) => p.adaptationRequirements));
  const feasibilityAdjustments = union(all.map((p) => p.feasibilityAdjustments));

  let verdict: ProposalVerdict = "approved_with_adaptations";
  if (score < config.revisionThreshold) {
    verdict = "requires_revision";
  } else if (
    all.every((p) => p.verdict === "approved") &&
    adaptationRequirements.length === 0 &&
    feasibilityAdjustments.length === 0
  ) {
    verdict = "approved";
  }

  return {
    type: "CONSENSUS",
    state: "decided",
    structure: structural.structure,
    adaptationRequirements,
    feasibilityAdjustments,
    verdict,
    score,
    source: "structural",
  };
}

/**
 * Best survivor: structural if it arrived, else the first that did, else
 * the built-in default structure.
 */
export function fallbackDecision(
  proposals: ProposalDecision[]
): Omit<ConsensusDecision, "proposals" | "failures" | "states"> {
  const chosen = proposals.find((p) => p.proposerId === "structural") ?? proposals[0];

  if (!chosen) {
    return {
      type: "FALLBACK",
      state: "fallback",
      structure: DEFAULT_ACTIVITY_STRUCTURE,
      adaptationRequirements: [],
      feasibilityAdjustments: [],
      verdict: "approved_with_adaptations",
      score: 0,
      source: "default",
    };
  }

  return {
    type: "FALLBACK",
    state: "fallback",
    structure: chosen.structure,
    adaptationRequirements: union([chosen.adaptationRequirements]),
    feasibilityAdjustments: union([chosen.feasibilityAdjustments]),
    verdict: chosen.verdict,
    score: chosen.score,
    source: chosen.proposerId,
  };
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class ConsensusCoordinator {
  private readonly collaborators: ProposalCollaborators;
  private readonly config: ConsensusConfig;

  constructor(collaborators: ProposalCollaborators, config: ConsensusConfig = DEFAULT_CONSENSUS_CONFIG) {
    this.collaborators = collaborators;
    this.config = config;
  }

  async decide(request: ConsensusRequest, ctx: RequestContext): Promise<ConsensusDecision> {
    const log = ctx.logger.child("consensus");
    const states: ConsensusState[] = ["collecting"];
    const proposals: ProposalDecision[] = [];
    const byRole: Partial<Record<ProposerRole, ProposalDecision>> = {};

    for (const role of PROPOSER_ROLES) {
      const roleRequest: ConsensusRequest = {
        ...request,
        proposal: byRole.structural,
        evaluation: byRole.pedagogical,
      };
      try {
        const proposal = await withTimeout(
          Promise.resolve().then(() => this.collaborators[role].propose(roleRequest, ctx)),
          ctx.timeoutMs,
          `${role} proposer`
        );
        const decision = { ...proposal, proposerId: role };
        proposals.push(decision);
        byRole[role] = decision;
      } catch (error) {
        const kind = error instanceof TimeoutError ? "timeout" : "error";
        const message = describeError(error);
        log.warn(`${role} proposer failed (${kind}): ${message}`);
        states.push("fallback");
        const decision = fallbackDecision(proposals);
        log.info(`Fallback decision from ${decision.source}`);
        return { ...decision, proposals, failures: [{ proposerId: role, kind, message }], states };
      }
    }

    const { structural, pedagogical, feasibility } = byRole;
    if (!structural || !pedagogical || !feasibility) {
      states.push("fallback");
      return { ...fallbackDecision(proposals), proposals, failures: [], states };
    }

    states.push("evaluating");
    const decision = evaluateProposals({ structural, pedagogical, feasibility }, this.config);
    states.push("decided");
    log.info(`${decision.type} (score ${decision.score}, verdict ${decision.verdict})`);
    return { ...decision, proposals, failures: [], states };
  }
}
