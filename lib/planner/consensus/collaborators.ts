/**
 * Text-backed proposers: one role prompt, one generation call, and a
 * line parser for the trailing VERDICT/SCORE/... block.
 */

import type { RequestContext } from "../context";
import type { TextGenerationClient } from "../openrouter";
import { parseCollaborationMode } from "../parsers/fields";
import { buildProposalPrompt } from "../prompts";
import { err, ok } from "../result";
import type { Result } from "../result";
import type { ProposalDecision, ProposalVerdict, ProposerRole } from "../types";
import { DEFAULT_ACTIVITY_STRUCTURE } from "./coordinator";
import type { ConsensusRequest, ProposalCollaborator, ProposalCollaborators } from "./coordinator";

// ---------------------------------------------------------------------------
// Line parsing
// ---------------------------------------------------------------------------

function readLine(text: string, label: string): string | null {
  const match = text.match(new RegExp(`^\\s*\\**${label}\\**\\s*:\\s*\\**\\s*(.+?)\\s*$`, "im"));
  return match ? match[1].replace(/\*\*/g, "").trim() : null;
}

/**
 * VERDICT: approved | approved_with_adaptations | requires_revision.
 * Spaces or hyphens in place of underscores are accepted.
 */
export function parseProposalVerdict(text: string): ProposalVerdict | null {
  const raw = readLine(text, "VERDICT");
  if (!raw) return null;
  const value = raw.toLowerCase().replace(/[\s-]+/g, "_");
  if (value.startsWith("approved_with_adaptations")) return "approved_with_adaptations";
  if (value.startsWith("requires_revision")) return "requires_revision";
  if (value.startsWith("approved")) return "approved";
  return null;
}

/**
 * SCORE as 0.82, .82, 82% or 82 (read as a percentage). Clamped to
 * [0, 1]; 0.5 when absent.
 */
export function parseProposalScore(text: string): number {
  const raw = readLine(text, "SCORE");
  const match = raw?.match(/(\d*\.?\d+)\s*(%)?/);
  if (!match) return 0.5;
  let score = parseFloat(match[1]);
  if (isNaN(score)) return 0.5;
  if (match[2] || score > 1) score = score / 100;
  return Math.max(0, Math.min(1, score));
}

function splitList(value: string | null, separator: RegExp): string[] {
  if (!value || /^(?:none|n\/a|-)\.?$/i.test(value)) return [];
  return value
    .split(separator)
    .map((entry) => entry.trim().replace(/\.$/, ""))
    .filter((entry) => entry.length > 0);
}

/**
 * Read one proposer's answer. A missing verdict means the output is
 * malformed; every other field falls back to the default structure.
 */
export function parseProposal(role: ProposerRole, text: string): Result<ProposalDecision, string> {
  const verdict = parseProposalVerdict(text);
  if (!verdict) return err("missing VERDICT line");

  const stages = splitList(readLine(text, "STAGES"), /\s*(?:,|→|->|>)\s*/).map((stage) =>
    stage.toLowerCase()
  );
  const modeText = readLine(text, "MODE");
  const countMatch = readLine(text, "ITEM_COUNT")?.match(/\d+/);
  const structureStages = stages.length > 0 ? stages : [...DEFAULT_ACTIVITY_STRUCTURE.stages];

  return ok({
    proposerId: role,
    structure: {
      activityType: readLine(text, "ACTIVITY_TYPE") ?? DEFAULT_ACTIVITY_STRUCTURE.activityType,
      stages: structureStages,
      collaborationEmphasis:
        (modeText ? parseCollaborationMode(modeText) : undefined) ??
        DEFAULT_ACTIVITY_STRUCTURE.collaborationEmphasis,
      targetItemCount: countMatch
        ? Math.max(1, Math.min(20, parseInt(countMatch[0], 10)))
        : Math.max(structureStages.length, DEFAULT_ACTIVITY_STRUCTURE.targetItemCount),
    },
    adaptationRequirements: splitList(readLine(text, "ADAPTATIONS"), /\s*;\s*/),
    feasibilityAdjustments: splitList(readLine(text, "ADJUSTMENTS"), /\s*;\s*/),
    verdict,
    score: parseProposalScore(text),
  });
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export class ProposalFailure extends Error {
  constructor(role: ProposerRole, message: string) {
    super(`${role} proposer: ${message}`);
    this.name = "ProposalFailure";
  }
}

/**
 * A proposer that throws on generation failure or malformed output. The
 * coordinator turns either into a recorded ConsensusFailure.
 */
export function createTextCollaborator(
  role: ProposerRole,
  client: TextGenerationClient
): ProposalCollaborator {
  return {
    role,
    async propose(request: ConsensusRequest, ctx: RequestContext) {
      const prompt = buildProposalPrompt(role, request);
      const generated = await client.generate(prompt, ctx.maxTokens, ctx.timeoutMs);
      if (!generated.ok) throw generated.error;

      const parsed = parseProposal(role, generated.value.content);
      if (!parsed.ok) throw new ProposalFailure(role, parsed.error);

      ctx.logger
        .child(`proposer:${role}`)
        .debug(`verdict ${parsed.value.verdict}, score ${parsed.value.score}`);
      return parsed.value;
    },
  };
}

export function createTextCollaborators(client: TextGenerationClient): ProposalCollaborators {
  return {
    structural: createTextCollaborator("structural", client),
    pedagogical: createTextCollaborator("pedagogical", client),
    feasibility: createTextCollaborator("feasibility", client),
  };
}
