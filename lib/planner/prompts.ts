/**
 * Prompt templates for decomposition, schema replay, the assignment
 * optimizer and the three consensus proposers.
 */

import type {
  ActivityStructure,
  ParticipantProfile,
  PreferenceWeights,
  ProposalDecision,
  ProposerRole,
  RankedExample,
  WorkItem,
} from "./types";

// ---------------------------------------------------------------------------
// Shared fragments
// ---------------------------------------------------------------------------

const ITEM_TEMPLATE = `ITEM 1:
Description: [one concrete, self-contained piece of work]
Competencies: [comma-separated skills, e.g. mathematics, precision]
Complexity: [1-5]
Type: [individual | pair | group]
Dependencies: [none, or the item numbers that must finish first]
Duration: [minutes]
Stage: [preparation | execution | reflection]`;

function describeWeight(value: number, low: string, high: string): string {
  if (value >= 0.67) return high;
  if (value <= 0.33) return low;
  return "balanced";
}

export function formatPreferences(weights: PreferenceWeights): string {
  return [
    `- Structure: ${describeWeight(weights.structure, "open-ended", "highly structured")}`,
    `- Collaboration: ${describeWeight(weights.collaboration, "mostly individual", "mostly collaborative")}`,
    `- Flexibility: ${describeWeight(weights.flexibility, "fixed plan", "room to adapt")}`,
  ].join("\n");
}

export function formatStructure(structure: ActivityStructure): string {
  return `- Activity type: ${structure.activityType}
- Stages, in order: ${structure.stages.join(" → ")}
- Collaboration emphasis: ${structure.collaborationEmphasis}
- Target number of items: ${structure.targetItemCount}`;
}

function formatList(heading: string, entries: readonly string[] | undefined): string {
  if (!entries || entries.length === 0) return "";
  return `\n${heading}\n${entries.map((entry) => `- ${entry}`).join("\n")}\n`;
}

/** Retrieved examples are shown as inspiration only. */
export function formatExamples(examples: RankedExample[]): string {
  if (examples.length === 0) return "";
  const body = examples
    .map((example, i) => `Example ${i + 1}: ${example.title}\n${example.content.trim()}`)
    .join("\n\n");
  return `\nFor inspiration, here are similar activities (do not copy them):\n\n${body}\n`;
}

// ---------------------------------------------------------------------------
// Decomposition
// ---------------------------------------------------------------------------

export interface DecompositionPromptInput {
  intent: string;
  weights: PreferenceWeights;
  structure?: ActivityStructure;
  /** Agreed during consensus; every item must respect them */
  adaptations?: string[];
  adjustments?: string[];
  examples?: RankedExample[];
  maxItems: number;
}

/**
 * Build the prompt that asks the generator to split an activity intent
 * into atomic work items in the strict field format.
 */
export function buildDecompositionPrompt(input: DecompositionPromptInput): string {
  const structureText = input.structure
    ? `\nThe activity has been planned with this structure:\n${formatStructure(input.structure)}\n`
    : "";

  return `You are designing a classroom activity for a mixed group of participants, including neurodivergent learners.

Activity intent: ${input.intent}

Teacher preferences:
${formatPreferences(input.weights)}
${structureText}${formatList("Required adaptations for the participants:", input.adaptations)}${formatList("Practical adjustments:", input.adjustments)}${formatExamples(input.examples ?? [])}
Break the activity into at most ${input.maxItems} atomic work items that can each be assigned to one participant, a pair, or a group. Follow the preparation, execution, reflection progression.

IMPORTANT: Format EVERY item EXACTLY as follows, with no other text:

${ITEM_TEMPLATE}

ITEM 2:
...

Now write the items:`;
}

/**
 * Stricter re-request used once when the first answer could not be parsed.
 */
export function buildSchemaReplayPrompt(intent: string, maxItems: number): string {
  return `Your previous answer could not be read. Answer again using ONLY the template below.

Activity intent: ${intent}

Rules:
- Between 3 and ${maxItems} items
- Start every item with "ITEM n:" on its own line
- Every item MUST have a Description line
- No introduction, no closing remarks, no markdown

Template:

${ITEM_TEMPLATE}`;
}

// ---------------------------------------------------------------------------
// Assignment optimizer
// ---------------------------------------------------------------------------

function formatItemLine(item: WorkItem): string {
  return `- ${item.id}: ${item.description} (complexity ${item.complexity}, ${item.collaborationMode}, tags: ${item.requiredCompetencies.join(", ")})`;
}

function formatParticipantLine(participant: ParticipantProfile): string {
  const strengths = participant.strengths.length > 0 ? participant.strengths.join(", ") : "none listed";
  return `- participant_${participant.id}: ${participant.neurotype}, availability ${participant.availability}, strengths: ${strengths}`;
}

/**
 * Ask for a JSON participant → items mapping. Local ids are what the
 * prompt shows; the engine validates them afterwards.
 */
export function buildOptimizerPrompt(
  items: WorkItem[],
  participants: readonly ParticipantProfile[]
): string {
  return `Assign every work item to exactly one participant.

Work items:
${items.map(formatItemLine).join("\n")}

Participants:
${participants.map(formatParticipantLine).join("\n")}

Guidelines:
- Every item goes to exactly one participant; every participant gets at least one item when possible
- ASD: prefer structured, precise items; avoid improvisation
- ADHD: prefer movement and dynamic items; avoid complexity above 3
- gifted: prefer complexity 4-5; avoid simple items
- Lower availability means fewer items

Respond with JSON only, in this shape:
{"assignments": {"participant_<id>": ["item_01", "item_02"]}}`;
}

// ---------------------------------------------------------------------------
// Consensus proposers
// ---------------------------------------------------------------------------

const ROLE_BRIEFS: Record<ProposerRole, string> = {
  structural:
    "You are the STRUCTURAL planner. Propose the activity type, its ordered stages, the collaboration emphasis and how many work items it needs.",
  pedagogical:
    "You are the PEDAGOGICAL reviewer. Judge whether the structural proposal below can be adapted for every participant profile, and list the adaptations it requires.",
  feasibility:
    "You are the FEASIBILITY reviewer. Judge whether the structural proposal below, with the pedagogical adaptations, fits the time, space and group size, and list the adjustments it needs.",
};

export interface ProposalPromptInput {
  intent: string;
  weights: PreferenceWeights;
  participants: readonly ParticipantProfile[];
  proposal?: ProposalDecision;
  evaluation?: ProposalDecision;
}

function formatProposal(heading: string, decision: ProposalDecision): string {
  const lines = [
    `${heading} (${decision.verdict}, score ${decision.score}):`,
    formatStructure(decision.structure),
  ];
  if (decision.adaptationRequirements.length > 0) {
    lines.push(`- Adaptations: ${decision.adaptationRequirements.join("; ")}`);
  }
  if (decision.feasibilityAdjustments.length > 0) {
    lines.push(`- Adjustments: ${decision.feasibilityAdjustments.join("; ")}`);
  }
  return lines.join("\n");
}

export function buildProposalPrompt(role: ProposerRole, input: ProposalPromptInput): string {
  const roster = input.participants
    .map((p) => `- ${p.name}: ${p.neurotype}, needs: ${p.supportNeeds.join(", ") || "none"}`)
    .join("\n");

  // Reviewers see what came before them
  const reviewed: string[] = [];
  if (role !== "structural" && input.proposal) {
    reviewed.push(formatProposal("Structural proposal to evaluate", input.proposal));
  }
  if (role === "feasibility" && input.evaluation) {
    reviewed.push(formatProposal("Pedagogical evaluation", input.evaluation));
  }

  return `${ROLE_BRIEFS[role]}

Activity intent: ${input.intent}

Teacher preferences:
${formatPreferences(input.weights)}

Participants (${input.participants.length}):
${roster || "- none listed"}
${reviewed.map((block) => `\n${block}\n`).join("")}
End your answer with these lines EXACTLY (one per line):
VERDICT: [approved | approved_with_adaptations | requires_revision]
SCORE: [0.0-1.0, your confidence in the verdict]
ACTIVITY_TYPE: [short label]
STAGES: [comma-separated stage labels, in order]
MODE: [individual | pair | group]
ITEM_COUNT: [number]
ADAPTATIONS: [semicolon-separated list, or none]
ADJUSTMENTS: [semicolon-separated list, or none]`;
}
