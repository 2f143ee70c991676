/**
 * Core type definitions for the activity planner.
 *
 * Pipeline:
 *   Consensus (optional): three proposers agree on the activity structure
 *   Generate: the text service decomposes the intent into work items
 *   Parse:    a strategy chain turns raw text into drafts, then normalizes
 *   Assign:   drafts become WorkItems and are distributed to participants
 */

// ---------------------------------------------------------------------------
// Work Items
// ---------------------------------------------------------------------------

export type CollaborationMode = "individual" | "pair" | "group";

export const COLLABORATION_MODES: readonly CollaborationMode[] = [
  "individual",
  "pair",
  "group",
] as const;

export interface WorkItem {
  id: string;
  description: string;
  requiredCompetencies: string[];
  complexity: number; // integer 1-5
  collaborationMode: CollaborationMode;
  estimatedDurationMinutes: number;
  dependencies: string[];
  stage: string;
}

/**
 * A work item as a parse strategy produced it. Only the description is
 * guaranteed; the normalizer fills the rest.
 */
export interface WorkItemDraft {
  sourceId?: string;
  description: string;
  requiredCompetencies?: string[];
  complexity?: number;
  collaborationMode?: CollaborationMode;
  estimatedDurationMinutes?: number;
  dependencies?: string[];
  stage?: string;
}

// ---------------------------------------------------------------------------
// Participants
// ---------------------------------------------------------------------------

export type Neurotype = "typical" | "ASD" | "ADHD" | "gifted" | "other";

export interface ParticipantProfile {
  readonly id: string;
  readonly name: string;
  readonly strengths: readonly string[];
  readonly supportNeeds: readonly string[];
  readonly neurotype: Neurotype;
  readonly availability: number; // 0-100
  readonly roleHistory: readonly string[];
}

// ---------------------------------------------------------------------------
// Assignment
// ---------------------------------------------------------------------------

export interface AssignmentEntry {
  itemId: string;
  score: number;
  rationale: string;
}

/** participant id → ordered entries */
export type AssignmentRecord = Record<string, AssignmentEntry[]>;

export interface PreferenceWeights {
  structure: number;
  collaboration: number;
  flexibility: number;
}

export const DEFAULT_PREFERENCE_WEIGHTS: PreferenceWeights = {
  structure: 0.5,
  collaboration: 0.5,
  flexibility: 0.5,
};

// ---------------------------------------------------------------------------
// Consensus
// ---------------------------------------------------------------------------

export type ProposerRole = "structural" | "pedagogical" | "feasibility";

export const PROPOSER_ROLES: readonly ProposerRole[] = [
  "structural",
  "pedagogical",
  "feasibility",
] as const;

export type ProposalVerdict =
  | "approved"
  | "approved_with_adaptations"
  | "requires_revision";

export interface ActivityStructure {
  activityType: string;
  stages: string[];
  collaborationEmphasis: CollaborationMode;
  targetItemCount: number;
}

export interface ProposalDecision {
  proposerId: ProposerRole;
  structure: ActivityStructure;
  adaptationRequirements: string[];
  feasibilityAdjustments: string[];
  verdict: ProposalVerdict;
  score: number; // 0-1, the proposer's internal confidence in its verdict
}

// ---------------------------------------------------------------------------
// Prompt enrichment
// ---------------------------------------------------------------------------

export interface RankedExample {
  title: string;
  content: string;
  similarity: number;
}

/** Feeds prompt enrichment only; its output is never parsed. */
export interface ExampleRetriever {
  findSimilar(text: string, k: number): Promise<RankedExample[]>;
}
