/**
 * Participant repository: derives ParticipantProfiles from external
 * records once and serves them read-only.
 *
 * Derivation:
 *   strengths      explicit strengths, keyword categories of interests,
 *                  preferred channel, temperament and tolerance
 *   supportNeeds   support level, frustration tolerance, channel, neurotype
 *   availability   explicit, else 85 adjusted by support level,
 *                  tolerance and temperament, clamped to 60-100
 *   roleHistory    learning style, interests, neurotype
 */

import { readFile } from "node:fs/promises";
import { describeError } from "./errors";
import { matchCategories } from "./keyword-table";
import { normalizeTag } from "./normalizer";
import { err, ok } from "./result";
import type { Result } from "./result";
import type { Neurotype, ParticipantProfile } from "./types";
import { ParticipantListSchema } from "./validation";
import type { ParticipantInput } from "./validation";

// ---------------------------------------------------------------------------
// Derivation
// ---------------------------------------------------------------------------

export function toNeurotype(diagnosticCategory: string): Neurotype {
  const value = diagnosticCategory.trim().toLowerCase();
  if (!value || /^(?:none|typical|neurotypical|n\/a)$/.test(value)) return "typical";
  if (/\b(?:asd|autism|autistic)/.test(value)) return "ASD";
  if (/\badhd/.test(value)) return "ADHD";
  if (/\b(?:gifted|high[\s_-]abilit)/.test(value)) return "gifted";
  return "other";
}

type Channel = "visual" | "auditory" | "kinesthetic" | "reading";

function toChannel(value: string): Channel | null {
  if (value.startsWith("visual")) return "visual";
  if (value.startsWith("audit")) return "auditory";
  if (value.startsWith("kin")) return "kinesthetic";
  if (value.startsWith("read") || value.includes("writ")) return "reading";
  return null;
}

const CHANNEL_STRENGTHS: Record<Channel, string[]> = {
  visual: ["creativity"],
  auditory: ["communication"],
  kinesthetic: ["movement"],
  reading: ["language"],
};

const CHANNEL_SUPPORTS: Record<Channel, string> = {
  visual: "visual_supports",
  auditory: "verbal_explanations",
  kinesthetic: "hands_on_activities",
  reading: "written_instructions",
};

const NEUROTYPE_SUPPORTS: Record<Neurotype, string[]> = {
  ASD: ["structured_routines", "predictable_environment"],
  ADHD: ["clear_instructions", "frequent_breaks"],
  gifted: ["extra_challenges", "autonomous_projects"],
  typical: [],
  other: [],
};

const ROLE_BY_CHANNEL: Partial<Record<Channel, string>> = {
  visual: "visual_designer",
  auditory: "communicator",
  kinesthetic: "experimenter",
};

const ROLE_BY_CATEGORY: Record<string, string> = {
  science: "researcher",
  collaboration: "group_facilitator",
  language: "information_analyst",
  movement: "experimenter",
};

export const BASE_AVAILABILITY = 85;

function unique(values: string[]): string[] {
  return [...new Set(values.filter((value) => value.length > 0))];
}

function interestCategories(interests: string[]): string[] {
  return interests.flatMap((interest) => matchCategories(interest).map((c) => c.category));
}

export function deriveStrengths(input: ParticipantInput): string[] {
  const channel = toChannel(input.preferredChannel);
  const strengths = [
    ...input.strengths.map(normalizeTag),
    ...interestCategories(input.interests),
    ...(channel ? CHANNEL_STRENGTHS[channel] : []),
  ];
  if (input.temperament === "reflective") strengths.push("precision");
  if (input.frustrationTolerance === "high") strengths.push("perseverance");
  return unique(strengths);
}

export function deriveSupportNeeds(input: ParticipantInput, neurotype: Neurotype): string[] {
  const needs: string[] = [];
  if (input.supportLevel === "high") needs.push("continuous_supervision");
  if (input.supportLevel === "medium") needs.push("regular_check_ins");
  if (input.frustrationTolerance === "low") needs.push("emotional_support", "graded_tasks");

  const channel = toChannel(input.preferredChannel);
  if (channel) needs.push(CHANNEL_SUPPORTS[channel]);

  needs.push(...NEUROTYPE_SUPPORTS[neurotype]);
  return unique(needs);
}

export function deriveAvailability(input: ParticipantInput): number {
  if (input.availability !== undefined) return Math.round(input.availability);

  let availability = BASE_AVAILABILITY;
  if (input.supportLevel === "low") availability += 10;
  if (input.supportLevel === "high") availability -= 15;
  if (input.frustrationTolerance === "high") availability += 5;
  if (input.frustrationTolerance === "low") availability -= 10;
  if (input.temperament === "impulsive") availability -= 5;
  return Math.max(60, Math.min(100, availability));
}

export function deriveRoleHistory(input: ParticipantInput, neurotype: Neurotype): string[] {
  const roles: string[] = [];
  for (const style of input.learningStyle) {
    const channel = toChannel(style);
    const role = channel ? ROLE_BY_CHANNEL[channel] : undefined;
    if (role) roles.push(role);
  }
  for (const category of interestCategories(input.interests)) {
    const role = ROLE_BY_CATEGORY[category];
    if (role) roles.push(role);
  }
  if (neurotype === "gifted") roles.push("academic_mentor");
  return unique(roles);
}

export function deriveProfile(input: ParticipantInput): ParticipantProfile {
  const neurotype = toNeurotype(input.diagnosticCategory);
  return Object.freeze({
    id: input.id,
    name: input.name,
    strengths: Object.freeze(deriveStrengths(input)),
    supportNeeds: Object.freeze(deriveSupportNeeds(input, neurotype)),
    neurotype,
    availability: deriveAvailability(input),
    roleHistory: Object.freeze(deriveRoleHistory(input, neurotype)),
  });
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

/**
 * Immutable once built; safe to share across concurrent requests.
 */
export class ParticipantRepository {
  private readonly profiles: readonly ParticipantProfile[];
  private readonly byId: ReadonlyMap<string, ParticipantProfile>;

  private constructor(profiles: ParticipantProfile[]) {
    this.profiles = Object.freeze(profiles.map((profile) => Object.freeze({ ...profile })));
    this.byId = new Map(this.profiles.map((profile) => [profile.id, profile]));
    Object.freeze(this);
  }

  static fromProfiles(profiles: ParticipantProfile[]): Result<ParticipantRepository, string> {
    const seen = new Set<string>();
    for (const profile of profiles) {
      if (seen.has(profile.id)) return err(`Duplicate participant id "${profile.id}"`);
      seen.add(profile.id);
    }
    return ok(new ParticipantRepository(profiles));
  }

  /** Validate external records and derive their profiles. */
  static fromRecords(records: unknown): Result<ParticipantRepository, string> {
    const parsed = ParticipantListSchema.safeParse(records);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      return err(`Invalid participant records: ${issues}`);
    }
    return ParticipantRepository.fromProfiles(parsed.data.map(deriveProfile));
  }

  static async fromFile(path: string): Promise<Result<ParticipantRepository, string>> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      return err(`Could not read ${path}: ${describeError(error)}`);
    }

    let records: unknown;
    try {
      records = JSON.parse(raw);
    } catch (error) {
      return err(`${path} is not valid JSON: ${describeError(error)}`);
    }
    return ParticipantRepository.fromRecords(records);
  }

  get size(): number {
    return this.profiles.length;
  }

  all(): readonly ParticipantProfile[] {
    return this.profiles;
  }

  get(id: string): ParticipantProfile | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }
}
