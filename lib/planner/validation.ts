/**
 * Input validation schemas for participant records and preference weights.
 */

import { z } from "zod";
import { err, ok } from "./result";
import type { Result } from "./result";
import { DEFAULT_PREFERENCE_WEIGHTS } from "./types";
import type { PreferenceWeights } from "./types";

export const SUPPORT_LEVELS = ["low", "medium", "high"] as const;

const Level = z.enum(SUPPORT_LEVELS);

export const ParticipantInputSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
  name: z
    .string()
    .trim()
    .min(1, "Name must not be empty")
    .max(200, "Name must be at most 200 characters"),
  diagnosticCategory: z.string().trim(),
  preferredChannel: z.string().trim().toLowerCase(),
  supportLevel: Level.optional(),
  frustrationTolerance: Level.optional(),
  temperament: z.string().trim().toLowerCase().optional(),
  interests: z.array(z.string().trim().min(1)).default([]),
  learningStyle: z.array(z.string().trim().toLowerCase()).default([]),
  strengths: z.array(z.string().trim().min(1)).default([]),
  availability: z.number().min(0).max(100).optional(),
});

export type ParticipantInput = z.infer<typeof ParticipantInputSchema>;

export const ParticipantListSchema = z.array(ParticipantInputSchema);

const Weight = z.number().min(0, "Weights are in [0, 1]").max(1, "Weights are in [0, 1]");

export const PreferenceWeightsSchema = z
  .object({
    structure: Weight,
    collaboration: Weight,
    flexibility: Weight,
  })
  .partial();

/**
 * Fill omitted weights with the neutral default. Out-of-range values are
 * rejected, not clamped.
 */
export function parsePreferenceWeights(input: unknown): Result<PreferenceWeights, string> {
  const parsed = PreferenceWeightsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return err(`Invalid preference weights: ${issues}`);
  }
  return ok({ ...DEFAULT_PREFERENCE_WEIGHTS, ...stripUndefined(parsed.data) });
}

function stripUndefined(weights: Partial<PreferenceWeights>): Partial<PreferenceWeights> {
  const out: Partial<PreferenceWeights> = {};
  if (weights.structure !== undefined) out.structure = weights.structure;
  if (weights.collaboration !== undefined) out.collaboration = weights.collaboration;
  if (weights.flexibility !== undefined) out.flexibility = weights.flexibility;
  return out;
}
