/**
 * Planner configuration: typed defaults, overridable from the environment.
 */

import { z } from "zod";
import type { LogLevel } from "./logger";

export interface PlannerConfig {
  /** OpenRouter model identifier used for every generation call */
  model: string;
  maxTokens: number;
  /** Budget for each text-service, proposer, or optimizer call */
  timeoutMs: number;
  /** Upper bound on items kept from one decomposition */
  maxItems: number;
  /** Examples pulled from the retriever to enrich the decomposition prompt */
  exampleCount: number;
  useConsensus: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  model: "anthropic/claude-sonnet-4",
  maxTokens: 1_200,
  timeoutMs: 60_000,
  maxItems: 12,
  exampleCount: 2,
  useConsensus: true,
  logLevel: "info",
};

const BoolFromString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  PLANNER_MODEL: z.string().trim().min(1).optional(),
  PLANNER_MAX_TOKENS: z.coerce.number().int().min(64).max(32_000).optional(),
  PLANNER_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(600_000).optional(),
  PLANNER_MAX_ITEMS: z.coerce.number().int().min(1).max(50).optional(),
  PLANNER_EXAMPLE_COUNT: z.coerce.number().int().min(0).max(10).optional(),
  PLANNER_USE_CONSENSUS: BoolFromString.optional(),
  PLANNER_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

/**
 * Read overrides from environment variables. Invalid values are rejected
 * with the zod issue list rather than silently ignored.
 */
export function loadPlannerConfig(
  env: Record<string, string | undefined> = process.env,
  base: PlannerConfig = DEFAULT_PLANNER_CONFIG
): PlannerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid planner environment: ${issues}`);
  }

  const vars = parsed.data;
  return {
    model: vars.PLANNER_MODEL ?? base.model,
    maxTokens: vars.PLANNER_MAX_TOKENS ?? base.maxTokens,
    timeoutMs: vars.PLANNER_TIMEOUT_MS ?? base.timeoutMs,
    maxItems: vars.PLANNER_MAX_ITEMS ?? base.maxItems,
    exampleCount: vars.PLANNER_EXAMPLE_COUNT ?? base.exampleCount,
    useConsensus: vars.PLANNER_USE_CONSENSUS ?? base.useConsensus,
    logLevel: vars.PLANNER_LOG_LEVEL ?? base.logLevel,
  };
}
