/**
 * Tests for shared infrastructure:
 * - Environment configuration
 * - Preference weight validation
 * - Request context and timeouts
 * - Logger levels and scopes
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_PLANNER_CONFIG, loadPlannerConfig } from "@/lib/planner/config";
import { createRequestContext, withTimeout } from "@/lib/planner/context";
import { TimeoutError, describeError } from "@/lib/planner/errors";
import { createLogger } from "@/lib/planner/logger";
import { parsePreferenceWeights } from "@/lib/planner/validation";

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe("loadPlannerConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadPlannerConfig({})).toEqual(DEFAULT_PLANNER_CONFIG);
  });

  it("applies overrides and ignores unrelated variables", () => {
    const config = loadPlannerConfig({
      PLANNER_MODEL: "openai/gpt-4o",
      PLANNER_MAX_TOKENS: "2000",
      PLANNER_MAX_ITEMS: "8",
      PLANNER_USE_CONSENSUS: "false",
      PLANNER_LOG_LEVEL: "debug",
      HOME: "/home/test",
    });

    expect(config).toEqual({
      ...DEFAULT_PLANNER_CONFIG,
      model: "openai/gpt-4o",
      maxTokens: 2000,
      maxItems: 8,
      useConsensus: false,
      logLevel: "debug",
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadPlannerConfig({ PLANNER_TIMEOUT_MS: "fast" })).toThrow(
      /^Invalid planner environment: PLANNER_TIMEOUT_MS/
    );
    expect(() => loadPlannerConfig({ PLANNER_LOG_LEVEL: "loud" })).toThrow(/PLANNER_LOG_LEVEL/);
  });
});

describe("parsePreferenceWeights", () => {
  it("fills omitted weights with 0.5", () => {
    expect(parsePreferenceWeights({ structure: 0.8 })).toEqual({
      ok: true,
      value: { structure: 0.8, collaboration: 0.5, flexibility: 0.5 },
    });
    expect(parsePreferenceWeights(undefined)).toEqual({
      ok: true,
      value: { structure: 0.5, collaboration: 0.5, flexibility: 0.5 },
    });
  });

  it("rejects out-of-range weights", () => {
    expect(parsePreferenceWeights({ flexibility: 2 })).toEqual({
      ok: false,
      error: "Invalid preference weights: flexibility: Weights are in [0, 1]",
    });
  });
});

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

describe("createRequestContext", () => {
  it("is frozen and keeps the given budgets", () => {
    const ctx = createRequestContext({ requestId: "req-1", timeoutMs: 500, maxTokens: 300 });
    expect(Object.isFrozen(ctx)).toBe(true);
    expect(ctx.requestId).toBe("req-1");
    expect(ctx.timeoutMs).toBe(500);
    expect(ctx.maxTokens).toBe(300);
  });

  it("generates a request id when none is given", () => {
    expect(createRequestContext().requestId).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("withTimeout", () => {
  it("resolves when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), 100, "answer")).resolves.toBe(42);
  });

  it("rejects with TimeoutError when the budget runs out", async () => {
    const slow = new Promise<number>((resolve) => setTimeout(() => resolve(1), 200));
    const outcome = withTimeout(slow, 10, "slow call");
    await expect(outcome).rejects.toBeInstanceOf(TimeoutError);
    await expect(outcome).rejects.toThrow("slow call timed out after 10ms");
  });
});

describe("describeError", () => {
  it("reads messages from errors and stringifies anything else", () => {
    expect(describeError(new Error("broken"))).toBe("broken");
    expect(describeError("plain")).toBe("plain");
  });
});

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

describe("createLogger", () => {
  it("drops messages below the threshold", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const log = createLogger("planner", "warn");
    log.info("hidden");
    log.warn("shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[planner] shown");
  });

  it("prefixes child scopes and passes metadata", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("planner").child("parser").error("failed", { strategy: "strict-field" });

    expect(error).toHaveBeenCalledWith("[planner:parser] failed", { strategy: "strict-field" });
  });
});
