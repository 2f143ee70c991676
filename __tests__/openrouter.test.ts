/**
 * Tests for the OpenRouter text client. The AI SDK is mocked; no request
 * leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("ai", () => ({
  generateText: vi.fn(),
}));

vi.mock("@ai-sdk/openai", () => ({
  createOpenAI: vi.fn(() => (modelId: string) => ({ modelId })),
}));

import { generateText } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createOpenRouterClient } from "@/lib/planner/openrouter";
import { DEFAULT_PLANNER_CONFIG } from "@/lib/planner/config";
import { runPlanningPipeline } from "@/lib/planner/pipeline";
import { makeProfile, quietContext } from "./fixtures";

const mockGenerateText = vi.mocked(generateText);

function textResult(text: string): Awaited<ReturnType<typeof generateText>> {
  return { text } as Awaited<ReturnType<typeof generateText>>;
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("createOpenRouterClient", () => {
  it("returns the generated text", async () => {
    mockGenerateText.mockResolvedValue(textResult("ITEM 1:\nDescription: Plant seeds"));

    const client = createOpenRouterClient("openai/gpt-4o", "test-secret");
    const result = await client.generate("Plan a garden", 500, 1_000);

    expect(result.ok && result.value.content).toBe("ITEM 1:\nDescription: Plant seeds");
    expect(createOpenAI).toHaveBeenCalledWith({
      baseURL: "https://openrouter.ai/api/v1",
      apiKey: "test-secret",
    });
    expect(mockGenerateText).toHaveBeenCalledWith(
      expect.objectContaining({ prompt: "Plan a garden", maxTokens: 500 })
    );
  });

  it("reports blank output as empty", async () => {
    mockGenerateText.mockResolvedValue(textResult("   "));

    const result = await createOpenRouterClient("openai/gpt-4o", "test-secret").generate("x", 10, 1_000);

    expect(!result.ok && result.error.kind).toBe("empty");
  });

  it("reports an aborted request as a timeout", async () => {
    const aborted = new Error("The operation was aborted due to timeout");
    aborted.name = "TimeoutError";
    mockGenerateText.mockRejectedValue(aborted);

    const result = await createOpenRouterClient("openai/gpt-4o", "test-secret").generate("x", 10, 250);

    expect(!result.ok && result.error.kind).toBe("timeout");
    expect(!result.ok && result.error.message).toBe("openai/gpt-4o timed out after 250ms");
  });

  it("reports other failures as errors", async () => {
    mockGenerateText.mockRejectedValue(new Error("502 Bad Gateway"));

    const result = await createOpenRouterClient("openai/gpt-4o", "test-secret").generate("x", 10, 1_000);

    expect(!result.ok && result.error.kind).toBe("error");
  });

  it("fails without an API key and never calls the SDK", async () => {
    const result = await createOpenRouterClient("openai/gpt-4o", "").generate("x", 10, 1_000);

    expect(!result.ok && result.error.kind).toBe("error");
    expect(mockGenerateText).not.toHaveBeenCalled();
  });
});

describe("runPlanningPipeline without a client", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("generates through OpenRouter with the configured model", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "test-secret");
    mockGenerateText.mockResolvedValue(
      textResult("ITEM 1:\nDescription: Cut the kite frame\n\nITEM 2:\nDescription: Glue the paper sail")
    );

    const result = await runPlanningPipeline(
      { intent: "Build a kite" },
      {
        participants: [makeProfile("P1")],
        config: { ...DEFAULT_PLANNER_CONFIG, model: "test/planner-model", useConsensus: false },
        ctx: quietContext(),
      }
    );

    expect(mockGenerateText).toHaveBeenCalledTimes(1);
    expect(mockGenerateText).toHaveBeenCalledWith(
      expect.objectContaining({ model: { modelId: "test/planner-model" } })
    );
    expect(result.parse?.strategy).toBe("strict-field");
    expect(result.items.map((item) => item.description)).toEqual(["Cut the kite frame", "Glue the paper sail"]);
  });
});
