/**
 * Text generation over OpenRouter through the Vercel AI SDK.
 *
 * Every planner component talks to a TextGenerationClient; this is the
 * production one. Failures come back as GenerationFailure results.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import { GenerationFailure } from "./errors";
import { err, ok } from "./result";
import type { Result } from "./result";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export interface GenerationResult {
  content: string;
  responseTimeMs: number;
}

export type GenerationOutcome = Result<GenerationResult, GenerationFailure>;

export interface TextGenerationClient {
  generate(prompt: string, maxTokens: number, timeoutMs: number): Promise<GenerationOutcome>;
}

/**
 * Create a Vercel AI SDK provider configured for OpenRouter.
 */
function getOpenRouterProvider(apiKey: string | undefined) {
  if (!apiKey) {
    throw new Error("OPENROUTER_API_KEY environment variable is not set");
  }

  return createOpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey,
  });
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Text client bound to a single OpenRouter model.
 *
 * @param model - OpenRouter model identifier (e.g. "openai/gpt-4o")
 * @param apiKey - Defaults to OPENROUTER_API_KEY
 */
export function createOpenRouterClient(
  model: string,
  apiKey: string | undefined = process.env.OPENROUTER_API_KEY
): TextGenerationClient {
  return {
    async generate(prompt, maxTokens, timeoutMs) {
      const start = Date.now();

      try {
        const provider = getOpenRouterProvider(apiKey);
        const result = await generateText({
          model: provider(model),
          prompt,
          maxTokens,
          abortSignal: AbortSignal.timeout(timeoutMs),
        });

        if (!result.text.trim()) {
          return err(new GenerationFailure("empty", `${model} returned an empty response`));
        }

        return ok({
          content: result.text,
          responseTimeMs: Date.now() - start,
        });
      } catch (error) {
        console.error(`[openrouter] Error querying ${model}:`, error);
        if (isAbortError(error)) {
          return err(
            new GenerationFailure("timeout", `${model} timed out after ${timeoutMs}ms`, { cause: error })
          );
        }
        return err(new GenerationFailure("error", `${model} request failed`, { cause: error }));
      }
    },
  };
}
