/**
 * Per-request context threaded through every component call.
 *
 * Frozen on creation. Components log through `ctx.logger.child(...)` and
 * read budgets from here; nothing request-scoped lives in module state.
 */

import { randomUUID } from "node:crypto";
import { createLogger } from "./logger";
import type { LogLevel, Logger } from "./logger";
import { TimeoutError } from "./errors";

export interface RequestContext {
  readonly requestId: string;
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly logger: Logger;
}

export interface RequestContextOptions
  extends Partial<Pick<RequestContext, "requestId" | "timeoutMs" | "maxTokens" | "logger">> {
  /** Threshold for the default logger; ignored when a logger is given */
  logLevel?: LogLevel;
}

export function createRequestContext(options: RequestContextOptions = {}): RequestContext {
  const requestId = options.requestId ?? randomUUID();
  return Object.freeze({
    requestId,
    timeoutMs: options.timeoutMs ?? 60_000,
    maxTokens: options.maxTokens ?? 1_200,
    logger: options.logger ?? createLogger(`planner:${requestId.slice(0, 8)}`, options.logLevel),
  });
}

/**
 * Race a promise against the request budget. The timer is cleared either
 * way so nothing keeps the process alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
