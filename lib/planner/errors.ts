/**
 * Failure types. These are returned inside Results, not thrown across
 * component boundaries.
 */

export type GenerationFailureKind = "error" | "timeout" | "empty";

/** The text service failed, timed out, or answered with nothing. */
export class GenerationFailure extends Error {
  readonly kind: GenerationFailureKind;

  constructor(kind: GenerationFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationFailure";
    this.kind = kind;
  }
}

/** The assignment engine was handed an empty participant list. */
export class NoParticipantsError extends Error {
  constructor() {
    super("No participants available for assignment");
    this.name = "NoParticipantsError";
  }
}

/** A collaborator or optimizer did not settle within its budget. */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
