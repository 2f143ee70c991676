/**
 * Pull a JSON value out of model output: a fenced ```json block first,
 * then the outermost {...} span, then the whole text.
 */

import { describeError } from "../errors";
import { err, ok } from "../result";
import type { Result } from "../result";

function tryParse(candidate: string): Result<unknown, string> {
  try {
    return ok(JSON.parse(candidate));
  } catch (error) {
    return err(describeError(error));
  }
}

export function extractJson(text: string): Result<unknown, string> {
  if (!text || !text.trim()) return err("empty text");

  const candidates: string[] = [];

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) candidates.push(fenced[1].trim());

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) candidates.push(text.slice(start, end + 1));

  candidates.push(text.trim());

  let lastError = "no JSON found";
  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed;
    lastError = parsed.error;
  }
  return err(lastError);
}
