/**
 * Minimal single-field parse: each prose line of at least three words
 * becomes a description-only draft.
 */

import { err, ok } from "../result";
import { cleanInline } from "./fields";
import type { ParseInput, ParseStrategy, StrategyResult } from "./types";
import type { WorkItemDraft } from "../types";

export const MIN_WORDS_PER_LINE = 3;

const LINE_MARKER = /^\s*(?:#{1,6}\s+|>\s*|\d+[.)]\s+|[-*•]\s+)+/;

function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => /[\p{L}\p{N}]/u.test(word)).length;
}

export function parseProseLines(text: string): StrategyResult {
  const drafts: WorkItemDraft[] = [];

  for (const line of text.split("\n")) {
    const cleaned = cleanInline(line.replace(LINE_MARKER, ""));
    // headings such as "Here is the plan:" introduce items, they are not one
    if (!cleaned || cleaned.endsWith(":")) continue;
    if (countWords(cleaned) < MIN_WORDS_PER_LINE) continue;
    drafts.push({ description: cleaned });
  }

  return drafts.length > 0 ? ok(drafts) : err("no_prose_lines");
}

export const minimalLineStrategy: ParseStrategy = {
  name: "minimal-line",
  confidence: 0.4,
  async attempt({ text }: ParseInput) {
    return parseProseLines(text);
  },
};
