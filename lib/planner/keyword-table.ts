/**
 * Keyword classification: one static {category → keywords} table.
 *
 * The table drives both collaboration-mode inference and competency
 * tagging. Lookups walk the categories in declaration order and the first
 * category carrying a mode decides the mode.
 *
 * Overlapping matches are resolved by declaration order alone. That order
 * is inherited behavior, not a product decision; see DESIGN.md before
 * reordering entries.
 */

import { z } from "zod";
import keywordTableData from "./data/keyword-table.json";
import type { CollaborationMode } from "./types";

export const DEFAULT_COMPETENCY = "transversal";
export const DEFAULT_STAGE = "execution";

const KeywordTableSchema = z.object({
  categories: z
    .array(
      z.object({
        category: z.string().min(1),
        mode: z.enum(["individual", "pair", "group"]).nullable(),
        keywords: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
  stages: z.array(
    z.object({
      stage: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
    })
  ),
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;
export type KeywordCategory = KeywordTable["categories"][number];

export const KEYWORD_TABLE: KeywordTable = KeywordTableSchema.parse(keywordTableData);

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Keywords match at the start of a word, so stems like "measur" work. */
function compileKeywords(keywords: string[]): RegExp[] {
  return keywords.map(
    (keyword) => new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(keyword)}`, "iu")
  );
}

const COMPILED_CATEGORIES = KEYWORD_TABLE.categories.map((entry) => ({
  ...entry,
  patterns: compileKeywords(entry.keywords),
}));

const COMPILED_STAGES = KEYWORD_TABLE.stages.map((entry) => ({
  ...entry,
  patterns: compileKeywords(entry.keywords),
}));

function matchesAny(text: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

/**
 * Categories whose keywords appear in the text, in declaration order.
 */
export function matchCategories(text: string): KeywordCategory[] {
  if (!text.trim()) return [];
  return COMPILED_CATEGORIES.filter((entry) => matchesAny(text, entry.patterns)).map(
    ({ category, mode, keywords }) => ({ category, mode, keywords })
  );
}

/**
 * First matching category that carries a mode wins. Null when nothing
 * matches; the normalizer decides the default.
 */
export function classifyCollaborationMode(text: string): CollaborationMode | null {
  for (const entry of COMPILED_CATEGORIES) {
    if (entry.mode !== null && matchesAny(text, entry.patterns)) {
      return entry.mode;
    }
  }
  return null;
}

export function inferCompetencies(text: string): string[] {
  const matched = matchCategories(text).map((entry) => entry.category);
  return matched.length > 0 ? matched : [DEFAULT_COMPETENCY];
}

export function inferStage(text: string): string {
  for (const entry of COMPILED_STAGES) {
    if (matchesAny(text, entry.patterns)) return entry.stage;
  }
  return DEFAULT_STAGE;
}
