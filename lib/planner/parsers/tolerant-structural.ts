/**
 * Tolerant structural parse: numbered lists, bullets, bold titles,
 * "Step n:" headings, or loose colon fields with synonyms.
 *
 * Fields the text does not state are left empty; the normalizer's keyword
 * table classifies them later.
 */

import { err, ok } from "../result";
import {
  FIELD_SYNONYMS,
  applyField,
  buildDraft,
  cleanInline,
  matchFieldLine,
  newBuilder,
} from "./fields";
import type { DraftBuilder } from "./fields";
import type { ParseInput, ParseStrategy, StrategyResult } from "./types";

type StartKind = "headed" | "numbered" | "bullet" | "bold";

interface StartLine {
  sourceId?: string;
  content: string;
}

const START_PATTERNS: Record<StartKind, RegExp> = {
  headed: /^\s*(?:#{1,6}\s*)?\**\s*(?:item|task|step|activity)\s*#?\s*(\d+)\s*\**\s*[:.)-]\s*(.*)$/i,
  numbered: /^\s*(?:#{1,6}\s*)?(\d+)[.)]\s+(.*)$/,
  bullet: /^\s*[-*•]\s+()(.*)$/,
  bold: /^\s*(?:#{1,6}\s*)?()(\*\*.+?\*\*.*)$/,
};

const START_PRECEDENCE: StartKind[] = ["headed", "numbered", "bullet", "bold"];

function matchStart(line: string, kind: StartKind): StartLine | null {
  const match = line.match(START_PATTERNS[kind]);
  if (!match) return null;
  return { sourceId: match[1] || undefined, content: match[2] };
}

/** The first kind in precedence order that occurs anywhere in the text. */
function detectStartKind(lines: string[]): StartKind | null {
  for (const kind of START_PRECEDENCE) {
    if (lines.some((line) => matchStart(line, kind) !== null)) return kind;
  }
  return null;
}

function appendToHeadline(builder: DraftBuilder, text: string): void {
  builder.headline = builder.headline ? `${builder.headline} ${text}` : text;
}

function finish(builders: DraftBuilder[]): StrategyResult {
  const drafts = builders.map((builder) => buildDraft(builder, true));
  if (drafts.some((draft) => !draft.description)) return err("missing_description");
  return ok(drafts);
}

function parseListSegments(lines: string[], kind: StartKind): StrategyResult {
  const builders: DraftBuilder[] = [];
  let current: DraftBuilder | null = null;
  let afterBlank = false;

  for (const line of lines) {
    if (!line.trim()) {
      afterBlank = true;
      continue;
    }

    const start = matchStart(line, kind);
    if (start) {
      const field = matchFieldLine(start.content, FIELD_SYNONYMS);
      if (field && field.field !== "description" && current) {
        applyField(current, field);
      } else {
        current = newBuilder(start.sourceId);
        builders.push(current);
        if (field) {
          applyField(current, field);
        } else {
          current.headline = cleanInline(start.content);
        }
      }
      afterBlank = false;
      continue;
    }

    if (!current) continue;

    const field = matchFieldLine(line, FIELD_SYNONYMS);
    if (field) {
      applyField(current, field);
      afterBlank = false;
      continue;
    }

    // Prose right under an item extends it; prose after a blank line is
    // commentary.
    if (afterBlank) continue;
    const text = cleanInline(line.replace(/^\s*[-*•]\s+/, ""));
    if (!text) continue;
    if (current.lastField === "description") {
      current.description.push(text);
    } else if (current.lastField === null) {
      appendToHeadline(current, text);
    }
  }

  return builders.length > 0 ? finish(builders) : err("no_list_structure");
}

/**
 * No list markers at all: a description-like field ("Task:", "Activity:")
 * opens each item and the other fields attach to it.
 */
function parseLooseFields(lines: string[]): StrategyResult {
  const builders: DraftBuilder[] = [];
  let current: DraftBuilder | null = null;

  for (const line of lines) {
    const field = matchFieldLine(line, FIELD_SYNONYMS);
    if (!field) continue;
    if (field.field === "description" || !current) {
      current = newBuilder();
      builders.push(current);
    }
    applyField(current, field);
  }

  if (!builders.some((builder) => builder.description.length > 0)) {
    return err("no_list_structure");
  }
  return finish(builders);
}

export function parseStructural(text: string): StrategyResult {
  const lines = text.split("\n");
  const kind = detectStartKind(lines);
  return kind ? parseListSegments(lines, kind) : parseLooseFields(lines);
}

export const tolerantStructuralStrategy: ParseStrategy = {
  name: "tolerant-structural",
  confidence: 0.75,
  async attempt({ text }: ParseInput) {
    return parseStructural(text);
  },
};
