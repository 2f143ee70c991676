/**
 * Strict field parse: the format the decomposition prompt asks for:
 *
 *   ITEM 1:
 *   Description: ...
 *   Competencies: mathematics, precision
 *   Complexity: 3
 *   Type: group
 *   Dependencies: none
 *   Duration: 30 minutes
 *
 * Every block must carry a Description; one bare block fails the parse.
 */

import { err, ok } from "../result";
import {
  STRICT_FIELDS,
  applyContinuation,
  applyField,
  buildDraft,
  matchFieldLine,
  newBuilder,
} from "./fields";
import type { DraftBuilder } from "./fields";
import type { ParseInput, ParseStrategy, StrategyResult } from "./types";

export const BLOCK_HEADER =
  /^\s*(?:#{1,6}\s*)?\**\s*(?:ITEM|TASK)\s*#?\s*([A-Za-z]*[_-]?\d+)\s*\**\s*:\s*\**\s*(.*)$/i;

export function parseStrictBlocks(text: string): StrategyResult {
  const blocks: DraftBuilder[] = [];
  let current: DraftBuilder | null = null;

  for (const line of text.split("\n")) {
    const header = line.match(BLOCK_HEADER);
    if (header) {
      current = newBuilder(header[1].toLowerCase());
      blocks.push(current);
      const inline = matchFieldLine(header[2], STRICT_FIELDS);
      if (inline) applyField(current, inline);
      continue;
    }
    if (!current) continue;

    const field = matchFieldLine(line, STRICT_FIELDS);
    if (field) {
      applyField(current, field);
    } else {
      applyContinuation(current, line);
    }
  }

  if (blocks.length === 0) return err("no_blocks");

  const drafts = blocks.map((block) => buildDraft(block, false));
  if (drafts.some((draft) => !draft.description)) return err("missing_description");
  return ok(drafts);
}

export const strictFieldStrategy: ParseStrategy = {
  name: "strict-field",
  confidence: 0.95,
  async attempt({ text }: ParseInput) {
    return parseStrictBlocks(text);
  },
};
