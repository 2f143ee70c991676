/**
 * Field vocabulary and value readers shared by the structured strategies.
 */

import type { CollaborationMode, WorkItemDraft } from "../types";

export type FieldName =
  | "description"
  | "competencies"
  | "complexity"
  | "mode"
  | "dependencies"
  | "duration"
  | "stage";

/** The vocabulary the decomposition prompt asks for. */
export const STRICT_FIELDS: Readonly<Record<string, FieldName>> = {
  description: "description",
  competencies: "competencies",
  complexity: "complexity",
  type: "mode",
  dependencies: "dependencies",
  duration: "duration",
  stage: "stage",
};

/** What generators write instead when they drift from the template. */
export const FIELD_SYNONYMS: Readonly<Record<string, FieldName>> = {
  ...STRICT_FIELDS,
  task: "description",
  activity: "description",
  details: "description",
  competences: "competencies",
  competency: "competencies",
  skills: "competencies",
  skill: "competencies",
  tags: "competencies",
  difficulty: "complexity",
  level: "complexity",
  mode: "mode",
  format: "mode",
  grouping: "mode",
  "collaboration mode": "mode",
  time: "duration",
  minutes: "duration",
  "estimated time": "duration",
  "estimated duration": "duration",
  after: "dependencies",
  requires: "dependencies",
  "depends on": "dependencies",
  prerequisites: "dependencies",
  phase: "stage",
};

const FIELD_LINE =
  /^\s*(?:[-*•]\s+)?\**\s*([A-Za-z][A-Za-z ]*?)\s*\**\s*:\s*\**\s*(.*?)\s*$/;

export interface FieldLine {
  field: FieldName;
  value: string;
}

/**
 * Match a `Field: value` line against a vocabulary. Bullets and bold
 * markers around the label are tolerated.
 */
export function matchFieldLine(
  line: string,
  vocabulary: Readonly<Record<string, FieldName>>
): FieldLine | null {
  const match = line.match(FIELD_LINE);
  if (!match) return null;
  const label = match[1].trim().toLowerCase().replace(/\s+/g, " ");
  const field = vocabulary[label];
  if (!field) return null;
  return { field, value: cleanInline(match[2]) };
}

export function cleanInline(text: string): string {
  return text.replace(/\*\*|__|`/g, "").replace(/\s+/g, " ").trim();
}

// ---------------------------------------------------------------------------
// Value readers
// ---------------------------------------------------------------------------

const NONE_VALUE = /^(?:none|n\/a|no|nothing|-+|—)\.?$/i;

export function isNoneValue(value: string): boolean {
  return NONE_VALUE.test(value.trim());
}

export function parseTagList(value: string): string[] {
  if (isNoneValue(value)) return [];
  return value
    .split(/[,;/|]/)
    .map((tag) => cleanInline(tag).replace(/\.$/, ""))
    .filter((tag) => tag.length > 0);
}

export function parseReferenceList(value: string): string[] {
  if (isNoneValue(value)) return [];
  return value
    .split(/[,;&]|\s+and\s+/i)
    .map((ref) => cleanInline(ref).replace(/\.$/, ""))
    .filter((ref) => ref.length > 0 && !isNoneValue(ref));
}

const WORD_COMPLEXITY: Array<[RegExp, number]> = [
  [/\bvery\s+(?:low|easy|simple)\b/i, 1],
  [/\bvery\s+(?:high|hard|difficult)\b|\bexpert\b/i, 5],
  [/\b(?:low|easy|simple|basic)\b/i, 2],
  [/\b(?:medium|moderate|intermediate|average)\b/i, 3],
  [/\b(?:high|hard|difficult|advanced|challenging)\b/i, 4],
];

/**
 * Numeric ("4", "4/5", "8/10") or word ("low", "medium", "high")
 * complexity. Returns undefined when nothing is recognized.
 */
export function parseComplexity(value: string): number | undefined {
  const numeric = value.match(/(\d+(?:\.\d+)?)(?:\s*\/\s*(\d+))?/);
  if (numeric) {
    const n = parseFloat(numeric[1]);
    const scale = numeric[2] ? parseInt(numeric[2], 10) : 5;
    if (!isNaN(n) && scale > 0) return (n * 5) / scale;
  }

  for (const [pattern, level] of WORD_COMPLEXITY) {
    if (pattern.test(value)) return level;
  }
  return undefined;
}

const DURATION_UNITS: Array<[RegExp, number]> = [
  [/^\s*(?:h|hrs?|hours?)\b/i, 60],
  [/^\s*(?:sessions?|periods?|lessons?|classes)\b/i, 45],
  [/^\s*(?:m|mins?|minutes?)\b/i, 1],
];

/**
 * Duration in minutes. Bare numbers are minutes; hours count 60 and
 * sessions 45.
 */
export function parseDurationMinutes(value: string): number | undefined {
  const numeric = value.match(/(\d+(?:\.\d+)?)/);
  if (!numeric) return undefined;
  const amount = parseFloat(numeric[1]);
  if (isNaN(amount) || amount <= 0) return undefined;

  const unitText = value.slice((numeric.index ?? 0) + numeric[1].length);
  let multiplier = 1;
  for (const [pattern, factor] of DURATION_UNITS) {
    if (pattern.test(unitText)) {
      multiplier = factor;
      break;
    }
  }
  return Math.round(amount * multiplier);
}

export function parseCollaborationMode(value: string): CollaborationMode | undefined {
  if (/\b(?:pairs?|partners?|peers?|twos|dyads?)\b/i.test(value)) return "pair";
  if (/\b(?:group|team|collaborative|cooperative|whole class|small groups?)\b/i.test(value)) {
    return "group";
  }
  if (/\b(?:individual|individually|solo|alone|independent)\b/i.test(value)) {
    return "individual";
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Draft builder
// ---------------------------------------------------------------------------

/** Mutable accumulator used while scanning one block of text. */
export interface DraftBuilder {
  sourceId?: string;
  headline: string;
  description: string[];
  fields: Omit<WorkItemDraft, "description" | "sourceId">;
  lastField: FieldName | null;
}

export function newBuilder(sourceId?: string, headline = ""): DraftBuilder {
  return { sourceId, headline, description: [], fields: {}, lastField: null };
}

export function applyField(builder: DraftBuilder, { field, value }: FieldLine): void {
  builder.lastField = field;
  switch (field) {
    case "description":
      if (value) builder.description.push(value);
      break;
    case "competencies":
      builder.fields.requiredCompetencies = [
        ...(builder.fields.requiredCompetencies ?? []),
        ...parseTagList(value),
      ];
      break;
    case "complexity":
      builder.fields.complexity = parseComplexity(value) ?? builder.fields.complexity;
      break;
    case "mode":
      builder.fields.collaborationMode =
        parseCollaborationMode(value) ?? builder.fields.collaborationMode;
      break;
    case "dependencies":
      builder.fields.dependencies = [
        ...(builder.fields.dependencies ?? []),
        ...parseReferenceList(value),
      ];
      break;
    case "duration":
      builder.fields.estimatedDurationMinutes =
        parseDurationMinutes(value) ?? builder.fields.estimatedDurationMinutes;
      break;
    case "stage":
      if (value) builder.fields.stage = value.toLowerCase();
      break;
  }
}

/**
 * Lines that match no field continue the description when the last
 * field was the description; anything else is dropped.
 */
export function applyContinuation(builder: DraftBuilder, line: string): void {
  const text = cleanInline(line);
  if (!text) return;
  if (builder.lastField === "description") builder.description.push(text);
}

export function buildDraft(builder: DraftBuilder, useHeadline: boolean): WorkItemDraft {
  const description =
    builder.description.join(" ").trim() || (useHeadline ? builder.headline.trim() : "");
  return {
    ...builder.fields,
    ...(builder.sourceId !== undefined ? { sourceId: builder.sourceId } : {}),
    description,
  };
}
