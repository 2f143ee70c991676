/**
 * Tests for compatibility scoring and greedy assignment:
 * - Tag bonuses and neurotype rules
 * - Preference weight scaling
 * - Load caps, overflow and back-fill
 */

import { describe, it, expect } from "vitest";
import { loadCap, scoreCompatibility } from "@/lib/planner/assignment/scoring";
import { greedyAssign } from "@/lib/planner/assignment/greedy";
import { DEFAULT_PREFERENCE_WEIGHTS } from "@/lib/planner/types";
import { makeItem, makeProfile } from "./fixtures";

// ---------------------------------------------------------------------------
// scoreCompatibility
// ---------------------------------------------------------------------------

describe("scoreCompatibility", () => {
  it("starts from the base score", () => {
    expect(scoreCompatibility(makeItem("item_01"), makeProfile("P1"))).toEqual({
      score: 0.5,
      rationale: "base 0.50; no matching rules",
    });
  });

  it("adds a bonus per matching strength", () => {
    const item = makeItem("item_01", { requiredCompetencies: ["mathematics", "precision"] });
    const participant = makeProfile("P1", { strengths: ["mathematics"] });
    expect(scoreCompatibility(item, participant)).toEqual({
      score: 0.65,
      rationale: "base 0.50; strength mathematics +0.15",
    });
  });

  it("penalizes improvisation for ASD participants", () => {
    const item = makeItem("item_01", { requiredCompetencies: ["improvisation"] });
    const participant = makeProfile("P1", { neurotype: "ASD" });
    expect(scoreCompatibility(item, participant)).toEqual({
      score: 0.2,
      rationale: "base 0.50; ASD improvisation -0.30",
    });
  });

  it("rewards structure and precision for ASD participants", () => {
    const item = makeItem("item_01", { requiredCompetencies: ["structure", "precision"] });
    const participant = makeProfile("P1", { neurotype: "ASD" });
    expect(scoreCompatibility(item, participant).score).toBe(0.8);
  });

  it("applies ADHD movement bonus and complexity penalty together", () => {
    const item = makeItem("item_01", { requiredCompetencies: ["movement"], complexity: 4 });
    const participant = makeProfile("P1", { neurotype: "ADHD" });
    expect(scoreCompatibility(item, participant).score).toBe(0.45);
  });

  it("balances gifted challenge against simple work", () => {
    const item = makeItem("item_01", { requiredCompetencies: ["simple"], complexity: 5 });
    const participant = makeProfile("P1", { neurotype: "gifted" });
    expect(scoreCompatibility(item, participant).score).toBe(0.5);
  });

  it("clamps at 1", () => {
    const item = makeItem("item_01", { requiredCompetencies: ["a", "b", "c", "d"] });
    const participant = makeProfile("P1", { strengths: ["a", "b", "c", "d"] });
    expect(scoreCompatibility(item, participant).score).toBe(1);
  });

  it("scales bonuses with the structure weight and penalties with flexibility", () => {
    const structured = makeItem("item_01", { requiredCompetencies: ["structure"] });
    const improvised = makeItem("item_02", { requiredCompetencies: ["improvisation"] });
    const participant = makeProfile("P1", { neurotype: "ASD" });

    expect(
      scoreCompatibility(structured, participant, { ...DEFAULT_PREFERENCE_WEIGHTS, structure: 1 }).score
    ).toBeCloseTo(0.725, 3);
    expect(
      scoreCompatibility(improvised, participant, { ...DEFAULT_PREFERENCE_WEIGHTS, flexibility: 0 }).score
    ).toBeCloseTo(0.05, 3);
  });

  it("applies the collaboration preference to shared work", () => {
    const item = makeItem("item_01", { collaborationMode: "group" });
    const participant = makeProfile("P1", { strengths: ["collaboration"] });

    expect(scoreCompatibility(item, participant).score).toBe(0.5);
    expect(
      scoreCompatibility(item, participant, { ...DEFAULT_PREFERENCE_WEIGHTS, collaboration: 1 })
    ).toEqual({ score: 0.6, rationale: "base 0.50; collaboration preference +0.10" });
  });
});

describe("loadCap", () => {
  it("follows the availability thresholds", () => {
    expect(loadCap(100)).toBe(3);
    expect(loadCap(81)).toBe(3);
    expect(loadCap(80)).toBe(2);
    expect(loadCap(70)).toBe(2);
    expect(loadCap(69)).toBe(1);
    expect(loadCap(0)).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// greedyAssign
// ---------------------------------------------------------------------------

describe("greedyAssign", () => {
  it("gives the hardest item out first and respects load caps", () => {
    const items = [
      makeItem("item_01", { complexity: 5 }),
      makeItem("item_02", { complexity: 3 }),
      makeItem("item_03", { complexity: 1 }),
    ];
    const participants = [
      makeProfile("P1", { availability: 90 }),
      makeProfile("P2", { availability: 60 }),
    ];

    const { record, overflowed, backfilled } = greedyAssign(items, participants, DEFAULT_PREFERENCE_WEIGHTS);

    expect(record.P1.map((entry) => entry.itemId)).toEqual(["item_01", "item_03"]);
    expect(record.P2.map((entry) => entry.itemId)).toEqual(["item_02"]);
    expect(overflowed).toBe(false);
    expect(backfilled).toBe(0);
  });

  it("overflows to the least loaded participant relative to cap", () => {
    const items = ["item_01", "item_02", "item_03", "item_04", "item_05"].map((id) => makeItem(id));
    const participants = [
      makeProfile("A", { availability: 60 }),
      makeProfile("B", { availability: 60 }),
    ];

    const { record, overflowed } = greedyAssign(items, participants, DEFAULT_PREFERENCE_WEIGHTS);

    expect(overflowed).toBe(true);
    expect(record.A.map((entry) => entry.itemId)).toEqual(["item_01", "item_03", "item_05"]);
    expect(record.B.map((entry) => entry.itemId)).toEqual(["item_02", "item_04"]);
  });

  it("back-fills a participant left empty", () => {
    const items = [makeItem("item_01", { complexity: 5 }), makeItem("item_02", { complexity: 5 })];
    const participants = [makeProfile("X", { neurotype: "gifted" }), makeProfile("Y")];

    const { record, backfilled } = greedyAssign(items, participants, DEFAULT_PREFERENCE_WEIGHTS);

    expect(backfilled).toBe(1);
    expect(record.X).toEqual([
      { itemId: "item_02", score: 0.7, rationale: "base 0.50; gifted complexity ≥ 4 +0.20" },
    ]);
    expect(record.Y).toEqual([
      { itemId: "item_01", score: 0.5, rationale: "base 0.50; no matching rules; back-filled from X" },
    ]);
  });

  it("hands out items whose dependencies are met before blocked ones", () => {
    const items = [
      makeItem("item_01", { dependencies: ["item_02"] }),
      makeItem("item_02"),
    ];
    const { record } = greedyAssign(items, [makeProfile("P")], DEFAULT_PREFERENCE_WEIGHTS);
    expect(record.P.map((entry) => entry.itemId)).toEqual(["item_02", "item_01"]);
  });

  it("assigns every item exactly once", () => {
    const items = [
      makeItem("item_01", { requiredCompetencies: ["structure"], complexity: 2 }),
      makeItem("item_02", { requiredCompetencies: ["movement"], complexity: 4 }),
      makeItem("item_03", { requiredCompetencies: ["improvisation"] }),
      makeItem("item_04", { requiredCompetencies: ["simple"], complexity: 1 }),
      makeItem("item_05", { complexity: 5 }),
      makeItem("item_06", { requiredCompetencies: ["precision"], dependencies: ["item_01"] }),
      makeItem("item_07", { collaborationMode: "group" }),
    ];
    const participants = [
      makeProfile("ana", { neurotype: "ASD", availability: 65 }),
      makeProfile("ben", { neurotype: "ADHD", availability: 75 }),
      makeProfile("cai", { neurotype: "gifted", availability: 95 }),
    ];

    const { record } = greedyAssign(items, participants, DEFAULT_PREFERENCE_WEIGHTS);
    const assigned = Object.values(record).flat().map((entry) => entry.itemId);

    expect(assigned.sort()).toEqual(items.map((item) => item.id));
    expect(Object.values(record).every((entries) => entries.length > 0)).toBe(true);
  });

  it("keeps items for participants whose ids shadow object properties", () => {
    const items = [makeItem("item_01"), makeItem("item_02")];
    const participants = [makeProfile("__proto__"), makeProfile("constructor")];

    const { record } = greedyAssign(items, participants, DEFAULT_PREFERENCE_WEIGHTS);

    expect(Object.keys(record)).toEqual(["__proto__", "constructor"]);
    expect(Object.values(record).map((entries) => entries.length)).toEqual([1, 1]);
    expect(Object.values(record).flat().map((entry) => entry.itemId).sort()).toEqual(["item_01", "item_02"]);
  });
});
