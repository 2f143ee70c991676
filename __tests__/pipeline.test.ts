/**
 * Tests for the planning pipeline:
 * - Happy path through generate, parse and assign
 * - Consensus structure flowing into the decomposition prompt
 * - Example retrieval and its failure
 * - Degradation on generation failure and schema replay
 * - Aborts on bad input and missing participants
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { runPlanningPipeline, groupByStage } from "@/lib/planner/pipeline";
import { DEFAULT_PLANNER_CONFIG } from "@/lib/planner/config";
import type { PlannerConfig } from "@/lib/planner/config";
import type { ProposalCollaborators } from "@/lib/planner/consensus/coordinator";
import { ParticipantRepository } from "@/lib/planner/participants";
import type { ExampleRetriever } from "@/lib/planner/types";
import {
  failedGeneration,
  generated,
  makeItem,
  makeProfile,
  makeProposal,
  quietContext,
  scriptedClient,
} from "./fixtures";

const GARDEN_TEXT = `ITEM 1:
Description: Plan the garden layout
Complexity: 2
Type: group
Dependencies: none
Stage: preparation

ITEM 2:
Description: Sow the seeds in rows
Complexity: 3
Type: pair
Dependencies: 1

ITEM 3:
Description: Reflect on how the seeds grew
Complexity: 2
Type: individual
Dependencies: 2`;

const config: PlannerConfig = { ...DEFAULT_PLANNER_CONFIG, useConsensus: false };
const participants = [makeProfile("P1"), makeProfile("P2")];
const request = { intent: "Start a class vegetable garden" };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// Happy path
// ---------------------------------------------------------------------------

describe("runPlanningPipeline", () => {
  it("plans, groups and assigns a well-formed decomposition", async () => {
    const { client, generate } = scriptedClient(generated(GARDEN_TEXT));

    const result = await runPlanningPipeline(request, {
      client,
      participants,
      config,
      ctx: quietContext(),
    });

    expect(result.status).toBe("completed");
    expect(result.requestId).toBe("test-request");
    expect(result.parse?.strategy).toBe("strict-field");
    expect(result.items.map((item) => item.collaborationMode)).toEqual(["group", "pair", "individual"]);
    expect(result.stages).toEqual([
      { stage: "preparation", itemIds: ["item_01"] },
      { stage: "execution", itemIds: ["item_02"] },
      { stage: "reflection", itemIds: ["item_03"] },
    ]);
    expect(result.waves).toEqual([["item_01"], ["item_02"], ["item_03"]]);
    expect(result.record.P1.map((entry) => entry.itemId)).toEqual(["item_02", "item_03"]);
    expect(result.record.P2.map((entry) => entry.itemId)).toEqual(["item_01"]);
    expect(result.assignment?.path).toBe("greedy");
    expect(result.consensus).toBeNull();
    expect(result.generationFailure).toBeNull();
    expect(result.degraded).toBe(false);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("accepts a participant repository", async () => {
    const repo = ParticipantRepository.fromProfiles(participants);
    if (!repo.ok) throw new Error(repo.error);
    const { client } = scriptedClient(generated(GARDEN_TEXT));

    const result = await runPlanningPipeline(request, {
      client,
      participants: repo.value,
      config,
      ctx: quietContext(),
    });

    expect(Object.keys(result.record).sort()).toEqual(["P1", "P2"]);
  });

  it("feeds the consensus structure into the decomposition prompt", async () => {
    const { client, generate } = scriptedClient(generated(GARDEN_TEXT));
    const structure = {
      activityType: "Garden project",
      stages: ["preparation", "execution", "reflection"],
      collaborationEmphasis: "group" as const,
      targetItemCount: 3,
    };
    const collaborators: ProposalCollaborators = {
      structural: { role: "structural", propose: vi.fn(async () => makeProposal("structural", { structure })) },
      pedagogical: { role: "pedagogical", propose: vi.fn(async () => makeProposal("pedagogical")) },
      feasibility: { role: "feasibility", propose: vi.fn(async () => makeProposal("feasibility")) },
    };

    const result = await runPlanningPipeline(request, {
      client,
      participants,
      config: { ...config, useConsensus: true },
      collaborators,
      ctx: quietContext(),
    });

    expect(result.consensus?.type).toBe("CONSENSUS");
    expect(generate.mock.calls[0][0]).toContain("- Activity type: Garden project");
  });

  it("carries consensus adaptations and adjustments into the decomposition prompt", async () => {
    const { client, generate } = scriptedClient(generated(GARDEN_TEXT));
    const collaborators: ProposalCollaborators = {
      structural: { role: "structural", propose: vi.fn(async () => makeProposal("structural")) },
      pedagogical: {
        role: "pedagogical",
        propose: vi.fn(async () =>
          makeProposal("pedagogical", {
            verdict: "requires_revision",
            score: 0.4,
            adaptationRequirements: ["Visual timeline for ASD participants"],
          })
        ),
      },
      feasibility: {
        role: "feasibility",
        propose: vi.fn(async () => makeProposal("feasibility", { feasibilityAdjustments: ["Two watering stations"] })),
      },
    };

    const result = await runPlanningPipeline(request, {
      client,
      participants,
      config: { ...config, useConsensus: true },
      collaborators,
      ctx: quietContext(),
    });

    expect(result.consensus?.type).toBe("MODIFICATION_PEDAGOGICAL");
    const prompt = generate.mock.calls[0][0];
    expect(prompt).toContain("- Activity type: pedagogical plan");
    expect(prompt).toContain("Required adaptations for the participants:\n- Visual timeline for ASD participants\n");
    expect(prompt).toContain("Practical adjustments:\n- Two watering stations\n");
  });

  it("adds retrieved examples to the prompt", async () => {
    const { client, generate } = scriptedClient(generated(GARDEN_TEXT));
    const retriever: ExampleRetriever = {
      findSimilar: vi.fn(async () => [{ title: "Herb boxes", content: "Grow basil.", similarity: 0.8 }]),
    };

    await runPlanningPipeline(request, { client, participants, config, retriever, ctx: quietContext() });

    expect(retriever.findSimilar).toHaveBeenCalledWith("Start a class vegetable garden", 2);
    expect(generate.mock.calls[0][0]).toContain("Example 1: Herb boxes\nGrow basil.");
  });

  it("continues without examples when retrieval fails", async () => {
    const { client } = scriptedClient(generated(GARDEN_TEXT));
    const retriever: ExampleRetriever = {
      findSimilar: vi.fn(async () => {
        throw new Error("index offline");
      }),
    };

    const result = await runPlanningPipeline(request, {
      client,
      participants,
      config,
      retriever,
      ctx: quietContext(),
    });

    expect(result.status).toBe("completed");
    expect(result.degraded).toBe(false);
  });

  // -------------------------------------------------------------------------
  // Degradation
  // -------------------------------------------------------------------------

  it("falls back to the canonical decomposition when generation fails", async () => {
    const { client, generate } = scriptedClient(failedGeneration("timeout", "slow"));

    const result = await runPlanningPipeline(request, {
      client,
      participants,
      config,
      ctx: quietContext(),
    });

    expect(result.status).toBe("completed");
    expect(result.generationFailure).toBe("timeout");
    expect(result.parse?.strategy).toBe("canonical-fallback");
    expect(result.parse?.attempts.find((a) => a.strategy === "schema-replay")?.reason).toBe(
      "replay_failed"
    );
    expect(result.items).toHaveLength(3);
    expect(result.degraded).toBe(true);
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it("replays once when the first answer is unreadable", async () => {
    const { client, generate } = scriptedClient(
      generated("Sorry, I cannot format that."),
      generated(GARDEN_TEXT)
    );

    const result = await runPlanningPipeline(request, {
      client,
      participants,
      config,
      ctx: quietContext(),
    });

    expect(result.parse?.strategy).toBe("schema-replay");
    expect(result.items).toHaveLength(3);
    expect(result.degraded).toBe(true);
    expect(generate.mock.calls[1][0]).toContain("Your previous answer could not be read");
  });

  // -------------------------------------------------------------------------
  // Aborts
  // -------------------------------------------------------------------------

  it("aborts with partial data when there are no participants", async () => {
    const { client } = scriptedClient(generated(GARDEN_TEXT));

    const result = await runPlanningPipeline(request, {
      client,
      participants: [],
      config,
      ctx: quietContext(),
    });

    expect(result.status).toBe("aborted");
    expect(result.error).toBe("No participants available for assignment");
    expect(result.items).toHaveLength(3);
    expect(result.assignment).toBeNull();
  });

  it("aborts on invalid weights before calling the generator", async () => {
    const { client, generate } = scriptedClient(generated(GARDEN_TEXT));

    const result = await runPlanningPipeline(
      { intent: "Garden", weights: { structure: 3 } },
      { client, participants, config, ctx: quietContext() }
    );

    expect(result.status).toBe("aborted");
    expect(result.error).toBe("Invalid preference weights: structure: Weights are in [0, 1]");
    expect(generate).not.toHaveBeenCalled();
  });

  it("aborts on an empty intent", async () => {
    const { client } = scriptedClient(generated(GARDEN_TEXT));
    const result = await runPlanningPipeline({ intent: "   " }, { client, participants, config, ctx: quietContext() });
    expect(result.error).toBe("Activity intent is empty");
  });
});

describe("groupByStage", () => {
  it("keeps stages in first-seen order", () => {
    const items = [
      makeItem("item_01", { stage: "execution" }),
      makeItem("item_02", { stage: "preparation" }),
      makeItem("item_03", { stage: "execution" }),
    ];
    expect(groupByStage(items)).toEqual([
      { stage: "execution", itemIds: ["item_01", "item_03"] },
      { stage: "preparation", itemIds: ["item_02"] },
    ]);
  });
});
