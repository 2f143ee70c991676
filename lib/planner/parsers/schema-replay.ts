/**
 * Schema-replay parse: asks the generator once more under the stricter
 * template, then runs the strict and tolerant parses on the new text.
 *
 * One instance serves one parse. The replay budget is a single call; a
 * second attempt reports `replay_exhausted` without calling out.
 */

import { describeError } from "../errors";
import { err } from "../result";
import { parseStrictBlocks } from "./strict-field";
import { parseStructural } from "./tolerant-structural";
import type { ParseInput, ParseStrategy, StrategyResult } from "./types";

export const MAX_REPLAYS = 1;

export class SchemaReplayStrategy implements ParseStrategy {
  readonly name = "schema-replay" as const;
  readonly confidence = 0.6;
  private replays = 0;

  get replaysUsed(): number {
    return this.replays;
  }

  async attempt({ hints, ctx }: ParseInput): Promise<StrategyResult> {
    const log = ctx.logger.child("schema-replay");

    if (!hints.replay) return err("replay_unavailable");
    if (this.replays >= MAX_REPLAYS) return err("replay_exhausted");
    this.replays += 1;

    const replayed = await hints.replay(ctx);
    if (!replayed.ok) {
      log.warn(`Replay failed (${replayed.error.kind}): ${describeError(replayed.error)}`);
      return err("replay_failed");
    }

    const strict = parseStrictBlocks(replayed.value);
    if (strict.ok) return strict;

    const structural = parseStructural(replayed.value);
    if (structural.ok) return structural;

    log.warn(`Replayed text was not parseable (${strict.error}, ${structural.error})`);
    return err("replay_failed");
  }
}
