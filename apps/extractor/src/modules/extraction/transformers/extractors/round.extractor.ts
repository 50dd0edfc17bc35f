/**
 * Round Extractor - Builds rounds from round_end and round_freeze_end events
 *
 * Rounds are numbered 1..n in end-tick order. A round starts at the last
 * freeze end between the previous round end and its own end; without one it
 * starts where the previous round ended.
 */

import { Injectable, Logger } from "@nestjs/common";
import { EVENT_TABLES, type Round } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { EventNormalizer, collectRecords, describeDrops, byTick } from "../normalizers";
import { round1 } from "../../../analysis/utils/math";

@Injectable()
export class RoundExtractor implements Transformer {
  readonly name = "RoundExtractor";
  readonly priority = 5; // Everything else is keyed by round
  readonly description = "Builds rounds from round_end and round_freeze_end events";

  private readonly logger = new Logger(RoundExtractor.name);

  constructor(private readonly normalizer: EventNormalizer) {}

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, tables, settings, state } = ctx;

    try {
      const endRows = tables[EVENT_TABLES.ROUND_END] ?? [];
      const freezeRows = tables[EVENT_TABLES.ROUND_FREEZE_END] ?? [];

      if (endRows.length === 0) {
        this.logger.debug(`No ${EVENT_TABLES.ROUND_END} events for demo ${demoId}`);
      }

      const ends = collectRecords(endRows, (row) => this.normalizer.normalizeRoundEnd(row));
      const freezes = collectRecords(freezeRows, (row) => this.normalizer.normalizeFreezeEnd(row));

      const roundEnds = [...ends.records].sort(byTick);
      const freezeTicks = [...freezes.records].sort((a, b) => a - b);

      const rounds: Round[] = [];
      let previousEnd: number | null = null;

      for (const [index, end] of roundEnds.entries()) {
        const startTick = this.findStartTick(freezeTicks, previousEnd, end.tick);

        rounds.push({
          round_num: index + 1,
          start_tick: startTick,
          end_tick: end.tick,
          duration_seconds: round1((end.tick - startTick) / settings.tickRate),
          winner: end.winner,
          reason: end.reason,
        });

        previousEnd = end.tick;
      }

      const dropped = ends.dropped + freezes.dropped;
      const warnings: string[] = [];
      if (ends.dropped > 0) warnings.push(describeDrops("round_end", ends));
      if (freezes.dropped > 0) warnings.push(describeDrops("round_freeze_end", freezes));

      state.rounds = rounds;
      state.dropped["round"] = dropped;

      this.logger.log(`Extracted ${rounds.length} rounds for demo ${demoId}`);

      return createResult(
        this.name,
        startTime,
        rounds.length,
        {
          roundEndEvents: endRows.length,
          freezeEndEvents: freezeRows.length,
          dropped,
          withoutWinner: rounds.filter((r) => r.winner === null).length,
        },
        warnings,
      );
    } catch (error) {
      this.logger.error(`Failed to extract rounds for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }

  /**
   * Latest freeze end in (previousEnd, endTick], else the previous end (0 for round 1)
   */
  private findStartTick(
    freezeTicks: readonly number[],
    previousEnd: number | null,
    endTick: number,
  ): number {
    let start: number | null = null;
    for (const tick of freezeTicks) {
      if (tick > endTick) break;
      if (previousEnd === null || tick > previousEnd) {
        start = tick;
      }
    }
    return start ?? previousEnd ?? 0;
  }
}
