/**
 * Economy Extractor - Per-player economy at each round's freeze end
 *
 * Snapshots are requested from the parser at the freeze-end ticks. When a
 * row carries no round number it is matched to the round that starts at
 * its tick; rows that match no round are dropped.
 */

import { Injectable, Logger } from "@nestjs/common";
import { EVENT_TABLES, type EconomySnapshot } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { EventNormalizer, collectRecords, describeDrops } from "../normalizers";

@Injectable()
export class EconomyExtractor implements Transformer {
  readonly name = "EconomyExtractor";
  readonly priority = 13;
  readonly description = "Extracts per-player economy snapshots at round start";

  private readonly logger = new Logger(EconomyExtractor.name);

  constructor(private readonly normalizer: EventNormalizer) {}

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, tables, state } = ctx;

    try {
      const snapshotRows = tables[EVENT_TABLES.PLAYER_SNAPSHOTS] ?? [];

      if (snapshotRows.length === 0) {
        this.logger.debug(`No ${EVENT_TABLES.PLAYER_SNAPSHOTS} for demo ${demoId}`);
      }

      const collected = collectRecords(snapshotRows, (row) =>
        this.normalizer.normalizeSnapshot(row),
      );

      const roundByStartTick = new Map(
        state.rounds.map((r) => [r.start_tick, r.round_num] as const),
      );

      const economy: EconomySnapshot[] = [];
      let unmatched = 0;

      for (const snapshot of collected.records) {
        const roundNum = snapshot.round_num ?? roundByStartTick.get(snapshot.tick);
        if (roundNum === undefined) {
          unmatched++;
          continue;
        }
        economy.push({ ...snapshot, round_num: roundNum });
      }

      economy.sort((a, b) => a.round_num - b.round_num || a.tick - b.tick);

      const dropped = collected.dropped + unmatched;
      const warnings: string[] = [];
      if (collected.dropped > 0) warnings.push(describeDrops("economy", collected));
      if (unmatched > 0) warnings.push(`Dropped ${unmatched} snapshots matching no round start`);

      state.economy = economy;
      state.dropped["economy"] = dropped;

      this.logger.log(`Extracted ${economy.length} economy snapshots for demo ${demoId}`);

      return createResult(
        this.name,
        startTime,
        economy.length,
        { snapshotRows: snapshotRows.length, dropped },
        warnings,
      );
    } catch (error) {
      this.logger.error(`Failed to extract economy for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}
