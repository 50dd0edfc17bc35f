/**
 * Kill Extractor - Extracts kill data from player_death events
 *
 * Kills are sorted by tick (stable, so same-tick kills keep their emission
 * order) and numbered in that order: kill_id is the chronological index.
 */

import { Injectable, Logger } from "@nestjs/common";
import { EVENT_TABLES, type Kill } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { EventNormalizer, collectRecords, describeDrops, byTick } from "../normalizers";

@Injectable()
export class KillExtractor implements Transformer {
  readonly name = "KillExtractor";
  readonly priority = 10; // Trades, clutches and stats depend on kills
  readonly description = "Extracts kill data from player_death events";

  private readonly logger = new Logger(KillExtractor.name);

  constructor(private readonly normalizer: EventNormalizer) {}

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, tables, state } = ctx;

    try {
      const deathRows = tables[EVENT_TABLES.PLAYER_DEATH] ?? [];

      if (deathRows.length === 0) {
        this.logger.debug(`No ${EVENT_TABLES.PLAYER_DEATH} events for demo ${demoId}`);
      }

      const collected = collectRecords(deathRows, (row) => this.normalizer.normalizeKill(row));

      const kills: Kill[] = [...collected.records]
        .sort(byTick)
        .map((draft, index) => ({ kill_id: index, ...draft }));

      state.kills = kills;
      state.dropped["kill"] = collected.dropped;

      this.logger.log(
        `Extracted ${kills.length} kills from ${deathRows.length} death events for demo ${demoId}`,
      );

      return createResult(
        this.name,
        startTime,
        kills.length,
        {
          deathEvents: deathRows.length,
          dropped: collected.dropped,
          headshots: kills.filter((k) => k.headshot).length,
          wallbangs: kills.filter((k) => k.penetrated).length,
          noscopes: kills.filter((k) => k.noscope).length,
          throughSmoke: kills.filter((k) => k.thrusmoke).length,
        },
        collected.dropped > 0 ? [describeDrops("kill", collected)] : [],
      );
    } catch (error) {
      this.logger.error(`Failed to extract kills for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}
