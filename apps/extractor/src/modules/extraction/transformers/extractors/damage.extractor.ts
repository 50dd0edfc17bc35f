/**
 * Damage Extractor - Extracts damage instances from player_hurt events
 */

import { Injectable, Logger } from "@nestjs/common";
import { EVENT_TABLES } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { EventNormalizer, collectRecords, describeDrops, byTick } from "../normalizers";

@Injectable()
export class DamageExtractor implements Transformer {
  readonly name = "DamageExtractor";
  readonly priority = 11;
  readonly description = "Extracts damage instances from player_hurt events";

  private readonly logger = new Logger(DamageExtractor.name);

  constructor(private readonly normalizer: EventNormalizer) {}

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, tables, state } = ctx;

    try {
      const hurtRows = tables[EVENT_TABLES.PLAYER_HURT] ?? [];

      if (hurtRows.length === 0) {
        this.logger.debug(`No ${EVENT_TABLES.PLAYER_HURT} events for demo ${demoId}`);
      }

      const collected = collectRecords(hurtRows, (row) => this.normalizer.normalizeDamage(row));
      const damages = [...collected.records].sort(byTick);

      state.damages = damages;
      state.dropped["damage"] = collected.dropped;

      const totalHealthDamage = damages.reduce((sum, d) => sum + (d.damage_health ?? 0), 0);

      this.logger.log(`Extracted ${damages.length} damage events for demo ${demoId}`);

      return createResult(
        this.name,
        startTime,
        damages.length,
        {
          hurtEvents: hurtRows.length,
          dropped: collected.dropped,
          totalHealthDamage,
        },
        collected.dropped > 0 ? [describeDrops("damage", collected)] : [],
      );
    } catch (error) {
      this.logger.error(`Failed to extract damage for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}
