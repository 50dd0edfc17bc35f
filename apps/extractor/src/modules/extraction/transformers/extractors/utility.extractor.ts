/**
 * Utility Extractor - Grenade and bomb events
 *
 * Each grenade/bomb table maps to one variant of the tagged records, so the
 * type comes from the table name and never from the row.
 */

import { Injectable, Logger } from "@nestjs/common";
import {
  GRENADE_EVENT_TABLES,
  BOMB_EVENT_TABLES,
  type Grenade,
  type BombEvent,
} from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { EventNormalizer, collectRecords, describeDrops, byTick } from "../normalizers";

@Injectable()
export class UtilityExtractor implements Transformer {
  readonly name = "UtilityExtractor";
  readonly priority = 12;
  readonly description = "Extracts grenade detonations and bomb events";

  private readonly logger = new Logger(UtilityExtractor.name);

  constructor(private readonly normalizer: EventNormalizer) {}

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, tables, state } = ctx;

    try {
      const warnings: string[] = [];
      const grenades: Grenade[] = [];
      const bombEvents: BombEvent[] = [];
      let grenadesDropped = 0;
      let bombDropped = 0;

      for (const [table, type] of GRENADE_EVENT_TABLES) {
        const rows = tables[table] ?? [];
        if (rows.length === 0) {
          this.logger.debug(`No ${table} events for demo ${demoId}`);
          continue;
        }
        const collected = collectRecords(rows, (row) => this.normalizer.normalizeGrenade(row, type));
        grenades.push(...collected.records);
        grenadesDropped += collected.dropped;
        if (collected.dropped > 0) warnings.push(describeDrops(table, collected));
      }

      for (const [table, eventType] of BOMB_EVENT_TABLES) {
        const rows = tables[table] ?? [];
        if (rows.length === 0) {
          this.logger.debug(`No ${table} events for demo ${demoId}`);
          continue;
        }
        const collected = collectRecords(rows, (row) =>
          this.normalizer.normalizeBombEvent(row, eventType),
        );
        bombEvents.push(...collected.records);
        bombDropped += collected.dropped;
        if (collected.dropped > 0) warnings.push(describeDrops(table, collected));
      }

      state.grenades = grenades.sort(byTick);
      state.bombEvents = bombEvents.sort(byTick);
      state.dropped["grenade"] = grenadesDropped;
      state.dropped["bomb"] = bombDropped;

      this.logger.log(
        `Extracted ${grenades.length} grenades and ${bombEvents.length} bomb events for demo ${demoId}`,
      );

      return createResult(
        this.name,
        startTime,
        grenades.length + bombEvents.length,
        {
          grenades: grenades.length,
          bombEvents: bombEvents.length,
          plants: bombEvents.filter((b) => b.event_type === "plant").length,
          dropped: grenadesDropped + bombDropped,
        },
        warnings,
      );
    } catch (error) {
      this.logger.error(`Failed to extract utility for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}
