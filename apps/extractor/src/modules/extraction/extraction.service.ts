/**
 * Extraction Service - Parsed demo in, match bundle out
 *
 * Resolves the run settings, builds a fresh context and hands it to the
 * orchestrator. Each call owns its own state, so runs with different tick
 * rates can share one service instance.
 *
 * The derivation is all or nothing: if any transformer fails, no bundle is
 * returned and ExtractionFailedError is thrown.
 */

import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import type { MatchBundle, MatchMetadata, ParsedDemo, Round } from "@match-insights/types";
import { ExtractionConfigService, type ExtractionOverrides } from "../../common/config";
import { ExtractionFailedError } from "../../common/errors";
import { TransformerOrchestrator } from "./transformers/transformer.orchestrator";
import {
  createEmptyState,
  type DemoInfo,
  type MatchState,
  type TransformContext,
  type TransformOptions,
} from "./transformers/transformer.interface";

export interface ExtractionRunOptions {
  /** Overrides the demo file name from the header */
  demoId?: string | undefined;
  overrides?: ExtractionOverrides | undefined;
  transform?: TransformOptions | undefined;
}

@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    private readonly orchestrator: TransformerOrchestrator,
    private readonly extractionConfig: ExtractionConfigService,
  ) {}

  extract(parsed: ParsedDemo, options: ExtractionRunOptions = {}): MatchBundle {
    const settings = this.extractionConfig.resolve(options.overrides, parsed.header.tick_rate);
    const demo = this.buildDemoInfo(parsed, options, settings.tickRate);

    const ctx: TransformContext = {
      demoId: demo.id,
      demo,
      tables: parsed.tables,
      settings,
      state: createEmptyState(),
    };

    this.logger.log(
      `Extracting ${demo.id} (map ${demo.mapName}, ${settings.tickRate} tick, ` +
        `trade window ${settings.tradeWindowTicks} ticks)`,
    );

    const result = this.orchestrator.execute(ctx, options.transform);

    const failure = result.results.find((r) => !r.success);
    if (failure) {
      throw new ExtractionFailedError(
        demo.id,
        failure.transformer,
        failure.error ?? "unknown error",
      );
    }

    const dropped = Object.values(ctx.state.dropped).reduce((sum, n) => sum + n, 0);
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} malformed records for ${demo.id}`);
    }

    return this.buildBundle(ctx.demo, ctx.state);
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private buildDemoInfo(
    parsed: ParsedDemo,
    options: ExtractionRunOptions,
    tickRate: number,
  ): DemoInfo {
    const { header } = parsed;
    const demoFile = header.demo_file ? path.parse(header.demo_file).name : undefined;

    return {
      id: options.demoId ?? demoFile ?? "demo",
      mapName: header.map_name ?? "unknown",
      serverName: header.server_name ?? "unknown",
      tickRate,
    };
  }

  private buildBundle(demo: DemoInfo, state: MatchState): MatchBundle {
    return {
      metadata: buildMetadata(demo, state.rounds, state.dropped),
      players: state.players,
      player_stats: state.playerStats,
      rounds: state.rounds,
      round_stats: state.roundStats,
      kills: state.kills,
      damages: state.damages,
      grenades: state.grenades,
      bomb_events: state.bombEvents,
      economy: state.economy,
      clutches: state.clutches,
    };
  }
}

/**
 * Match metadata; the match lasts until the last round ends
 */
export function buildMetadata(
  demo: DemoInfo,
  rounds: readonly Round[],
  dropped: Readonly<Record<string, number>>,
  now: Date = new Date(),
): MatchMetadata {
  const totalTicks = rounds.reduce((max, r) => Math.max(max, r.end_tick), 0);
  const durationSeconds = Math.round(totalTicks / demo.tickRate);

  return {
    demo_file: demo.id,
    map_name: demo.mapName,
    server_name: demo.serverName,
    duration_seconds: durationSeconds,
    duration_formatted: formatDuration(durationSeconds),
    total_ticks: totalTicks,
    tickrate: demo.tickRate,
    total_rounds: rounds.length,
    extracted_at: now.toISOString(),
    dropped_records: { ...dropped },
  };
}

/**
 * m:ss
 */
export function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return `${minutes}:${String(rest).padStart(2, "0")}`;
}
