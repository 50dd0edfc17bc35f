/**
 * Extraction Configuration - Per-run settings for the derivation engine
 *
 * Configuration Hierarchy (lower overrides higher):
 * 1. Environment variables (DEFAULT_TICK_RATE, TRADE_WINDOW_SECONDS, ...)
 * 2. Demo header (tick rate reported by the parser)
 * 3. Run-level overrides (CLI flags)
 *
 * The resolved settings are threaded into every transformer through the
 * context, so matches recorded at different tick rates can be processed
 * side by side.
 */

import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  DEFAULT_TICK_RATE,
  DEFAULT_TRADE_WINDOW_SECONDS,
  DEFAULT_ROSTER_SIZE,
  DEFAULT_CLUTCH_MIN_OPPONENTS,
  secondsToTicks,
} from "../../modules/analysis/types/constants";

/**
 * Fully resolved settings for one match
 */
export interface ExtractionSettings {
  /** Ticks per second of the demo */
  tickRate: number;
  /** Maximum tick gap between a death and the kill that trades it */
  tradeWindowTicks: number;
  /** Players per team when a round starts */
  rosterSize: number;
  /** Minimum living opponents for a 1vX to be recorded as a clutch */
  clutchMinOpponents: number;
}

/**
 * Optional overrides for a single run
 */
export interface ExtractionOverrides {
  tickRate?: number | undefined;
  tradeWindowSeconds?: number | undefined;
  /** Takes precedence over tradeWindowSeconds */
  tradeWindowTicks?: number | undefined;
  rosterSize?: number | undefined;
  clutchMinOpponents?: number | undefined;
}

@Injectable()
export class ExtractionConfigService {
  constructor(private readonly configService: ConfigService) {}

  /**
   * Resolve settings for a match
   *
   * @param overrides - Run-level values (CLI flags)
   * @param headerTickRate - Tick rate reported by the demo header, if any
   */
  resolve(overrides: ExtractionOverrides = {}, headerTickRate?: number): ExtractionSettings {
    const tickRate = overrides.tickRate ?? headerTickRate ?? this.getDefaultTickRate();
    const tradeWindowSeconds = overrides.tradeWindowSeconds ?? this.getTradeWindowSeconds();

    return {
      tickRate,
      tradeWindowTicks:
        overrides.tradeWindowTicks ?? secondsToTicks(tradeWindowSeconds, tickRate),
      rosterSize: overrides.rosterSize ?? this.getNumber("ROSTER_SIZE", DEFAULT_ROSTER_SIZE),
      clutchMinOpponents:
        overrides.clutchMinOpponents ??
        this.getNumber("CLUTCH_MIN_OPPONENTS", DEFAULT_CLUTCH_MIN_OPPONENTS),
    };
  }

  getDefaultTickRate(): number {
    return this.getNumber("DEFAULT_TICK_RATE", DEFAULT_TICK_RATE);
  }

  getTradeWindowSeconds(): number {
    return this.getNumber("TRADE_WINDOW_SECONDS", DEFAULT_TRADE_WINDOW_SECONDS);
  }

  getOutputDir(): string {
    return this.configService.get<string>("OUTPUT_DIR", "data");
  }

  /**
   * Values set by hand in tests or by a missing validate hook arrive as strings
   */
  private getNumber(key: string, fallback: number): number {
    const value = this.configService.get<number | string>(key);
    if (value === undefined || value === "") return fallback;
    const parsed = typeof value === "number" ? value : Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
}
