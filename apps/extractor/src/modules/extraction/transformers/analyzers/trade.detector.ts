/**
 * Trade Detector - Detects trade kills in match data
 *
 * Definition: a kill K is a trade when its victim had just killed one of K's
 * teammates. For each kill, earlier kills of the same round are scanned from
 * the most recent backwards until the gap exceeds the trade window; the first
 * earlier kill C with
 *   C.attacker = K.victim   and   C.victim_team = K.attacker_team
 * is the one being traded.
 *
 * The window is inclusive: a gap of exactly tradeWindowTicks is a trade.
 * Trade fields are reset before linking, so the result does not depend on
 * earlier runs.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { Kill } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import {
  groupByRound,
  compareKills,
  isPlayerId,
  percentage,
  round1,
} from "../../../analysis/utils";

/** Link from a trading kill to the kill it avenged */
export interface TradeLink {
  killId: number;
  tradedKillId: number;
  tradeTimeTicks: number;
}

@Injectable()
export class TradeDetector implements Transformer {
  readonly name = "TradeDetector";
  readonly priority = 20; // After KillExtractor
  readonly description = "Detects trade kills within configurable time window";

  private readonly logger = new Logger(TradeDetector.name);

  shouldRun(ctx: TransformContext): boolean {
    if (ctx.state.kills.length === 0) {
      this.logger.debug(`No kills for demo ${ctx.demoId}, skipping trade detection`);
      return false;
    }
    return true;
  }

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, settings, state } = ctx;
    const windowTicks = settings.tradeWindowTicks;

    try {
      const killsByRound = groupByRound(state.kills);
      const links = new Map<number, TradeLink>();

      for (const [, roundKills] of killsByRound) {
        for (const link of detectTradesInRound(roundKills, windowTicks)) {
          links.set(link.killId, link);
        }
      }

      state.kills = state.kills.map((kill) => {
        const link = links.get(kill.kill_id);
        return {
          ...kill,
          is_trade: link !== undefined,
          traded_kill_id: link?.tradedKillId ?? null,
          trade_time_ticks: link?.tradeTimeTicks ?? null,
        };
      });

      this.logger.log(
        `Detected ${links.size} trade kills in ${state.kills.length} kills for demo ${demoId}`,
      );

      return createResult(this.name, startTime, links.size, {
        kills: state.kills.length,
        trades: links.size,
        tradeRate: round1(percentage(links.size, state.kills.length)),
        tradeWindowTicks: windowTicks,
        roundsAnalyzed: killsByRound.size,
      });
    } catch (error) {
      this.logger.error(`Failed to detect trades for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}

/**
 * Detect trades within a single round
 *
 * Time complexity: O(n²) worst case, bounded in practice by the window.
 */
export function detectTradesInRound(
  roundKills: readonly Kill[],
  windowTicks: number,
): TradeLink[] {
  const kills = [...roundKills].sort(compareKills);
  const links: TradeLink[] = [];

  for (let i = 0; i < kills.length; i++) {
    const kill = kills[i];
    if (kill === undefined || !canTrade(kill)) continue;

    for (let j = i - 1; j >= 0; j--) {
      const candidate = kills[j];
      if (candidate === undefined) continue;

      const gap = kill.tick - candidate.tick;
      if (candidate.round_num !== kill.round_num || gap > windowTicks) break;

      if (
        candidate.attacker_steamid === kill.victim_steamid &&
        candidate.victim_team === kill.attacker_team
      ) {
        links.push({ killId: kill.kill_id, tradedKillId: candidate.kill_id, tradeTimeTicks: gap });
        break;
      }
    }
  }

  return links;
}

/**
 * Only a player killing a player on a known side can avenge anyone
 */
function canTrade(kill: Kill): boolean {
  return (
    isPlayerId(kill.attacker_steamid) &&
    isPlayerId(kill.victim_steamid) &&
    kill.attacker_steamid !== kill.victim_steamid &&
    kill.attacker_team !== "unknown"
  );
}
