/**
 * Player Stats Computer - Match totals per player
 *
 * A pure fold over the canonical and derived collections, keyed by steam id.
 * Every player seen anywhere in the match gets one record, including players
 * only seen in damage events. The collection is rebuilt in full on each run
 * and sorted by ADR (ties: steam id).
 */

import { Injectable, Logger } from "@nestjs/common";
import type { Player, PlayerMatchStats } from "@match-insights/types";
import type {
  Transformer,
  TransformContext,
  TransformResult,
  MatchState,
} from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import {
  calculateKAST,
  calculateCombatMetrics,
  calculateOpeningMetrics,
  calculateTeamplayMetrics,
  calculateClutchMetrics,
} from "../../../analysis/calculators";
import { RosterBuilder } from "../extractors/player.extractor";

@Injectable()
export class PlayerStatsComputer implements Transformer {
  readonly name = "PlayerStatsComputer";
  readonly priority = 30; // Last: needs first kills, trades and clutches
  readonly description = "Aggregates per-player match statistics (ADR, KAST, clutches)";

  private readonly logger = new Logger(PlayerStatsComputer.name);

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, settings, state } = ctx;

    try {
      const players = this.collectPlayers(state);
      const roundNumbers = state.rounds.map((r) => r.round_num);

      if (roundNumbers.length === 0 && players.length > 0) {
        this.logger.debug(`No rounds for demo ${demoId}, rates resolve to 0`);
      }

      const stats = players.map((player) =>
        this.computePlayerStats(player, state, roundNumbers, settings.tradeWindowTicks),
      );

      stats.sort((a, b) => b.adr - a.adr || compareIds(a.steamid, b.steamid));
      state.playerStats = stats;

      this.logger.log(`Computed stats for ${stats.length} players for demo ${demoId}`);

      return createResult(this.name, startTime, stats.length, {
        players: stats.length,
        rounds: roundNumbers.length,
      });
    } catch (error) {
      this.logger.error(`Failed to compute player stats for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  /**
   * Roster plus anyone the roster missed (e.g. when the extractor was skipped)
   */
  private collectPlayers(state: MatchState): Player[] {
    const roster = new RosterBuilder();
    for (const player of state.players) {
      roster.add(player.steamid, player.name, player.team);
    }
    roster.addKills(state.kills);
    roster.addDamages(state.damages);
    return roster.build();
  }

  private computePlayerStats(
    player: Player,
    state: MatchState,
    roundNumbers: readonly number[],
    tradeWindowTicks: number,
  ): PlayerMatchStats {
    const steamId = player.steamid;

    const combat = calculateCombatMetrics({
      steamId,
      allKills: state.kills,
      allDamages: state.damages,
      totalRounds: roundNumbers.length,
    });
    const kast = calculateKAST({
      steamId,
      roundNumbers,
      allKills: state.kills,
      tradeWindowTicks,
    });
    const opening = calculateOpeningMetrics(steamId, state.kills);
    const teamplay = calculateTeamplayMetrics(steamId, state.kills);
    const clutch = calculateClutchMetrics(steamId, state.clutches);

    return {
      steamid: steamId,
      name: player.name,
      team: player.team,

      kills: combat.kills,
      deaths: combat.deaths,
      assists: combat.assists,
      kd_ratio: combat.kd,
      adr: combat.adr,
      kast: kast.kast,
      total_damage: combat.totalDamage,

      headshots: combat.headshots,
      hs_percentage: combat.headshotPercentage,

      first_kills: opening.firstKills,
      first_deaths: opening.firstDeaths,
      fk_fd_diff: opening.difference,

      trade_kills: teamplay.tradeKills,
      flash_assists: teamplay.flashAssists,

      clutch_attempts: clutch.attempts,
      clutch_wins: clutch.wins,
      clutch_rate: clutch.rate,
    };
  }
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
