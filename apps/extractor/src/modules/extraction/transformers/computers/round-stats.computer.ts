/**
 * Round Stats Computer - Round outcome summaries and entry kills
 *
 * For every round the earliest kill (ties: lowest kill_id) is the first kill.
 * It is flagged on the kill itself and summarized with the round outcome:
 * winner, reason, kill count and whether the entry-fragging side won.
 *
 * Kills are replaced with annotated copies. Flags are recomputed from
 * scratch, so a second run leaves the same state.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { Kill, Round, RoundStats } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { groupByRound, compareKills } from "../../../analysis/utils";

@Injectable()
export class RoundStatsComputer implements Transformer {
  readonly name = "RoundStatsComputer";
  readonly priority = 15; // After extractors, independent of TradeDetector
  readonly description = "Marks first kills and summarizes each round's outcome";

  private readonly logger = new Logger(RoundStatsComputer.name);

  shouldRun(ctx: TransformContext): boolean {
    if (ctx.state.rounds.length === 0) {
      this.logger.debug(`No rounds for demo ${ctx.demoId}`);
      return false;
    }
    return true;
  }

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, state } = ctx;

    try {
      const killsByRound = groupByRound(state.kills);
      const firstKillIds = new Set<number>();
      const roundStats: RoundStats[] = [];

      for (const round of state.rounds) {
        const roundKills = killsByRound.get(round.round_num) ?? [];
        const firstKill = this.findFirstKill(roundKills);

        if (firstKill) {
          firstKillIds.add(firstKill.kill_id);
        }

        roundStats.push(this.summarizeRound(round, roundKills.length, firstKill));
      }

      state.kills = state.kills.map((kill) => ({
        ...kill,
        is_first_kill: firstKillIds.has(kill.kill_id),
      }));
      state.roundStats = roundStats;

      const entryWins = roundStats.filter((r) => r.first_kill_team_won === true).length;

      this.logger.log(
        `Summarized ${roundStats.length} rounds (${firstKillIds.size} first kills) for demo ${demoId}`,
      );

      return createResult(this.name, startTime, roundStats.length, {
        rounds: roundStats.length,
        firstKills: firstKillIds.size,
        entryWins,
        roundsWithoutKills: roundStats.length - firstKillIds.size,
      });
    } catch (error) {
      this.logger.error(`Failed to compute round stats for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private findFirstKill(kills: readonly Kill[]): Kill | null {
    let first: Kill | null = null;
    for (const kill of kills) {
      if (first === null || compareKills(kill, first) < 0) {
        first = kill;
      }
    }
    return first;
  }

  private summarizeRound(round: Round, totalKills: number, firstKill: Kill | null): RoundStats {
    return {
      round_num: round.round_num,
      winner: round.winner,
      reason: round.reason,
      duration_seconds: round.duration_seconds,
      total_kills: totalKills,
      first_kill_tick: firstKill?.tick ?? null,
      first_kill_attacker: firstKill?.attacker_name ?? null,
      first_kill_attacker_steamid: firstKill?.attacker_steamid ?? null,
      first_kill_attacker_team: firstKill?.attacker_team ?? null,
      first_kill_victim: firstKill?.victim_name ?? null,
      first_kill_victim_steamid: firstKill?.victim_steamid ?? null,
      first_kill_weapon: firstKill?.weapon ?? null,
      // A round without a reported winner was not won by anyone
      first_kill_team_won: firstKill ? firstKill.attacker_team === round.winner : null,
    };
  }
}
