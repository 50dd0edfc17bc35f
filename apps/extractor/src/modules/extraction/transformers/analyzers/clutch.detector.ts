/**
 * Clutch Detector - Finds 1vX situations per round
 *
 * Runs the alive-count replay of the clutch calculator over every round and
 * records at most one clutch per round. Rounds without a reported winner
 * still get a clutch record; it is simply not won.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { Clutch } from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { detectClutch } from "../../../analysis/calculators";
import { groupByRound } from "../../../analysis/utils";

@Injectable()
export class ClutchDetector implements Transformer {
  readonly name = "ClutchDetector";
  readonly priority = 25; // After RoundStatsComputer and TradeDetector
  readonly description = "Detects 1vX clutch situations from the kill sequence";

  private readonly logger = new Logger(ClutchDetector.name);

  shouldRun(ctx: TransformContext): boolean {
    if (ctx.state.rounds.length === 0 || ctx.state.kills.length === 0) {
      this.logger.debug(`No rounds or kills for demo ${ctx.demoId}, skipping clutch detection`);
      return false;
    }
    return true;
  }

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, settings, state } = ctx;

    try {
      const killsByRound = groupByRound(state.kills);
      const clutches: Clutch[] = [];

      for (const round of state.rounds) {
        const clutch = detectClutch({
          round,
          roundKills: killsByRound.get(round.round_num) ?? [],
          rosterSize: settings.rosterSize,
          minOpponents: settings.clutchMinOpponents,
        });
        if (clutch) {
          clutches.push(clutch);
        }
      }

      state.clutches = clutches;

      const won = clutches.filter((c) => c.won).length;

      this.logger.log(
        `Detected ${clutches.length} clutches (${won} won) in ${state.rounds.length} rounds for demo ${demoId}`,
      );

      return createResult(this.name, startTime, clutches.length, {
        clutches: clutches.length,
        won,
        lost: clutches.length - won,
        roundsAnalyzed: state.rounds.length,
      });
    } catch (error) {
      this.logger.error(`Failed to detect clutches for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}
