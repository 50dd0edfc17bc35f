/**
 * KAST Calculator - Kill/Assist/Survived/Traded percentage
 *
 * KAST measures consistency: the percentage of rounds where a player had a
 * positive contribution. A round is KAST-positive if ANY of the following
 * is true:
 * - K: Player got at least one kill
 * - A: Player got at least one assist
 * - S: Player survived the round (no death recorded in it)
 * - T: Player was traded (a teammate killed their killer within the window)
 *
 * A round meeting several conditions is counted once.
 *
 * @module analysis/calculators/kast
 */

import type { Kill } from "@match-insights/types";
import type { KASTMetrics } from "../types/stats.types";
import { compareKills, isPlayerId, percentage, round1 } from "../utils";

/**
 * Input required for KAST calculation
 */
export interface KASTCalculationInput {
  /** Player's Steam ID */
  readonly steamId: string;

  /** Numbers of every round played in the match */
  readonly roundNumbers: readonly number[];

  /** All kills in the match (needed for trade detection) */
  readonly allKills: readonly Kill[];

  /** Maximum ticks between the death and the avenging kill */
  readonly tradeWindowTicks: number;
}

/**
 * Calculate KAST metrics for a player
 *
 * @example
 * ```typescript
 * const kast = calculateKAST({
 *   steamId: "player-1",
 *   roundNumbers: [1, 2, 3],
 *   allKills: matchKills,
 *   tradeWindowTicks: 320,
 * });
 * ```
 */
export function calculateKAST(input: KASTCalculationInput): KASTMetrics {
  const { steamId, roundNumbers, allKills, tradeWindowTicks } = input;

  if (roundNumbers.length === 0) {
    return createEmptyKASTMetrics();
  }

  const killRounds = new Set<number>();
  const assistRounds = new Set<number>();
  const deathRounds = new Set<number>();

  for (const kill of allKills) {
    if (kill.attacker_steamid === steamId) killRounds.add(kill.round_num);
    if (kill.assister_steamid === steamId) assistRounds.add(kill.round_num);
    if (kill.victim_steamid === steamId) deathRounds.add(kill.round_num);
  }

  const tradedRounds = detectTradedRounds(steamId, allKills, tradeWindowTicks);

  let roundsWithKill = 0;
  let roundsWithAssist = 0;
  let roundsWithSurvival = 0;
  let roundsWithTrade = 0;
  const kastPositiveRounds = new Set<number>();

  for (const roundNum of roundNumbers) {
    let hasKAST = false;

    if (killRounds.has(roundNum)) {
      roundsWithKill++;
      hasKAST = true;
    }
    if (assistRounds.has(roundNum)) {
      roundsWithAssist++;
      hasKAST = true;
    }
    if (!deathRounds.has(roundNum)) {
      roundsWithSurvival++;
      hasKAST = true;
    }
    if (tradedRounds.has(roundNum)) {
      roundsWithTrade++;
      hasKAST = true;
    }

    if (hasKAST) {
      kastPositiveRounds.add(roundNum);
    }
  }

  return {
    kast: round1(percentage(kastPositiveRounds.size, roundNumbers.length)),
    kastRounds: kastPositiveRounds.size,
    totalRounds: roundNumbers.length,
    roundsWithKill,
    roundsWithAssist,
    roundsWithSurvival,
    roundsWithTrade,
  };
}

/**
 * Rounds in which the player's death was traded
 *
 * The death is traded when the killer dies to one of the player's teammates
 * (team as recorded on the death) later in the same round, no more than
 * tradeWindowTicks after it. Deaths to the world or to oneself cannot be
 * traded.
 */
export function detectTradedRounds(
  steamId: string,
  allKills: readonly Kill[],
  tradeWindowTicks: number,
): Set<number> {
  const tradedRounds = new Set<number>();

  const deaths = allKills.filter((k) => k.victim_steamid === steamId);

  for (const death of deaths) {
    const killer = death.attacker_steamid;
    if (!isPlayerId(killer) || killer === steamId || death.victim_team === "unknown") {
      continue;
    }

    const traded = allKills.some(
      (k) =>
        k.round_num === death.round_num &&
        k.victim_steamid === killer &&
        k.attacker_team === death.victim_team &&
        k.attacker_steamid !== steamId &&
        isPlayerId(k.attacker_steamid) &&
        compareKills(k, death) > 0 &&
        k.tick - death.tick <= tradeWindowTicks,
    );

    if (traded) {
      tradedRounds.add(death.round_num);
    }
  }

  return tradedRounds;
}

function createEmptyKASTMetrics(): KASTMetrics {
  return {
    kast: 0,
    kastRounds: 0,
    totalRounds: 0,
    roundsWithKill: 0,
    roundsWithAssist: 0,
    roundsWithSurvival: 0,
    roundsWithTrade: 0,
  };
}
