/**
 * Combat Calculator - Pure functions for combat statistics
 *
 * Calculates fundamental combat metrics:
 * - Kills, Deaths, Assists and K/D
 * - ADR (Average Damage per Round)
 * - Headshot percentage
 * - Opening duels (first kills / first deaths)
 * - Teamplay (trade kills, flash assists)
 *
 * All functions are pure: same input always produces same output.
 *
 * @module analysis/calculators/combat
 */

import type { Kill, Damage } from "@match-insights/types";
import type { CombatMetrics, OpeningMetrics, TeamplayMetrics } from "../types/stats.types";
import { safeDivide, percentage, round1, round2 } from "../utils";

export interface CombatCalculationInput {
  readonly steamId: string;
  readonly allKills: readonly Kill[];
  readonly allDamages: readonly Damage[];
  /** Rounds played in the match, the ADR denominator */
  readonly totalRounds: number;
}

/**
 * Calculate combat metrics for a player
 *
 * @example
 * ```typescript
 * const combat = calculateCombatMetrics({ steamId, allKills, allDamages, totalRounds: 24 });
 * console.log(`ADR: ${combat.adr}, K/D: ${combat.kd}`);
 * ```
 */
export function calculateCombatMetrics(input: CombatCalculationInput): CombatMetrics {
  const { steamId, allKills, allDamages, totalRounds } = input;

  let kills = 0;
  let deaths = 0;
  let assists = 0;
  let headshots = 0;

  for (const kill of allKills) {
    if (kill.attacker_steamid === steamId) {
      kills++;
      if (kill.headshot) headshots++;
    }
    if (kill.victim_steamid === steamId) deaths++;
    if (kill.assister_steamid === steamId) assists++;
  }

  const totalDamage = allDamages
    .filter((d) => d.attacker_steamid === steamId)
    .reduce((sum, d) => sum + (d.damage_health ?? 0), 0);

  return {
    kills,
    deaths,
    assists,
    kd: calculateKD(kills, deaths),
    adr: round1(safeDivide(totalDamage, totalRounds)),
    totalDamage,
    headshots,
    headshotPercentage: round1(percentage(headshots, kills)),
  };
}

/**
 * K/D ratio; a player without deaths has a ratio equal to their kills
 */
export function calculateKD(kills: number, deaths: number): number {
  if (deaths === 0) return kills;
  return round2(kills / deaths);
}

/**
 * Entry duels from kills flagged as the first of their round
 */
export function calculateOpeningMetrics(
  steamId: string,
  allKills: readonly Kill[],
): OpeningMetrics {
  const firstKills = allKills.filter((k) => k.is_first_kill && k.attacker_steamid === steamId).length;
  const firstDeaths = allKills.filter((k) => k.is_first_kill && k.victim_steamid === steamId).length;

  return {
    firstKills,
    firstDeaths,
    difference: firstKills - firstDeaths,
  };
}

export function calculateTeamplayMetrics(
  steamId: string,
  allKills: readonly Kill[],
): TeamplayMetrics {
  return {
    tradeKills: allKills.filter((k) => k.is_trade && k.attacker_steamid === steamId).length,
    flashAssists: allKills.filter((k) => k.assistedflash && k.assister_steamid === steamId).length,
  };
}
