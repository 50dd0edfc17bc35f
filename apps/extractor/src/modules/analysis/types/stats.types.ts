/**
 * Calculator outputs
 *
 * @module analysis/types/stats
 */

/**
 * KAST with its per-letter breakdown. A round can appear under several
 * letters but is counted once in kastRounds.
 */
export interface KASTMetrics {
  /** Percentage of rounds with K, A, S or T (one decimal) */
  readonly kast: number;
  readonly kastRounds: number;
  readonly totalRounds: number;

  readonly roundsWithKill: number;
  readonly roundsWithAssist: number;
  readonly roundsWithSurvival: number;
  readonly roundsWithTrade: number;
}

export interface CombatMetrics {
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  /** kills / deaths, or kills when the player never died (two decimals) */
  readonly kd: number;
  /** Health damage dealt per round (one decimal) */
  readonly adr: number;
  readonly totalDamage: number;
  readonly headshots: number;
  readonly headshotPercentage: number;
}

export interface OpeningMetrics {
  readonly firstKills: number;
  readonly firstDeaths: number;
  readonly difference: number;
}

export interface TeamplayMetrics {
  readonly tradeKills: number;
  readonly flashAssists: number;
}

export interface ClutchMetrics {
  readonly attempts: number;
  readonly wins: number;
  /** wins / attempts as a percentage (one decimal) */
  readonly rate: number;
}
