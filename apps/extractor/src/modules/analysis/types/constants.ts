/**
 * Analysis Constants - Defaults with documentation
 *
 * Every value here is a default only. The effective values for a run are
 * resolved by ExtractionConfigService and travel in the transform context.
 *
 * @module analysis/types/constants
 */

/**
 * Demo tick rate assumed when the header does not report one.
 * CS2 demos record at 64 ticks per second (sub-tick is internal).
 */
export const DEFAULT_TICK_RATE = 64;

/**
 * Trade window in seconds
 *
 * A kill is a trade if it avenges a teammate's death within this window.
 * 5 seconds is the threshold used by HLTV and most analytics sites.
 */
export const DEFAULT_TRADE_WINDOW_SECONDS = 5;

/**
 * Players per team at the start of a round (competitive 5v5)
 */
export const DEFAULT_ROSTER_SIZE = 5;

/**
 * Minimum living opponents for a 1vX to count as a clutch.
 * A 1v1 is an ordinary duel.
 */
export const DEFAULT_CLUTCH_MIN_OPPONENTS = 2;

/**
 * Convert a window in seconds to ticks at the given tick rate
 */
export function secondsToTicks(seconds: number, tickRate: number): number {
  return Math.round(seconds * tickRate);
}
