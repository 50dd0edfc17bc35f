/**
 * Clutch Calculator - Lone-survivor situations
 *
 * A round is replayed kill by kill with both teams starting at full roster.
 * The first time a team is down to its last player while the other still has
 * someone alive, that player is in a 1vX. Only situations with enough
 * opponents (2 by default) are clutches; a 1v1 is an ordinary duel.
 *
 * The clutch player is inferred as the first player of the clutch team to
 * get a kill from that moment on. A last player who never kills is not
 * identified, and no clutch is recorded.
 *
 * @module analysis/calculators/clutch
 */

import type { Clutch, Kill, Round, TeamSide } from "@match-insights/types";
import type { ClutchMetrics } from "../types/stats.types";
import { compareKills, isPlayerId, percentage, round1 } from "../utils";

export interface ClutchDetectionInput {
  readonly round: Round;
  /** Kills of this round, any order */
  readonly roundKills: readonly Kill[];
  readonly rosterSize: number;
  readonly minOpponents: number;
}

/** Moment a team is reduced to one player */
export interface ClutchSituation {
  readonly team: TeamSide;
  readonly opponents: number;
  readonly startTick: number;
}

const SIDES: readonly TeamSide[] = ["CT", "TERRORIST"];

function opposite(team: TeamSide): TeamSide {
  return team === "CT" ? "TERRORIST" : "CT";
}

/**
 * Detect the clutch of a round, if any
 */
export function detectClutch(input: ClutchDetectionInput): Clutch | null {
  const { round, roundKills, rosterSize, minOpponents } = input;

  if (roundKills.length < 2) {
    return null;
  }

  const kills = [...roundKills].sort(compareKills);
  const situation = findClutchSituation(kills, rosterSize);
  if (!situation || situation.opponents < minOpponents) {
    return null;
  }

  const clutchKill = kills.find(
    (k) =>
      k.tick >= situation.startTick &&
      k.attacker_team === situation.team &&
      isPlayerId(k.attacker_steamid),
  );
  if (!clutchKill) {
    return null;
  }

  return {
    round_num: round.round_num,
    player_steamid: clutchKill.attacker_steamid,
    player_name: clutchKill.attacker_name,
    player_team: situation.team,
    clutch_type: `1v${situation.opponents}`,
    opponents: situation.opponents,
    won: round.winner === situation.team,
    start_tick: situation.startTick,
  };
}

/**
 * Replay kills until one team first reaches exactly one player alive
 *
 * Only victims on a known side change the alive counts.
 */
export function findClutchSituation(
  sortedKills: readonly Kill[],
  rosterSize: number,
): ClutchSituation | null {
  const alive: Record<TeamSide, number> = { CT: rosterSize, TERRORIST: rosterSize };

  for (const kill of sortedKills) {
    const victimTeam = kill.victim_team;
    if (victimTeam === "unknown") continue;

    alive[victimTeam] = Math.max(0, alive[victimTeam] - 1);

    for (const team of SIDES) {
      const opponents = alive[opposite(team)];
      if (alive[team] === 1 && opponents >= 1) {
        return { team, opponents, startTick: kill.tick };
      }
    }
  }

  return null;
}

/**
 * Attempts, wins and success rate of one player
 */
export function calculateClutchMetrics(
  steamId: string,
  clutches: readonly Clutch[],
): ClutchMetrics {
  const attempts = clutches.filter((c) => c.player_steamid === steamId);
  const wins = attempts.filter((c) => c.won).length;

  return {
    attempts: attempts.length,
    wins,
    rate: round1(percentage(wins, attempts.length)),
  };
}
