import { UNKNOWN, WORLD } from "@match-insights/types";

/**
 * A real player's steam id: not the world, not an unidentified participant
 */
export function isPlayerId(steamid: string | null): steamid is string {
  return steamid !== null && steamid !== "" && steamid !== WORLD && steamid !== UNKNOWN;
}
