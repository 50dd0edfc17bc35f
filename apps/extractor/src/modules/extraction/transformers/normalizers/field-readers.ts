/**
 * Field readers for heterogeneous parser rows
 *
 * Parser builds disagree on field names and value types (numeric team ids vs
 * team names, strings vs numbers for steam ids). Each reader takes a list of
 * aliases and returns the first usable value.
 */

import {
  UNKNOWN,
  TEAM_NUM_SIDE,
  ROUND_END_REASON_MAP,
  ROUND_END_REASON_ALIASES,
  HITGROUP_MAP,
  type RawEventRow,
  type TeamSide,
  type TeamLabel,
  type RoundEndReason,
} from "@match-insights/types";

function firstPresent(row: RawEventRow, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = row[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Finite number or null (never 0 for a missing value)
 */
export function readNumber(row: RawEventRow, keys: readonly string[]): number | null {
  const value = firstPresent(row, keys);
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readInt(row: RawEventRow, keys: readonly string[]): number | null {
  const value = readNumber(row, keys);
  return value === null ? null : Math.trunc(value);
}

/**
 * String as given (an empty name stays empty), "unknown" when absent
 */
export function readString(row: RawEventRow, keys: readonly string[]): string {
  const value = firstPresent(row, keys);
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return UNKNOWN;
}

export function readOptionalString(row: RawEventRow, keys: readonly string[]): string | null {
  const value = firstPresent(row, keys);
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number") return String(value);
  return null;
}

/**
 * Steam id, or null for an empty id or the "0" used for bots-less slots and the world.
 *
 * A numeric id above 2^53 has already lost digits in JSON.parse and could
 * match another player's, so it counts as absent.
 */
export function readSteamId(row: RawEventRow, keys: readonly string[]): string | null {
  const value = firstPresent(row, keys);
  let steamId: string | null = null;
  if (typeof value === "string") steamId = value.trim();
  else if (typeof value === "number" && Number.isSafeInteger(value)) steamId = value.toString();
  else if (typeof value === "bigint") steamId = value.toString();

  if (!steamId || steamId === "0") return null;
  return steamId;
}

/**
 * Boolean flag; missing flags are false
 */
export function readBoolean(row: RawEventRow, keys: readonly string[]): boolean {
  const value = firstPresent(row, keys);
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value > 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    return normalized === "true" || normalized === "1";
  }
  return false;
}

export function toTeamSide(value: unknown): TeamSide | null {
  if (typeof value === "number") {
    return TEAM_NUM_SIDE[value] ?? null;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toUpperCase();
    if (normalized === "CT" || normalized === "COUNTER_TERRORIST" || normalized === "3") {
      return "CT";
    }
    if (normalized === "T" || normalized === "TERRORIST" || normalized === "2") {
      return "TERRORIST";
    }
  }
  return null;
}

export function readTeam(row: RawEventRow, keys: readonly string[]): TeamLabel {
  return toTeamSide(firstPresent(row, keys)) ?? UNKNOWN;
}

export function readWinner(row: RawEventRow, keys: readonly string[]): TeamSide | null {
  return toTeamSide(firstPresent(row, keys));
}

export function readRoundEndReason(row: RawEventRow, keys: readonly string[]): RoundEndReason {
  const value = firstPresent(row, keys);
  if (typeof value === "number") {
    return ROUND_END_REASON_MAP[value] ?? "unknown";
  }
  if (typeof value === "string") {
    return ROUND_END_REASON_ALIASES[value.trim().toLowerCase()] ?? "unknown";
  }
  return "unknown";
}

export function readHitgroup(row: RawEventRow, keys: readonly string[]): string {
  const value = firstPresent(row, keys);
  if (typeof value === "number") {
    return HITGROUP_MAP[value] ?? UNKNOWN;
  }
  if (typeof value === "string" && value !== "") {
    return value;
  }
  return UNKNOWN;
}

/**
 * 1-based round number from an explicit field or total_rounds_played
 */
export function readRoundNum(row: RawEventRow): number | null {
  const explicit = readInt(row, ["round_num", "round"]);
  if (explicit !== null && explicit >= 1) {
    return explicit;
  }
  const played = readInt(row, ["total_rounds_played"]);
  if (played !== null && played >= 0) {
    return played + 1;
  }
  return null;
}

export function readTick(row: RawEventRow): number | null {
  const tick = readInt(row, ["tick"]);
  return tick !== null && tick >= 0 ? tick : null;
}
