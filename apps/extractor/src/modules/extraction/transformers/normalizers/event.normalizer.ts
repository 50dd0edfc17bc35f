/**
 * Event Normalizer - Raw parser rows to canonical records
 *
 * One raw row in, one canonical record (or a MalformedRecordError) out.
 * Pure: the normalizer holds no state and never throws on bad input.
 *
 * Identity rules:
 * - Missing numeric fields are null, never 0
 * - Missing strings are "unknown"; an empty name stays ""
 * - A kill or damage without attacker steam id comes from the world
 *   (fall damage, bomb, trigger hurt) and is attributed to "World"
 */

import { Injectable } from "@nestjs/common";
import {
  UNKNOWN,
  WORLD,
  type RawEventRow,
  type Kill,
  type Damage,
  type Grenade,
  type GrenadeType,
  type BombEvent,
  type BombEventType,
  type TeamLabel,
  type TeamSide,
  type RoundEndReason,
} from "@match-insights/types";
import { MalformedRecordError, ok, err, type Result } from "../../../../common/errors";
import {
  readNumber,
  readInt,
  readString,
  readOptionalString,
  readSteamId,
  readBoolean,
  readTeam,
  readWinner,
  readRoundEndReason,
  readHitgroup,
  readRoundNum,
  readTick,
} from "./field-readers";

/** Kill before ids are assigned in chronological order */
export type KillDraft = Omit<Kill, "kill_id">;

export interface RoundEndRecord {
  tick: number;
  winner: TeamSide | null;
  reason: RoundEndReason;
}

/**
 * Per-player state at a sampled tick, before it is tied to a round
 */
export interface PlayerSnapshotRecord {
  tick: number;
  round_num: number | null;
  steamid: string;
  name: string;
  team: TeamLabel;
  equipment_value: number | null;
  cash_spent_round: number | null;
  total_cash_spent: number | null;
}

type NormalizeResult<T> = Result<T, MalformedRecordError>;

interface Identity {
  steamid: string;
  name: string;
}

// Field aliases across parser builds
const ATTACKER = {
  steamid: ["attacker_steamid"],
  name: ["attacker_name"],
  team: ["attacker_team_name", "attacker_team", "attacker_team_num"],
  x: ["attacker_X", "attacker_x"],
  y: ["attacker_Y", "attacker_y"],
  z: ["attacker_Z", "attacker_z"],
} as const;

const VICTIM = {
  steamid: ["user_steamid", "victim_steamid"],
  name: ["user_name", "victim_name"],
  team: ["user_team_name", "victim_team_name", "user_team", "victim_team", "user_team_num"],
  x: ["user_X", "victim_X", "user_x", "victim_x"],
  y: ["user_Y", "victim_Y", "user_y", "victim_y"],
  z: ["user_Z", "victim_Z", "user_z", "victim_z"],
} as const;

const ACTOR = {
  steamid: ["user_steamid", "player_steamid", "steamid"],
  name: ["user_name", "player_name", "name"],
} as const;

@Injectable()
export class EventNormalizer {
  /**
   * Normalize a player_death row. kill_id is assigned later by the extractor.
   */
  normalizeKill(row: RawEventRow): NormalizeResult<KillDraft> {
    const anchor = this.readAnchor("kill", row);
    if (!anchor.success) return anchor;

    const attacker = this.readAttacker(row);
    const attackerPos = this.readPosition(row, ATTACKER);
    const victimPos = this.readPosition(row, VICTIM);

    return ok<KillDraft>({
      ...anchor.data,

      attacker_steamid: attacker.steamid,
      attacker_name: attacker.name,
      attacker_team: attacker.steamid === WORLD ? UNKNOWN : readTeam(row, ATTACKER.team),
      attacker_x: attackerPos.x,
      attacker_y: attackerPos.y,
      attacker_z: attackerPos.z,

      victim_steamid: readSteamId(row, VICTIM.steamid) ?? UNKNOWN,
      victim_name: readString(row, VICTIM.name),
      victim_team: readTeam(row, VICTIM.team),
      victim_x: victimPos.x,
      victim_y: victimPos.y,
      victim_z: victimPos.z,

      weapon: readString(row, ["weapon"]),
      headshot: readBoolean(row, ["headshot"]),
      penetrated: readBoolean(row, ["penetrated"]),
      noscope: readBoolean(row, ["noscope"]),
      thrusmoke: readBoolean(row, ["thrusmoke"]),
      attackerblind: readBoolean(row, ["attackerblind"]),
      assistedflash: readBoolean(row, ["assistedflash"]),
      distance: calculateDistance(attackerPos, victimPos),

      assister_steamid: readSteamId(row, ["assister_steamid"]),
      assister_name: readOptionalString(row, ["assister_name"]),

      is_first_kill: false,
      is_trade: false,
      traded_kill_id: null,
      trade_time_ticks: null,
    });
  }

  normalizeDamage(row: RawEventRow): NormalizeResult<Damage> {
    const anchor = this.readAnchor("damage", row);
    if (!anchor.success) return anchor;

    const attacker = this.readAttacker(row);

    return ok({
      ...anchor.data,
      attacker_steamid: attacker.steamid,
      attacker_name: attacker.name,
      victim_steamid: readSteamId(row, VICTIM.steamid) ?? UNKNOWN,
      victim_name: readString(row, VICTIM.name),
      weapon: readString(row, ["weapon"]),
      damage_health: readInt(row, ["dmg_health", "damage_health"]),
      damage_armor: readInt(row, ["dmg_armor", "damage_armor"]),
      hitgroup: readHitgroup(row, ["hitgroup"]),
      health_remaining: readInt(row, ["health", "health_remaining"]),
      armor_remaining: readInt(row, ["armor", "armor_remaining"]),
    });
  }

  /**
   * Round boundaries carry no round number: rounds are numbered by the
   * extractor in end-tick order.
   */
  normalizeRoundEnd(row: RawEventRow): NormalizeResult<RoundEndRecord> {
    const tick = readTick(row);
    if (tick === null) {
      return err(new MalformedRecordError("round", ["tick"]));
    }
    return ok({
      tick,
      winner: readWinner(row, ["winner", "winner_team", "winner_name"]),
      reason: readRoundEndReason(row, ["reason"]),
    });
  }

  normalizeFreezeEnd(row: RawEventRow): NormalizeResult<number> {
    const tick = readTick(row);
    return tick === null ? err(new MalformedRecordError("round", ["tick"])) : ok(tick);
  }

  normalizeGrenade(row: RawEventRow, type: GrenadeType): NormalizeResult<Grenade> {
    const anchor = this.readAnchor("grenade", row);
    if (!anchor.success) return anchor;

    const thrower = this.readActor(row);
    return ok<Grenade>({
      ...anchor.data,
      type,
      thrower_steamid: thrower.steamid,
      thrower_name: thrower.name,
      x: readNumber(row, ["x", "X"]),
      y: readNumber(row, ["y", "Y"]),
      z: readNumber(row, ["z", "Z"]),
    });
  }

  normalizeBombEvent(row: RawEventRow, eventType: BombEventType): NormalizeResult<BombEvent> {
    const anchor = this.readAnchor("bomb", row);
    if (!anchor.success) return anchor;

    const player = this.readActor(row);
    return ok<BombEvent>({
      ...anchor.data,
      event_type: eventType,
      player_steamid: player.steamid,
      player_name: player.name,
      x: readNumber(row, ["x", "X"]),
      y: readNumber(row, ["y", "Y"]),
      site: readOptionalString(row, ["site"]),
    });
  }

  /**
   * Snapshots may come without a round number; the economy extractor ties
   * them to the round whose freeze end they were sampled at.
   */
  normalizeSnapshot(row: RawEventRow): NormalizeResult<PlayerSnapshotRecord> {
    const tick = readTick(row);
    const steamid = readSteamId(row, ["steamid", "player_steamid"]);

    const missing: string[] = [];
    if (tick === null) missing.push("tick");
    if (steamid === null) missing.push("steamid");
    if (tick === null || steamid === null) {
      return err(new MalformedRecordError("economy", missing));
    }

    return ok({
      tick,
      round_num: readRoundNum(row),
      steamid,
      name: readString(row, ["name", "player_name"]),
      team: readTeam(row, ["team_name", "team_num", "team"]),
      equipment_value: readInt(row, ["current_equip_value", "equipment_value"]),
      cash_spent_round: readInt(row, ["cash_spent_this_round", "cash_spent_round"]),
      total_cash_spent: readInt(row, ["total_cash_spent"]),
    });
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  /**
   * Tick and round number, the identity every timed event needs
   */
  private readAnchor(
    kind: string,
    row: RawEventRow,
  ): NormalizeResult<{ tick: number; round_num: number }> {
    const tick = readTick(row);
    const roundNum = readRoundNum(row);

    if (tick === null || roundNum === null) {
      const missing: string[] = [];
      if (tick === null) missing.push("tick");
      if (roundNum === null) missing.push("round_num");
      return err(new MalformedRecordError(kind, missing));
    }

    return ok({ tick, round_num: roundNum });
  }

  private readAttacker(row: RawEventRow): Identity {
    const steamid = readSteamId(row, ATTACKER.steamid);
    if (steamid === null) {
      return { steamid: WORLD, name: WORLD };
    }
    return { steamid, name: readString(row, ATTACKER.name) };
  }

  private readActor(row: RawEventRow): Identity {
    return {
      steamid: readSteamId(row, ACTOR.steamid) ?? UNKNOWN,
      name: readString(row, ACTOR.name),
    };
  }

  private readPosition(
    row: RawEventRow,
    fields: { x: readonly string[]; y: readonly string[]; z: readonly string[] },
  ): Position {
    return {
      x: readNumber(row, fields.x),
      y: readNumber(row, fields.y),
      z: readNumber(row, fields.z),
    };
  }
}

// =============================================================================
// DISTANCE
// =============================================================================

export interface Position {
  x: number | null;
  y: number | null;
  z: number | null;
}

/**
 * 3D distance in game units, one decimal; null when either end is unknown
 */
export function calculateDistance(from: Position, to: Position): number | null {
  if (
    from.x === null ||
    from.y === null ||
    from.z === null ||
    to.x === null ||
    to.y === null ||
    to.z === null
  ) {
    return null;
  }

  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const dz = to.z - from.z;
  return Math.round(Math.sqrt(dx * dx + dy * dy + dz * dz) * 10) / 10;
}
