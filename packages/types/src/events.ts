/**
 * Canonical game event records and Zod schemas.
 *
 * These are the normalized shapes every derivation works on. Field names are
 * stable within a run so the records serialize straight to JSON or CSV rows.
 */

import { z } from "zod";
import {
  TeamLabelSchema,
  TickSchema,
  RoundNumSchema,
  NullableCoordinateSchema,
} from "./common";

// ============================================================================
// Raw event tables
// ============================================================================

/** Event tables requested from the demo parser */
export const EVENT_TABLES = {
  PLAYER_DEATH: "player_death",
  PLAYER_HURT: "player_hurt",
  ROUND_END: "round_end",
  ROUND_FREEZE_END: "round_freeze_end",
  PLAYER_SNAPSHOTS: "player_snapshots",
} as const;

export type EventTableName = (typeof EVENT_TABLES)[keyof typeof EVENT_TABLES];

/** A single flat row of a parser event table */
export const RawEventRowSchema = z.record(z.unknown());
export type RawEventRow = z.infer<typeof RawEventRowSchema>;

// ============================================================================
// Kill
// ============================================================================

export const KillSchema = z.object({
  kill_id: z.number().int().min(0),
  tick: TickSchema,
  round_num: RoundNumSchema,

  // Attacker
  attacker_steamid: z.string(),
  attacker_name: z.string(),
  attacker_team: TeamLabelSchema,
  attacker_x: NullableCoordinateSchema,
  attacker_y: NullableCoordinateSchema,
  attacker_z: NullableCoordinateSchema,

  // Victim
  victim_steamid: z.string(),
  victim_name: z.string(),
  victim_team: TeamLabelSchema,
  victim_x: NullableCoordinateSchema,
  victim_y: NullableCoordinateSchema,
  victim_z: NullableCoordinateSchema,

  // Kill details
  weapon: z.string(),
  headshot: z.boolean(),
  penetrated: z.boolean(),
  noscope: z.boolean(),
  thrusmoke: z.boolean(),
  attackerblind: z.boolean(),
  assistedflash: z.boolean(),
  distance: z.number().nullable(),

  // Assister
  assister_steamid: z.string().nullable(),
  assister_name: z.string().nullable(),

  // Derived by the round summarizer and the trade linker
  is_first_kill: z.boolean(),
  is_trade: z.boolean(),
  traded_kill_id: z.number().int().nullable(),
  trade_time_ticks: z.number().int().nullable(),
});
export type Kill = z.infer<typeof KillSchema>;

// ============================================================================
// Damage
// ============================================================================

export const DamageSchema = z.object({
  tick: TickSchema,
  round_num: RoundNumSchema,

  attacker_steamid: z.string(),
  attacker_name: z.string(),
  victim_steamid: z.string(),
  victim_name: z.string(),

  weapon: z.string(),
  damage_health: z.number().int().nullable(),
  damage_armor: z.number().int().nullable(),
  hitgroup: z.string(),
  health_remaining: z.number().int().nullable(),
  armor_remaining: z.number().int().nullable(),
});
export type Damage = z.infer<typeof DamageSchema>;

// ============================================================================
// Grenades
// ============================================================================

export const GrenadeTypeSchema = z.enum(["he", "flash", "smoke", "molotov", "decoy"]);
export type GrenadeType = z.infer<typeof GrenadeTypeSchema>;

/** Grenade detonation/start tables and the variant each one produces */
export const GRENADE_EVENT_TABLES: ReadonlyArray<readonly [string, GrenadeType]> = [
  ["hegrenade_detonate", "he"],
  ["flashbang_detonate", "flash"],
  ["smokegrenade_detonate", "smoke"],
  ["inferno_startburn", "molotov"],
  ["decoy_started", "decoy"],
];

const GrenadeBaseSchema = z.object({
  tick: TickSchema,
  round_num: RoundNumSchema,
  thrower_steamid: z.string(),
  thrower_name: z.string(),
  x: NullableCoordinateSchema,
  y: NullableCoordinateSchema,
  z: NullableCoordinateSchema,
});

export const GrenadeSchema = z.discriminatedUnion("type", [
  GrenadeBaseSchema.extend({ type: z.literal("he") }),
  GrenadeBaseSchema.extend({ type: z.literal("flash") }),
  GrenadeBaseSchema.extend({ type: z.literal("smoke") }),
  GrenadeBaseSchema.extend({ type: z.literal("molotov") }),
  GrenadeBaseSchema.extend({ type: z.literal("decoy") }),
]);
export type Grenade = z.infer<typeof GrenadeSchema>;

// ============================================================================
// Bomb
// ============================================================================

export const BombEventTypeSchema = z.enum(["plant", "defuse", "explode", "drop", "pickup"]);
export type BombEventType = z.infer<typeof BombEventTypeSchema>;

export const BOMB_EVENT_TABLES: ReadonlyArray<readonly [string, BombEventType]> = [
  ["bomb_planted", "plant"],
  ["bomb_defused", "defuse"],
  ["bomb_exploded", "explode"],
  ["bomb_dropped", "drop"],
  ["bomb_pickup", "pickup"],
];

const BombEventBaseSchema = z.object({
  tick: TickSchema,
  round_num: RoundNumSchema,
  player_steamid: z.string(),
  player_name: z.string(),
  x: NullableCoordinateSchema,
  y: NullableCoordinateSchema,
  site: z.string().nullable(),
});

export const BombEventSchema = z.discriminatedUnion("event_type", [
  BombEventBaseSchema.extend({ event_type: z.literal("plant") }),
  BombEventBaseSchema.extend({ event_type: z.literal("defuse") }),
  BombEventBaseSchema.extend({ event_type: z.literal("explode") }),
  BombEventBaseSchema.extend({ event_type: z.literal("drop") }),
  BombEventBaseSchema.extend({ event_type: z.literal("pickup") }),
]);
export type BombEvent = z.infer<typeof BombEventSchema>;
