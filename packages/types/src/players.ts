/**
 * Player roster, economy and per-match statistics schemas.
 */

import { z } from "zod";
import { TeamLabelSchema, TickSchema, RoundNumSchema } from "./common";

// ============================================================================
// Roster
// ============================================================================

export const PlayerSchema = z.object({
  steamid: z.string().min(1),
  name: z.string(),
  team: TeamLabelSchema,
});
export type Player = z.infer<typeof PlayerSchema>;

// ============================================================================
// Economy
// ============================================================================

export const EconomySnapshotSchema = z.object({
  round_num: RoundNumSchema,
  tick: TickSchema,
  steamid: z.string().min(1),
  name: z.string(),
  team: TeamLabelSchema,
  equipment_value: z.number().int().nullable(),
  cash_spent_round: z.number().int().nullable(),
  total_cash_spent: z.number().int().nullable(),
});
export type EconomySnapshot = z.infer<typeof EconomySnapshotSchema>;

// ============================================================================
// Match Statistics
// ============================================================================

export const PlayerMatchStatsSchema = z.object({
  steamid: z.string(),
  name: z.string(),
  team: TeamLabelSchema,

  // Core
  kills: z.number().int().min(0),
  deaths: z.number().int().min(0),
  assists: z.number().int().min(0),
  kd_ratio: z.number().min(0),
  adr: z.number().min(0),
  kast: z.number().min(0).max(100),
  total_damage: z.number().int().min(0),

  // Precision
  headshots: z.number().int().min(0),
  hs_percentage: z.number().min(0).max(100),

  // Opening duels
  first_kills: z.number().int().min(0),
  first_deaths: z.number().int().min(0),
  fk_fd_diff: z.number().int(),

  // Teamplay
  trade_kills: z.number().int().min(0),
  flash_assists: z.number().int().min(0),

  // Clutches
  clutch_attempts: z.number().int().min(0),
  clutch_wins: z.number().int().min(0),
  clutch_rate: z.number().min(0).max(100),
});
export type PlayerMatchStats = z.infer<typeof PlayerMatchStatsSchema>;
