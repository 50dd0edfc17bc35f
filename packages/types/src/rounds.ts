/**
 * Round data type definitions and Zod schemas.
 */

import { z } from "zod";
import {
  TeamSideSchema,
  TeamLabelSchema,
  RoundEndReasonSchema,
  TickSchema,
  RoundNumSchema,
} from "./common";

// ============================================================================
// Round
// ============================================================================

export const RoundSchema = z.object({
  round_num: RoundNumSchema,
  start_tick: TickSchema,
  end_tick: TickSchema,
  duration_seconds: z.number().min(0),
  winner: TeamSideSchema.nullable(),
  reason: RoundEndReasonSchema,
});
export type Round = z.infer<typeof RoundSchema>;

// ============================================================================
// Round Outcome
// ============================================================================

export const RoundStatsSchema = z.object({
  round_num: RoundNumSchema,
  winner: TeamSideSchema.nullable(),
  reason: RoundEndReasonSchema,
  duration_seconds: z.number().min(0),
  total_kills: z.number().int().min(0),

  // Entry kill, all null when nobody died
  first_kill_tick: TickSchema.nullable(),
  first_kill_attacker: z.string().nullable(),
  first_kill_attacker_steamid: z.string().nullable(),
  first_kill_attacker_team: TeamLabelSchema.nullable(),
  first_kill_victim: z.string().nullable(),
  first_kill_victim_steamid: z.string().nullable(),
  first_kill_weapon: z.string().nullable(),
  first_kill_team_won: z.boolean().nullable(),
});
export type RoundStats = z.infer<typeof RoundStatsSchema>;

// ============================================================================
// Clutch
// ============================================================================

export const ClutchSchema = z.object({
  round_num: RoundNumSchema,
  player_steamid: z.string(),
  player_name: z.string(),
  player_team: TeamSideSchema,
  clutch_type: z.string().regex(/^1v\d+$/),
  opponents: z.number().int().min(1),
  won: z.boolean(),
  start_tick: TickSchema,
});
export type Clutch = z.infer<typeof ClutchSchema>;
