/**
 * Common types, markers and enums shared by every record.
 */

import { z } from "zod";

// ============================================================================
// Markers
// ============================================================================

/** Placeholder for a string field the source did not provide */
export const UNKNOWN = "unknown";

/** Attacker name used for environmental kills (fall damage, bomb, world) */
export const WORLD = "World";

// ============================================================================
// Enums
// ============================================================================

export const TeamSideSchema = z.enum(["CT", "TERRORIST"]);
export type TeamSide = z.infer<typeof TeamSideSchema>;

/** Team label carried on records; "unknown" when the source had none */
export const TeamLabelSchema = z.union([TeamSideSchema, z.literal(UNKNOWN)]);
export type TeamLabel = z.infer<typeof TeamLabelSchema>;

export const TEAM_NUM_SIDE: Readonly<Record<number, TeamSide>> = {
  2: "TERRORIST",
  3: "CT",
};

export const RoundEndReasonSchema = z.enum([
  "elimination",
  "bomb_exploded",
  "bomb_defused",
  "time_expired",
  "unknown",
]);
export type RoundEndReason = z.infer<typeof RoundEndReasonSchema>;

// Numeric reason codes as reported by the game
export const ROUND_END_REASON_MAP: Readonly<Record<number, RoundEndReason>> = {
  0: "bomb_exploded",
  1: "bomb_exploded",
  7: "bomb_defused",
  8: "elimination",
  9: "elimination",
  12: "time_expired",
};

// Textual reasons as emitted by the parser
export const ROUND_END_REASON_ALIASES: Readonly<Record<string, RoundEndReason>> = {
  t_killed: "elimination",
  ct_killed: "elimination",
  t_win: "elimination",
  ct_win: "elimination",
  terrorists_win: "elimination",
  counter_terrorists_win: "elimination",
  elimination: "elimination",
  bomb_exploded: "bomb_exploded",
  target_bombed: "bomb_exploded",
  bomb_defused: "bomb_defused",
  target_saved: "time_expired",
  time_ran_out: "time_expired",
  time_expired: "time_expired",
};

export const HitgroupSchema = z.enum([
  "generic",
  "head",
  "chest",
  "stomach",
  "left_arm",
  "right_arm",
  "left_leg",
  "right_leg",
  "neck",
  "gear",
]);
export type Hitgroup = z.infer<typeof HitgroupSchema>;

// Numeric hitgroup ids from older parser builds
export const HITGROUP_MAP: Readonly<Record<number, Hitgroup>> = {
  0: "generic",
  1: "head",
  2: "chest",
  3: "stomach",
  4: "left_arm",
  5: "right_arm",
  6: "left_leg",
  7: "right_leg",
  8: "neck",
  10: "gear",
};

// ============================================================================
// Common Schemas
// ============================================================================

export const TickSchema = z.number().int().min(0);

export const RoundNumSchema = z.number().int().min(1);

export const NullableCoordinateSchema = z.number().nullable();
