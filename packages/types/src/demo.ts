/**
 * Parsed demo envelope, match metadata and the result bundle.
 */

import { z } from "zod";
import { KillSchema, DamageSchema, GrenadeSchema, BombEventSchema, RawEventRowSchema } from "./events";
import { RoundSchema, RoundStatsSchema, ClutchSchema } from "./rounds";
import { PlayerSchema, PlayerMatchStatsSchema, EconomySnapshotSchema } from "./players";

// ============================================================================
// Parser Output
// ============================================================================

export const DemoHeaderSchema = z
  .object({
    map_name: z.string().optional(),
    server_name: z.string().optional(),
    tick_rate: z.number().positive().optional(),
    demo_file: z.string().optional(),
  })
  .passthrough();
export type DemoHeader = z.infer<typeof DemoHeaderSchema>;

/**
 * What the upstream demo parser hands over: a header and named event tables.
 * A table absent from `tables` means the match had no event of that kind.
 */
export const ParsedDemoSchema = z.object({
  header: DemoHeaderSchema,
  tables: z.record(z.array(RawEventRowSchema)).default({}),
});
export type ParsedDemo = z.infer<typeof ParsedDemoSchema>;

// ============================================================================
// Match Metadata
// ============================================================================

export const MatchMetadataSchema = z.object({
  demo_file: z.string(),
  map_name: z.string(),
  server_name: z.string(),
  duration_seconds: z.number().int().min(0),
  duration_formatted: z.string(),
  total_ticks: z.number().int().min(0),
  tickrate: z.number().positive(),
  total_rounds: z.number().int().min(0),
  extracted_at: z.string().datetime(),
  dropped_records: z.record(z.number().int().min(0)),
});
export type MatchMetadata = z.infer<typeof MatchMetadataSchema>;

// ============================================================================
// Result Bundle
// ============================================================================

export const MatchBundleSchema = z.object({
  metadata: MatchMetadataSchema,
  players: z.array(PlayerSchema),
  player_stats: z.array(PlayerMatchStatsSchema),
  rounds: z.array(RoundSchema),
  round_stats: z.array(RoundStatsSchema),
  kills: z.array(KillSchema),
  damages: z.array(DamageSchema),
  grenades: z.array(GrenadeSchema),
  bomb_events: z.array(BombEventSchema),
  economy: z.array(EconomySnapshotSchema),
  clutches: z.array(ClutchSchema),
});
export type MatchBundle = z.infer<typeof MatchBundleSchema>;

/** Names of the tabular collections of a bundle (everything but metadata) */
export type MatchCollectionName = Exclude<keyof MatchBundle, "metadata">;

export const MATCH_COLLECTIONS: readonly MatchCollectionName[] = [
  "players",
  "player_stats",
  "rounds",
  "round_stats",
  "kills",
  "damages",
  "grenades",
  "bomb_events",
  "economy",
  "clutches",
];
