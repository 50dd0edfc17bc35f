/**
 * Player Extractor - Match roster
 *
 * Players are merged from snapshots, then kills, then damage. The first
 * sighting sets the name; a later sighting only fills in a team that was
 * still unknown. World and unidentified participants are not players.
 */

import { Injectable, Logger } from "@nestjs/common";
import {
  EVENT_TABLES,
  UNKNOWN,
  type Player,
  type TeamLabel,
  type Kill,
  type Damage,
} from "@match-insights/types";
import type { Transformer, TransformContext, TransformResult } from "../transformer.interface";
import { createResult, createErrorResult } from "../transformer.interface";
import { EventNormalizer, collectRecords } from "../normalizers";
import { isPlayerId } from "../../../analysis/utils";

/**
 * Insertion-ordered roster keyed by steam id
 */
export class RosterBuilder {
  private readonly players = new Map<string, Player>();

  add(steamid: string | null, name: string | null, team: TeamLabel): void {
    if (!isPlayerId(steamid)) return;

    const existing = this.players.get(steamid);
    if (!existing) {
      this.players.set(steamid, { steamid, name: name ?? UNKNOWN, team });
      return;
    }
    if (existing.team === UNKNOWN && team !== UNKNOWN) {
      existing.team = team;
    }
  }

  addKills(kills: readonly Kill[]): void {
    for (const kill of kills) {
      this.add(kill.attacker_steamid, kill.attacker_name, kill.attacker_team);
      this.add(kill.victim_steamid, kill.victim_name, kill.victim_team);
      // Assisters fight for the attacker's side
      this.add(kill.assister_steamid, kill.assister_name, kill.attacker_team);
    }
  }

  addDamages(damages: readonly Damage[]): void {
    for (const damage of damages) {
      this.add(damage.attacker_steamid, damage.attacker_name, UNKNOWN);
      this.add(damage.victim_steamid, damage.victim_name, UNKNOWN);
    }
  }

  build(): Player[] {
    return [...this.players.values()];
  }
}

@Injectable()
export class PlayerExtractor implements Transformer {
  readonly name = "PlayerExtractor";
  readonly priority = 14; // After every event extractor
  readonly description = "Builds the match roster from snapshots, kills and damage";

  private readonly logger = new Logger(PlayerExtractor.name);

  constructor(private readonly normalizer: EventNormalizer) {}

  transform(ctx: TransformContext): TransformResult {
    const startTime = Date.now();
    const { demoId, tables, state } = ctx;

    try {
      const roster = new RosterBuilder();

      const snapshots = collectRecords(tables[EVENT_TABLES.PLAYER_SNAPSHOTS] ?? [], (row) =>
        this.normalizer.normalizeSnapshot(row),
      );
      for (const snapshot of snapshots.records) {
        roster.add(snapshot.steamid, snapshot.name, snapshot.team);
      }
      const fromSnapshots = roster.build().length;

      roster.addKills(state.kills);
      roster.addDamages(state.damages);

      state.players = roster.build();

      this.logger.log(`Found ${state.players.length} players for demo ${demoId}`);

      return createResult(this.name, startTime, state.players.length, {
        fromSnapshots,
        fromEvents: state.players.length - fromSnapshots,
        withoutTeam: state.players.filter((p) => p.team === UNKNOWN).length,
      });
    } catch (error) {
      this.logger.error(`Failed to build roster for demo ${demoId}`, error);
      return createErrorResult(this.name, startTime, error);
    }
  }
}
