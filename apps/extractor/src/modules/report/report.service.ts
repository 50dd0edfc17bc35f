/**
 * Report Service - Plain-text match report from a result bundle
 *
 * Sections:
 * 1. Match overview        6. Grenade usage
 * 2. Team composition      7. Bomb events
 * 3. Round results         8. Economy
 * 4. Kill statistics       9. Advanced metrics (openings, distances,
 * 5. Damage statistics        clutches, player ratings)
 */

import { Injectable, Logger } from "@nestjs/common";
import { promises as fs } from "fs";
import { MatchBundleSchema, WORLD, type MatchBundle } from "@match-insights/types";
import { BundleLoadError } from "../../common/errors";
import { percentage, safeDivide } from "../analysis/utils";

const RULE = "=".repeat(70);
const SUB_RULE = "-".repeat(40);

/**
 * Occurrences per key, most frequent first; ties keep first-seen order
 */
export function countBy<T>(items: readonly T[], key: (item: T) => string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  /**
   * Read and validate an exported bundle
   */
  async loadBundle(filePath: string): Promise<MatchBundle> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
    } catch (error) {
      throw new BundleLoadError(filePath, error instanceof Error ? error.message : String(error));
    }

    const result = MatchBundleSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid bundle";
      throw new BundleLoadError(filePath, where);
    }

    this.logger.debug(`Loaded bundle ${filePath}`);
    return result.data;
  }

  buildReport(bundle: MatchBundle): string {
    const lines: string[] = [RULE, "MATCH ANALYSIS REPORT", RULE];

    this.overview(lines, bundle);
    this.teams(lines, bundle);
    this.rounds(lines, bundle);
    this.killStats(lines, bundle);
    this.damageStats(lines, bundle);
    this.grenades(lines, bundle);
    this.bomb(lines, bundle);
    this.economy(lines, bundle);
    this.advanced(lines, bundle);

    lines.push("", RULE, "ANALYSIS COMPLETE", RULE);
    return lines.join("\n");
  }

  // ===========================================================================
  // SECTIONS
  // ===========================================================================

  private section(lines: string[], title: string): void {
    lines.push("", title, SUB_RULE);
  }

  private overview(lines: string[], { metadata }: MatchBundle): void {
    this.section(lines, "[1] MATCH OVERVIEW");
    lines.push(
      `  Map: ${metadata.map_name}`,
      `  Server: ${metadata.server_name}`,
      `  Duration: ${metadata.duration_formatted} (${metadata.duration_seconds} seconds)`,
      `  Tickrate: ${metadata.tickrate}`,
      `  Total ticks: ${metadata.total_ticks.toLocaleString("en-US")}`,
    );

    const dropped = Object.entries(metadata.dropped_records).filter(([, n]) => n > 0);
    if (dropped.length > 0) {
      lines.push(`  Dropped records: ${dropped.map(([kind, n]) => `${kind} ${n}`).join(", ")}`);
    }
  }

  private teams(lines: string[], { players }: MatchBundle): void {
    this.section(lines, "[2] TEAM COMPOSITION");

    const byTeam = new Map<string, string[]>();
    for (const player of players) {
      const members = byTeam.get(player.team) ?? [];
      members.push(player.name);
      byTeam.set(player.team, members);
    }

    for (const [team, members] of byTeam) {
      lines.push(`  ${team}:`, ...members.map((name) => `    - ${name}`));
    }
  }

  private rounds(lines: string[], { rounds }: MatchBundle): void {
    this.section(lines, "[3] ROUND RESULTS");
    lines.push(`  Total rounds: ${rounds.length}`);

    for (const [winner, count] of countBy(rounds, (r) => r.winner ?? "unknown")) {
      lines.push(`    ${winner}: ${count} rounds`);
    }

    lines.push("", "  Win reasons:");
    for (const [reason, count] of countBy(rounds, (r) => r.reason)) {
      lines.push(`    ${reason}: ${count}`);
    }
  }

  private killStats(lines: string[], { kills, player_stats }: MatchBundle): void {
    this.section(lines, "[4] KILL STATISTICS");
    lines.push(`  Total kills: ${kills.length}`);

    lines.push("", "  Top fraggers:");
    const playerKills = countBy(
      kills.filter((k) => k.attacker_steamid !== WORLD),
      (k) => k.attacker_name,
    );
    for (const [name, count] of playerKills.slice(0, 5)) {
      lines.push(`    ${name}: ${count} kills`);
    }

    lines.push("", "  Most deaths:");
    for (const [name, count] of countBy(kills, (k) => k.victim_name).slice(0, 5)) {
      lines.push(`    ${name}: ${count} deaths`);
    }

    lines.push("", "  K/D Ratios:");
    const byKd = [...player_stats].sort((a, b) => b.kd_ratio - a.kd_ratio);
    for (const p of byKd.slice(0, 10)) {
      lines.push(`    ${p.name}: ${p.kills}/${p.deaths} (${p.kd_ratio.toFixed(2)})`);
    }

    const headshots = kills.filter((k) => k.headshot).length;
    lines.push(
      "",
      `  Headshot kills: ${headshots} (${percentage(headshots, kills.length).toFixed(1)}%)`,
    );

    lines.push("", "  Most used weapons (for kills):");
    for (const [weapon, count] of countBy(kills, (k) => k.weapon).slice(0, 10)) {
      lines.push(`    ${weapon}: ${count}`);
    }

    lines.push(
      "",
      "  Special kills:",
      `    Wallbangs: ${kills.filter((k) => k.penetrated).length}`,
      `    Noscopes: ${kills.filter((k) => k.noscope).length}`,
      `    Through smoke: ${kills.filter((k) => k.thrusmoke).length}`,
      `    While blind: ${kills.filter((k) => k.attackerblind).length}`,
      `    Trades: ${kills.filter((k) => k.is_trade).length}`,
    );
  }

  private damageStats(lines: string[], { damages, player_stats }: MatchBundle): void {
    this.section(lines, "[5] DAMAGE STATISTICS");

    const totalDamage = damages.reduce((sum, d) => sum + (d.damage_health ?? 0), 0);
    lines.push(`  Total damage events: ${damages.length}`, `  Total damage dealt: ${totalDamage}`);

    lines.push("", "  Top damage dealers:");
    const byDamage = [...player_stats].sort((a, b) => b.total_damage - a.total_damage);
    for (const p of byDamage.slice(0, 5)) {
      lines.push(`    ${p.name}: ${p.total_damage} total (${p.adr.toFixed(1)} ADR)`);
    }

    lines.push("", "  Hitgroup distribution:");
    for (const [hitgroup, count] of countBy(damages, (d) => d.hitgroup)) {
      lines.push(`    ${hitgroup}: ${count} (${percentage(count, damages.length).toFixed(1)}%)`);
    }
  }

  private grenades(lines: string[], { grenades, rounds }: MatchBundle): void {
    this.section(lines, "[6] GRENADE USAGE");
    for (const [type, count] of countBy(grenades, (g) => g.type)) {
      lines.push(`  ${type}: ${count} (${safeDivide(count, rounds.length).toFixed(1)} per round)`);
    }
  }

  private bomb(lines: string[], { bomb_events }: MatchBundle): void {
    this.section(lines, "[7] BOMB EVENTS");
    for (const [eventType, count] of countBy(bomb_events, (b) => b.event_type)) {
      lines.push(`  ${eventType}: ${count}`);
    }
  }

  private economy(lines: string[], { economy }: MatchBundle): void {
    this.section(lines, "[8] ECONOMY ANALYSIS");
    if (economy.length === 0) return;

    const valuesByTeam = new Map<string, number[]>();
    for (const snapshot of economy) {
      if (snapshot.equipment_value === null) continue;
      const values = valuesByTeam.get(snapshot.team) ?? [];
      values.push(snapshot.equipment_value);
      valuesByTeam.set(snapshot.team, values);
    }

    lines.push("  Average equipment value by team:");
    for (const [team, values] of valuesByTeam) {
      const avg = safeDivide(
        values.reduce((sum, v) => sum + v, 0),
        values.length,
      );
      lines.push(`    ${team}: $${avg.toFixed(0)}`);
    }
  }

  private advanced(lines: string[], bundle: MatchBundle): void {
    const { kills, clutches, player_stats } = bundle;
    this.section(lines, "[9] ADVANCED METRICS");

    lines.push("  First kill leaders:");
    const openings = countBy(
      kills.filter((k) => k.is_first_kill),
      (k) => k.attacker_name,
    );
    for (const [name, count] of openings.slice(0, 5)) {
      lines.push(`    ${name}: ${count} opening kills`);
    }

    const distances = kills.flatMap((k) => (k.distance === null ? [] : [k.distance]));
    if (distances.length > 0) {
      const avg = distances.reduce((sum, d) => sum + d, 0) / distances.length;
      lines.push(
        "",
        "  Kill distances:",
        `    Average: ${avg.toFixed(0)} units`,
        `    Longest: ${Math.max(...distances).toFixed(0)} units`,
        `    Shortest: ${Math.min(...distances).toFixed(0)} units`,
      );
    }

    lines.push("", `  Clutches: ${clutches.length}`);
    for (const c of clutches) {
      lines.push(
        `    Round ${c.round_num}: ${c.player_name} (${c.player_team}) ${c.clutch_type} ${c.won ? "won" : "lost"}`,
      );
    }

    lines.push("", "  Player ratings (ADR / KAST / HS%):");
    for (const p of player_stats) {
      lines.push(
        `    ${p.name}: ${p.adr.toFixed(1)} / ${p.kast.toFixed(1)}% / ${p.hs_percentage.toFixed(1)}%`,
      );
    }
  }
}
