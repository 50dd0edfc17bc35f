/**
 * Report Service Unit Tests
 */

import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import type { MatchBundle, PlayerMatchStats } from "@match-insights/types";
import { ReportService, countBy } from "./report.service";
import { BundleLoadError } from "../../common/errors";
import { createKill, createRound } from "../../__tests__/factories";

function createStats(overrides: Partial<PlayerMatchStats>): PlayerMatchStats {
  return {
    steamid: "ct1",
    name: "CT Player 1",
    team: "CT",
    kills: 0,
    deaths: 0,
    assists: 0,
    kd_ratio: 0,
    adr: 0,
    kast: 0,
    total_damage: 0,
    headshots: 0,
    hs_percentage: 0,
    first_kills: 0,
    first_deaths: 0,
    fk_fd_diff: 0,
    trade_kills: 0,
    flash_assists: 0,
    clutch_attempts: 0,
    clutch_wins: 0,
    clutch_rate: 0,
    ...overrides,
  };
}

function createBundle(): MatchBundle {
  return {
    metadata: {
      demo_file: "scrim",
      map_name: "de_test",
      server_name: "local",
      duration_seconds: 100,
      duration_formatted: "1:40",
      total_ticks: 6400,
      tickrate: 64,
      total_rounds: 3,
      extracted_at: "2024-05-01T12:00:00.000Z",
      dropped_records: { round: 0, kill: 2 },
    },
    players: [
      { steamid: "ct1", name: "CT Player 1", team: "CT" },
      { steamid: "t1", name: "T Player 1", team: "TERRORIST" },
    ],
    player_stats: [
      createStats({ kills: 2, deaths: 1, kd_ratio: 2, adr: 88.5, kast: 66.7, hs_percentage: 50 }),
      createStats({ steamid: "t1", name: "T Player 1", team: "TERRORIST", kills: 1, deaths: 2, kd_ratio: 0.5 }),
    ],
    rounds: [
      createRound({ round_num: 1 }),
      createRound({ round_num: 2, reason: "bomb_defused" }),
      createRound({ round_num: 3, winner: "TERRORIST" }),
    ],
    round_stats: [],
    kills: [
      createKill({ kill_id: 0, headshot: true, is_first_kill: true }),
      createKill({ kill_id: 1, round_num: 2, victim_steamid: "t1" }),
      createKill({
        kill_id: 2,
        round_num: 3,
        attacker_steamid: "t1",
        attacker_name: "T Player 1",
        victim_steamid: "ct1",
        victim_name: "CT Player 1",
        is_trade: true,
      }),
    ],
    damages: [],
    grenades: [],
    bomb_events: [],
    economy: [],
    clutches: [
      {
        round_num: 3,
        player_steamid: "ct1",
        player_name: "CT Player 1",
        player_team: "CT",
        clutch_type: "1v2",
        opponents: 2,
        won: false,
        start_tick: 5000,
      },
    ],
  };
}

describe("ReportService", () => {
  const reportService = new ReportService();

  describe("buildReport", () => {
    const lines = reportService.buildReport(createBundle()).split("\n");

    it("should frame the report", () => {
      expect(lines.slice(0, 3)).toEqual(["=".repeat(70), "MATCH ANALYSIS REPORT", "=".repeat(70)]);
      expect(lines.slice(-3)).toEqual(["=".repeat(70), "ANALYSIS COMPLETE", "=".repeat(70)]);
    });

    it("should describe the match", () => {
      expect(lines).toContain("  Map: de_test");
      expect(lines).toContain("  Duration: 1:40 (100 seconds)");
      expect(lines).toContain("  Total ticks: 6,400");
      expect(lines).toContain("  Dropped records: kill 2");
    });

    it("should count round wins and reasons", () => {
      expect(lines).toContain("  Total rounds: 3");
      expect(lines).toContain("    CT: 2 rounds");
      expect(lines).toContain("    TERRORIST: 1 rounds");
      expect(lines).toContain("    bomb_defused: 1");
    });

    it("should list kill statistics", () => {
      expect(lines).toContain("    CT Player 1: 2 kills");
      expect(lines).toContain("    CT Player 1: 2/1 (2.00)");
      expect(lines).toContain("    T Player 1: 1/2 (0.50)");
      expect(lines).toContain("  Headshot kills: 1 (33.3%)");
      expect(lines).toContain("    Trades: 1");
    });

    it("should list clutches and ratings", () => {
      expect(lines).toContain("  Clutches: 1");
      expect(lines).toContain("    Round 3: CT Player 1 (CT) 1v2 lost");
      expect(lines).toContain("    CT Player 1: 88.5 / 66.7% / 50.0%");
      expect(lines).toContain("    CT Player 1: 1 opening kills");
    });
  });

  describe("loadBundle", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "match-insights-report-"));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it("should read back an exported bundle", async () => {
      const filePath = path.join(tmpDir, "scrim.json");
      await fs.writeFile(filePath, JSON.stringify(createBundle()));

      await expect(reportService.loadBundle(filePath)).resolves.toEqual(createBundle());
    });

    it("should reject a file that is not a bundle", async () => {
      const filePath = path.join(tmpDir, "other.json");
      await fs.writeFile(filePath, JSON.stringify({ metadata: {} }));

      await expect(reportService.loadBundle(filePath)).rejects.toBeInstanceOf(BundleLoadError);
    });
  });
});

describe("countBy", () => {
  it("should order by count, keeping first-seen order for ties", () => {
    expect(countBy(["b", "a", "c", "a", "c"], (x) => x)).toEqual([
      ["a", 2],
      ["c", 2],
      ["b", 1],
    ]);
  });
});
