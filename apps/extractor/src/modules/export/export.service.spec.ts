/**
 * Export Service Unit Tests
 */

import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import type { MatchBundle } from "@match-insights/types";
import { ExportService, isExportFormat } from "./export.service";
import { createKill, createRound } from "../../__tests__/factories";

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
      total_rounds: 1,
      extracted_at: "2024-05-01T12:00:00.000Z",
      dropped_records: {},
    },
    players: [{ steamid: "ct1", name: "CT Player 1", team: "CT" }],
    player_stats: [],
    rounds: [createRound()],
    round_stats: [],
    kills: [createKill()],
    damages: [],
    grenades: [],
    bomb_events: [],
    economy: [],
    clutches: [],
  };
}

describe("ExportService", () => {
  const exportService = new ExportService();
  let outDir: string;

  beforeEach(async () => {
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), "match-insights-export-"));
  });

  afterEach(async () => {
    await fs.rm(outDir, { recursive: true, force: true });
  });

  it("should write the bundle as JSON and one CSV per non-empty collection", async () => {
    const written = await exportService.exportBundle(createBundle(), outDir, "both");

    expect(written.map((f) => path.relative(outDir, f.path))).toEqual([
      "scrim.json",
      path.join("scrim", "players.csv"),
      path.join("scrim", "rounds.csv"),
      path.join("scrim", "kills.csv"),
    ]);

    const json: unknown = JSON.parse(await fs.readFile(path.join(outDir, "scrim.json"), "utf-8"));
    expect(json).toEqual(createBundle());

    const players = await fs.readFile(path.join(outDir, "scrim", "players.csv"), "utf-8");
    expect(players).toBe("steamid,name,team\nct1,CT Player 1,CT\n");
  });

  it("should only write what the format asks for", async () => {
    const written = await exportService.exportBundle(createBundle(), outDir, "json");

    expect(written).toHaveLength(1);
    expect(written[0]?.records).toBeUndefined();
  });

  it("should report the row count of each CSV", async () => {
    const written = await exportService.exportBundle(createBundle(), outDir, "csv");

    expect(written.map((f) => f.records)).toEqual([1, 1, 1]);
  });
});

describe("isExportFormat", () => {
  it("should accept the known formats only", () => {
    expect(isExportFormat("csv")).toBe(true);
    expect(isExportFormat("xml")).toBe(false);
  });
});
