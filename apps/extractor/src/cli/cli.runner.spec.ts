/**
 * CLI Runner Unit Tests
 */

import { Test, TestingModule } from "@nestjs/testing";
import { ConfigModule } from "@nestjs/config";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { CliRunner } from "./cli.runner";
import { DemoModule, ParserService } from "../modules/demo";
import { ExtractionModule } from "../modules/extraction";
import { ExportModule } from "../modules/export";
import { ReportModule } from "../modules/report";

describe("CliRunner", () => {
  let runner: CliRunner;
  let parser: ParserService;
  let output: string[];
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "match-insights-cli-"));

    const module: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        DemoModule,
        ExtractionModule,
        ExportModule,
        ReportModule,
      ],
      providers: [CliRunner],
    }).compile();

    runner = module.get(CliRunner);
    parser = module.get(ParserService);
    output = [];
    runner.setOutput((text) => output.push(text));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should extract a parser dump, then report on the exported bundle", async () => {
    const input = path.join(tmpDir, "scrim.json");
    await fs.writeFile(
      input,
      JSON.stringify({
        header: { map_name: "de_test", tick_rate: 64 },
        tables: {
          round_end: [{ tick: 640, winner: "CT", reason: "t_killed" }],
          player_death: [
            {
              tick: 320,
              round_num: 1,
              attacker_steamid: "ct1",
              attacker_name: "alpha",
              attacker_team_num: 3,
              user_steamid: "t1",
              user_name: "bravo",
              user_team_num: 2,
              weapon: "m4a1",
            },
          ],
        },
      }),
    );
    const outDir = path.join(tmpDir, "out");

    await expect(runner.run(["extract", input, "--out", outDir, "--format", "json"])).resolves.toBe(0);
    expect(output).toEqual([
      "scrim: de_test, 1 rounds, 1 kills (0 trades), 0 clutches, 2 players",
      `  ${path.join(outDir, "scrim.json")}`,
    ]);

    output = [];
    await expect(runner.run(["report", path.join(outDir, "scrim.json")])).resolves.toBe(0);
    expect(output).toHaveLength(1);
    expect(output[0]?.split("\n")).toContain("    alpha: 1/0 (1.00)");
  });

  it("should not upload a demo when the parser service is down", async () => {
    jest.spyOn(parser, "checkHealth").mockResolvedValue(false);
    const parseDemo = jest.spyOn(parser, "parseDemo");

    await expect(runner.run(["parse", path.join(tmpDir, "scrim.dem")])).resolves.toBe(1);
    expect(parseDemo).not.toHaveBeenCalled();
    expect(output).toEqual([]);
  });

  it("should print usage for help", async () => {
    await expect(runner.run(["--help"])).resolves.toBe(0);
    expect(output[0]).toMatch(/^Usage:/);
  });

  it("should return 1 for bad arguments and unreadable input", async () => {
    await expect(runner.run(["extract"])).resolves.toBe(1);
    await expect(runner.run(["extract", path.join(tmpDir, "missing.json")])).resolves.toBe(1);
    expect(output).toEqual([]);
  });
});
