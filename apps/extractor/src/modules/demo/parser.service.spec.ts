/**
 * Parser Service Unit Tests
 *
 * The parser microservice is replaced by a stubbed global fetch.
 */

import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { ParserService } from "./parser.service";
import { ParsedDemoLoader } from "./parsed-demo.loader";
import { DemoLoadError } from "../../common/errors";

describe("ParserService", () => {
  let parserService: ParserService;
  let tmpDir: string;
  let demoPath: string;
  let fetchMock: jest.SpyInstance;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "match-insights-parser-"));
    demoPath = path.join(tmpDir, "scrim.dem");
    await fs.writeFile(demoPath, "demo-bytes");

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ParserService,
        ParsedDemoLoader,
        {
          provide: ConfigService,
          useValue: new ConfigService({ PARSER_URL: "http://parser.test", PARSER_TIMEOUT_MS: 1000 }),
        },
      ],
    }).compile();

    parserService = module.get(ParserService);
    fetchMock = jest.spyOn(global, "fetch");
  });

  afterEach(async () => {
    fetchMock.mockRestore();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("parseDemo", () => {
    it("should upload the demo and validate the answer", async () => {
      fetchMock.mockResolvedValue(
        new Response(JSON.stringify({ header: { map_name: "de_test" }, tables: { round_end: [] } }), {
          status: 200,
        }),
      );

      const parsed = await parserService.parseDemo(demoPath, { events: ["round_end", "player_death"] });

      expect(parsed.header).toEqual({ map_name: "de_test", demo_file: "scrim.dem" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        "http://parser.test/parse/sync?events=round_end%2Cplayer_death",
      );
    });

    it("should not call the service for a missing file", async () => {
      await expect(parserService.parseDemo(path.join(tmpDir, "missing.dem"))).rejects.toThrow(
        `Failed to load demo ${path.join(tmpDir, "missing.dem")}: file not found`,
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("should surface service errors as DemoLoadError", async () => {
      fetchMock.mockResolvedValue(new Response("bad demo", { status: 422 }));

      await expect(parserService.parseDemo(demoPath)).rejects.toThrow(
        `Failed to load demo ${demoPath}: Parser returned 422: bad demo`,
      );
    });

    it("should fail fast once the circuit is open", async () => {
      fetchMock.mockRejectedValue(new Error("connect ECONNREFUSED"));

      for (let i = 0; i < 3; i++) {
        await expect(parserService.parseDemo(demoPath)).rejects.toBeInstanceOf(DemoLoadError);
      }
      await expect(parserService.parseDemo(demoPath)).rejects.toThrow(/temporarily unavailable/);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  describe("checkHealth", () => {
    it("should report a healthy service", async () => {
      fetchMock.mockResolvedValue(new Response("ok", { status: 200 }));

      await expect(parserService.checkHealth()).resolves.toBe(true);
    });

    it("should report an unreachable service as unhealthy", async () => {
      fetchMock.mockRejectedValue(new Error("connect ECONNREFUSED"));

      await expect(parserService.checkHealth()).resolves.toBe(false);
    });
  });
});
