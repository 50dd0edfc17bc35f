/**
 * Parsed Demo Loader Unit Tests
 */

import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { ParsedDemoLoader } from "./parsed-demo.loader";
import { DemoLoadError } from "../../common/errors";

describe("ParsedDemoLoader", () => {
  const loader = new ParsedDemoLoader();
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "match-insights-loader-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should load a parser dump and name it after the file", async () => {
    const filePath = path.join(tmpDir, "scrim.json");
    await fs.writeFile(
      filePath,
      JSON.stringify({
        header: { map_name: "de_test", tick_rate: 64 },
        tables: { round_end: [{ tick: 6400, winner: 3 }] },
      }),
    );

    const parsed = await loader.load(filePath);

    expect(parsed.header.demo_file).toBe("scrim");
    expect(parsed.header.map_name).toBe("de_test");
    expect(parsed.tables["round_end"]).toEqual([{ tick: 6400, winner: 3 }]);
  });

  it("should fail with DemoLoadError for a missing file", async () => {
    await expect(loader.load(path.join(tmpDir, "missing.json"))).rejects.toBeInstanceOf(DemoLoadError);
  });

  describe("parse", () => {
    it("should default missing tables to an empty set", () => {
      expect(loader.parse("inline", '{"header": {}}')).toEqual({ header: {}, tables: {} });
    });

    it("should reject invalid JSON", () => {
      expect(() => loader.parse("inline", "{not json")).toThrow(/invalid JSON/);
    });

    it("should reject tables that are not arrays of rows", () => {
      expect(() => loader.parse("inline", '{"header": {}, "tables": {"round_end": 5}}')).toThrow(
        "Failed to load demo inline: invalid parser output: tables.round_end: Expected array, received number",
      );
    });
  });
});
