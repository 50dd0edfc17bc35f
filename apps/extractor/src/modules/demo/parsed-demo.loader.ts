/**
 * Parsed Demo Loader - Reads a parser dump (header + event tables) from disk
 *
 * Only the envelope is validated here: the header must be an object and every
 * table an array of flat rows. Rows themselves are checked one by one by the
 * normalizer, which drops the bad ones instead of failing the whole match.
 */

import { Injectable, Logger } from "@nestjs/common";
import { promises as fs } from "fs";
import * as path from "path";
import {
  ParsedDemoSchema,
  EVENT_TABLES,
  GRENADE_EVENT_TABLES,
  BOMB_EVENT_TABLES,
  type ParsedDemo,
} from "@match-insights/types";
import { DemoLoadError } from "../../common/errors";
import { fileExists } from "../../common/streaming";

/** Every table the extractors read */
export const KNOWN_EVENT_TABLES: readonly string[] = [
  ...Object.values(EVENT_TABLES),
  ...GRENADE_EVENT_TABLES.map(([table]) => table),
  ...BOMB_EVENT_TABLES.map(([table]) => table),
];

@Injectable()
export class ParsedDemoLoader {
  private readonly logger = new Logger(ParsedDemoLoader.name);

  async load(filePath: string): Promise<ParsedDemo> {
    if (!(await fileExists(filePath))) {
      throw new DemoLoadError(filePath, "file not found");
    }

    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new DemoLoadError(filePath, error instanceof Error ? error.message : String(error));
    }

    const parsed = this.parse(filePath, text);
    if (!parsed.header.demo_file) {
      parsed.header.demo_file = path.basename(filePath).replace(/\.json$/i, "");
    }

    this.logger.log(
      `Loaded ${filePath}: ${Object.keys(parsed.tables).length} event tables`,
    );
    return parsed;
  }

  /**
   * Validate a parser envelope; missing tables are logged, not errors
   */
  parse(source: string, text: string): ParsedDemo {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DemoLoadError(
        source,
        `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      );
    }

    const result = ParsedDemoSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new DemoLoadError(source, `invalid parser output: ${issues}`);
    }

    const missing = KNOWN_EVENT_TABLES.filter((table) => !(table in result.data.tables));
    if (missing.length > 0) {
      this.logger.debug(`No events in ${source} for: ${missing.join(", ")}`);
    }

    return result.data;
  }
}
