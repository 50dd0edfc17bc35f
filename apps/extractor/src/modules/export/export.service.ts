/**
 * Export Service - Writes a match bundle to disk
 *
 * Layout under the output directory:
 *   <demo>.json                 whole bundle, pretty-printed
 *   <demo>/<collection>.csv     one file per non-empty collection
 */

import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import { MATCH_COLLECTIONS, type MatchBundle } from "@match-insights/types";
import { writeTextFile } from "../../common/streaming";
import { toCsv } from "./csv.serializer";

export const EXPORT_FORMATS = ["json", "csv", "both"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface WrittenFile {
  path: string;
  bytes: number;
  records?: number;
}

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  async exportBundle(
    bundle: MatchBundle,
    outputDir: string,
    format: ExportFormat = "both",
  ): Promise<WrittenFile[]> {
    const demoName = bundle.metadata.demo_file;
    const written: WrittenFile[] = [];

    if (format === "json" || format === "both") {
      written.push(await this.writeJson(bundle, path.join(outputDir, `${demoName}.json`)));
    }

    if (format === "csv" || format === "both") {
      written.push(...(await this.writeCsv(bundle, path.join(outputDir, demoName))));
    }

    this.logger.log(`Wrote ${written.length} files for ${demoName} to ${outputDir}`);
    return written;
  }

  private async writeJson(bundle: MatchBundle, filePath: string): Promise<WrittenFile> {
    const bytes = await writeTextFile(filePath, `${JSON.stringify(bundle, null, 2)}\n`);
    this.logger.debug(`Saved ${filePath} (${bytes} bytes)`);
    return { path: filePath, bytes };
  }

  private async writeCsv(bundle: MatchBundle, directory: string): Promise<WrittenFile[]> {
    const written: WrittenFile[] = [];

    for (const collection of MATCH_COLLECTIONS) {
      const records = bundle[collection];
      if (records.length === 0) {
        this.logger.debug(`Skipping empty collection ${collection}`);
        continue;
      }

      const filePath = path.join(directory, `${collection}.csv`);
      const bytes = await writeTextFile(filePath, toCsv(records));
      written.push({ path: filePath, bytes, records: records.length });
    }

    return written;
  }
}
