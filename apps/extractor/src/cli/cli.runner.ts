/**
 * CLI Runner - Dispatches a parsed command to the services
 *
 * Returns the process exit code instead of exiting, so the caller can close
 * the application context first.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { MatchBundle, ParsedDemo } from "@match-insights/types";
import { ExtractionConfigService } from "../common/config";
import { DemoLoadError, ExtractionError } from "../common/errors";
import { ParsedDemoLoader, ParserService } from "../modules/demo";
import { ExtractionService } from "../modules/extraction";
import { ExportService, type WrittenFile } from "../modules/export";
import { ReportService } from "../modules/report";
import { parseCliArgs, USAGE, type DeriveCommand } from "./cli-args";

/** Where user-facing text goes; the logger carries everything else */
export type OutputWriter = (text: string) => void;

@Injectable()
export class CliRunner {
  private readonly logger = new Logger(CliRunner.name);
  private write: OutputWriter = (text) => process.stdout.write(`${text}\n`);

  constructor(
    private readonly loader: ParsedDemoLoader,
    private readonly parser: ParserService,
    private readonly extraction: ExtractionService,
    private readonly exporter: ExportService,
    private readonly reports: ReportService,
    private readonly extractionConfig: ExtractionConfigService,
  ) {}

  setOutput(writer: OutputWriter): void {
    this.write = writer;
  }

  async run(argv: readonly string[]): Promise<number> {
    try {
      const cmd = parseCliArgs(argv);

      switch (cmd.command) {
        case "help":
          this.write(USAGE);
          return 0;
        case "report": {
          const bundle = await this.reports.loadBundle(cmd.input);
          this.write(this.reports.buildReport(bundle));
          return 0;
        }
        case "extract":
        case "parse":
          await this.derive(cmd);
          return 0;
      }
    } catch (error) {
      if (error instanceof ExtractionError) {
        this.logger.error(`[${error.code}] ${error.message}`);
        return 1;
      }
      throw error;
    }
  }

  private async derive(cmd: DeriveCommand): Promise<WrittenFile[]> {
    const parsed: ParsedDemo =
      cmd.command === "parse"
        ? await this.parseWithService(cmd.input)
        : await this.loader.load(cmd.input);

    const bundle = this.extraction.extract(parsed, { overrides: cmd.overrides });
    const outDir = cmd.outDir ?? this.extractionConfig.getOutputDir();
    const written = await this.exporter.exportBundle(bundle, outDir, cmd.format);

    this.write(this.summarize(bundle));
    for (const file of written) {
      this.write(`  ${file.path}${file.records === undefined ? "" : ` (${file.records} rows)`}`);
    }
    return written;
  }

  /**
   * Fails fast when the parser service is down instead of uploading the demo
   */
  private async parseWithService(demoPath: string): Promise<ParsedDemo> {
    if (!(await this.parser.checkHealth())) {
      throw new DemoLoadError(demoPath, "parser service is not reachable");
    }
    return this.parser.parseDemo(demoPath);
  }

  private summarize({ metadata, kills, clutches, players }: MatchBundle): string {
    const trades = kills.filter((k) => k.is_trade).length;
    return (
      `${metadata.demo_file}: ${metadata.map_name}, ${metadata.total_rounds} rounds, ` +
      `${kills.length} kills (${trades} trades), ${clutches.length} clutches, ` +
      `${players.length} players`
    );
  }
}
