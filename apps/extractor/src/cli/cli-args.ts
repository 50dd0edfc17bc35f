/**
 * Command line parsing
 *
 *   extract <parsed.json> [--out DIR] [--format json|csv|both] [--tick-rate N]
 *                         [--trade-window SECONDS] [--roster-size N] [--clutch-min N]
 *   parse   <demo.dem>    (same flags as extract)
 *   report  <bundle.json>
 */

import type { ExtractionOverrides } from "../common/config";
import { InvalidArgumentError } from "../common/errors";
import { isExportFormat, type ExportFormat } from "../modules/export";

export interface DeriveCommand {
  command: "extract" | "parse";
  input: string;
  outDir: string | undefined;
  format: ExportFormat;
  overrides: ExtractionOverrides;
}

export interface ReportCommand {
  command: "report";
  input: string;
}

export interface HelpCommand {
  command: "help";
}

export type CliCommand = DeriveCommand | ReportCommand | HelpCommand;

export const USAGE = [
  "Usage:",
  "  match-insights extract <parsed.json> [options]   derive a bundle from a parser dump",
  "  match-insights parse <demo.dem> [options]        send a demo to the parser service, then derive",
  "  match-insights report <bundle.json>              print a report for an exported bundle",
  "",
  "Options:",
  "  --out DIR                output directory (default: $OUTPUT_DIR or ./data)",
  "  --format json|csv|both   output format (default: both)",
  "  --tick-rate N            ticks per second, overrides the demo header",
  "  --trade-window SECONDS   trade window (default: 5)",
  "  --roster-size N          players per team (default: 5)",
  "  --clutch-min N           minimum opponents for a clutch (default: 2)",
].join("\n");

const VALUE_FLAGS = [
  "out",
  "format",
  "tick-rate",
  "trade-window",
  "roster-size",
  "clutch-min",
] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key);
}

interface SplitArgs {
  positional: string[];
  flags: Partial<Record<ValueFlag, string>>;
  help: boolean;
}

function splitArgs(argv: readonly string[]): SplitArgs {
  const split: SplitArgs = { positional: [], flags: {}, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === "-h" || arg === "--help") {
      split.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      split.positional.push(arg);
      continue;
    }

    const [key = "", inline] = arg.slice(2).split("=", 2);
    if (!isValueFlag(key)) {
      throw new InvalidArgumentError(key, `Unknown option --${key}`);
    }

    const value = inline ?? argv[i + 1];
    if (value === undefined || (inline === undefined && value.startsWith("--"))) {
      throw new InvalidArgumentError(key, `Option --${key} needs a value`);
    }
    if (inline === undefined) i++;
    split.flags[key] = value;
  }

  return split;
}

function positiveNumber(flag: ValueFlag, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(flag, `--${flag} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function positiveInt(flag: ValueFlag, value: string | undefined): number | undefined {
  const parsed = positiveNumber(flag, value);
  if (parsed !== undefined && !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(flag, `--${flag} must be a whole number, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { positional, flags, help } = splitArgs(argv);
  const [command, input, ...extra] = positional;

  if (help || command === undefined || command === "help") {
    return { command: "help" };
  }

  if (command !== "extract" && command !== "parse" && command !== "report") {
    throw new InvalidArgumentError("command", `Unknown command "${command}"`);
  }
  if (input === undefined) {
    throw new InvalidArgumentError("input", `Missing input file for ${command}`);
  }
  if (extra.length > 0) {
    throw new InvalidArgumentError("input", `Unexpected arguments: ${extra.join(" ")}`);
  }

  if (command === "report") {
    return { command, input };
  }

  const format = flags.format ?? "both";
  if (!isExportFormat(format)) {
    throw new InvalidArgumentError("format", `--format must be json, csv or both, got "${format}"`);
  }

  return {
    command,
    input,
    outDir: flags.out,
    format,
    overrides: {
      tickRate: positiveNumber("tick-rate", flags["tick-rate"]),
      tradeWindowSeconds: positiveNumber("trade-window", flags["trade-window"]),
      rosterSize: positiveInt("roster-size", flags["roster-size"]),
      clutchMinOpponents: positiveInt("clutch-min", flags["clutch-min"]),
    },
  };
}
