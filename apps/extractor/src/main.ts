#!/usr/bin/env node
/**
 * Match Insights - CLI Entry Point
 *
 * Boots a standalone application context (no HTTP server), runs one command
 * and closes the context before exiting.
 */

import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger, type LogLevel } from "@nestjs/common";
import { AppModule } from "./app.module";
import { CliRunner } from "./cli/cli.runner";

const logger = new Logger("Bootstrap");

function logLevels(): LogLevel[] {
  const levels: LogLevel[] = ["error", "warn", "log"];
  if (process.env.LOG_LEVEL === "debug") {
    levels.push("debug", "verbose");
  }
  return levels;
}

async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels(),
  });

  try {
    return await app.get(CliRunner).run(process.argv.slice(2));
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    logger.error(`Fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    process.exit(1);
  });
