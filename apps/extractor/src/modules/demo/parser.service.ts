/**
 * Parser Service - Communicates with the demo parser microservice
 *
 * The parser turns a .dem file into the same envelope the loader reads from
 * disk: a header plus named event tables. Every failure (missing file,
 * service down, timeout, bad payload) surfaces as a DemoLoadError before
 * any derivation runs.
 *
 * Features:
 * - Circuit breaker pattern for fault tolerance
 * - Request timeouts with AbortController
 * - Health check
 */

import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import * as path from "path";
import type { ParsedDemo } from "@match-insights/types";
import { CircuitBreaker, CircuitOpenError } from "../../common/resilience";
import { fileExists, readFileToBlob } from "../../common/streaming";
import { DemoLoadError } from "../../common/errors";
import { ParsedDemoLoader, KNOWN_EVENT_TABLES } from "./parsed-demo.loader";

export interface ParseDemoOptions {
  /** Event tables to request; defaults to every table the extractors read */
  events?: readonly string[];
}

@Injectable()
export class ParserService {
  private readonly logger = new Logger(ParserService.name);
  private readonly parserUrl: string;
  private readonly circuitBreaker: CircuitBreaker;

  // Timeout for health checks (5 seconds)
  private readonly HEALTH_TIMEOUT = 5000;

  constructor(
    configService: ConfigService,
    private readonly loader: ParsedDemoLoader,
  ) {
    this.parserUrl = configService.get<string>("PARSER_URL", "http://localhost:8001");

    this.circuitBreaker = new CircuitBreaker({
      name: "ParserService",
      requestTimeoutMs: Number(configService.get<number | string>("PARSER_TIMEOUT_MS", 300000)),
    });
  }

  /**
   * Send a demo file to the parser service and return its parsed envelope
   */
  async parseDemo(demoPath: string, options: ParseDemoOptions = {}): Promise<ParsedDemo> {
    // Check file exists before consuming circuit breaker attempt
    if (!(await fileExists(demoPath))) {
      throw new DemoLoadError(demoPath, "file not found");
    }

    const filename = path.basename(demoPath);
    const params = new URLSearchParams();
    params.set("events", (options.events ?? KNOWN_EVENT_TABLES).join(","));

    let body: string;
    try {
      body = await this.circuitBreaker.execute(async (signal) => {
        const formData = new FormData();
        formData.append("file", await readFileToBlob(demoPath), filename);

        const response = await fetch(`${this.parserUrl}/parse/sync?${params.toString()}`, {
          method: "POST",
          body: formData,
          signal,
        });

        const text = await response.text();
        if (!response.ok) {
          throw new Error(`Parser returned ${response.status}: ${text}`);
        }
        return text;
      });
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        this.logger.warn(`Circuit breaker open, retry in ${error.retryAfterMs}ms`);
        throw new DemoLoadError(
          demoPath,
          `parser service temporarily unavailable, retry in ${Math.ceil(error.retryAfterMs / 1000)}s`,
        );
      }

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to parse demo ${filename}: ${reason}`);
      throw new DemoLoadError(demoPath, reason, { parserUrl: this.parserUrl });
    }

    const parsed = this.loader.parse(filename, body);
    if (!parsed.header.demo_file) {
      parsed.header.demo_file = filename;
    }

    this.logger.log(`Parsed ${filename} via ${this.parserUrl}`);
    return parsed;
  }

  /**
   * Check parser service health with timeout
   */
  async checkHealth(): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.HEALTH_TIMEOUT);

    try {
      const response = await fetch(`${this.parserUrl}/health`, { signal: controller.signal });
      return response.ok;
    } catch (error) {
      this.logger.debug(
        `Health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
