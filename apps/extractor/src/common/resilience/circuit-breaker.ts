/**
 * Circuit Breaker for calls to external services
 *
 * After too many failures inside the failure window the breaker opens and
 * calls fail fast until the cool-down has passed. The next call is then a
 * probe: success closes the breaker, failure opens it again.
 *
 * Each call gets an AbortSignal that fires on the request timeout, so the
 * underlying request is cancelled rather than left running.
 */

import { Logger } from "@nestjs/common";
import { ExtractionError } from "../errors";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Failures within failureWindowMs before the breaker opens */
  failureThreshold: number;
  failureWindowMs: number;
  /** Time the breaker stays open before a probe is let through */
  coolDownMs: number;
  /** Per-call timeout */
  requestTimeoutMs: number;
}

const DEFAULT_OPTIONS: Omit<CircuitBreakerOptions, "name"> = {
  failureThreshold: 3,
  failureWindowMs: 60_000,
  coolDownMs: 30_000,
  requestTimeoutMs: 300_000, // large demos take minutes to parse
};

export class CircuitOpenError extends ExtractionError {
  readonly code = "CIRCUIT_OPEN";

  constructor(
    name: string,
    readonly retryAfterMs: number,
  ) {
    super(`Circuit ${name} is open, retry in ${retryAfterMs}ms`, { name, retryAfterMs });
  }
}

export class RequestTimeoutError extends ExtractionError {
  readonly code = "REQUEST_TIMEOUT";

  constructor(name: string, timeoutMs: number) {
    super(`${name} did not answer within ${timeoutMs}ms`, { name, timeoutMs });
  }
}

export class CircuitBreaker {
  private readonly logger: Logger;
  private readonly options: CircuitBreakerOptions;

  private state: CircuitState = "closed";
  private failures: number[] = [];
  private openedAt = 0;

  constructor(options: Partial<CircuitBreakerOptions> & { name: string }) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = new Logger(`CircuitBreaker:${this.options.name}`);
  }

  /**
   * Run fn under the breaker; fn must honour the signal
   */
  async execute<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const now = Date.now();

    if (this.state === "open") {
      const retryAfterMs = this.openedAt + this.options.coolDownMs - now;
      if (retryAfterMs > 0) {
        throw new CircuitOpenError(this.options.name, retryAfterMs);
      }
      this.state = "half_open";
      this.logger.log("Cool-down over, probing service");
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    try {
      const result = await fn(controller.signal);
      this.onSuccess();
      return result;
    } catch (error) {
      const failure = controller.signal.aborted
        ? new RequestTimeoutError(this.options.name, this.options.requestTimeoutMs)
        : error;
      this.onFailure(failure);
      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private onSuccess(): void {
    if (this.state === "half_open") {
      this.logger.log("Probe succeeded, circuit closed");
    }
    this.state = "closed";
    this.failures = [];
  }

  private onFailure(error: unknown): void {
    const now = Date.now();
    this.logger.warn(
      `Failure recorded: ${error instanceof Error ? error.message : String(error)}`,
    );

    if (this.state === "half_open") {
      this.open(now);
      return;
    }

    this.failures = this.failures.filter((t) => t > now - this.options.failureWindowMs);
    this.failures.push(now);

    if (this.failures.length >= this.options.failureThreshold) {
      this.open(now);
    }
  }

  private open(now: number): void {
    this.state = "open";
    this.openedAt = now;
    this.failures = [];
    this.logger.warn(`Circuit opened, cooling down for ${this.options.coolDownMs}ms`);
  }
}
