/**
 * Transformer Orchestrator - Coordinates execution of all transformers
 *
 * Responsibilities:
 * - Order transformers by priority
 * - Execute transformers sequentially over one match context
 * - Stop at the first failure
 * - Aggregate results and metrics
 */

import { Injectable, Logger, Inject } from "@nestjs/common";
import type {
  Transformer,
  TransformContext,
  TransformResult,
  TransformOptions,
  OrchestrationResult,
} from "./transformer.interface";

// Injection token for transformers array
export const TRANSFORMERS = Symbol("TRANSFORMERS");

@Injectable()
export class TransformerOrchestrator {
  private readonly logger = new Logger(TransformerOrchestrator.name);
  private readonly transformers: Transformer[];

  constructor(@Inject(TRANSFORMERS) transformers: Transformer[]) {
    this.transformers = [...transformers].sort((a, b) => a.priority - b.priority);

    this.logger.debug(
      `Registered ${this.transformers.length} transformers: ` +
        this.transformers.map((t) => `${t.name}(${t.priority})`).join(", "),
    );
  }

  /**
   * Execute all transformers over a match context
   *
   * @param ctx - Context with raw tables and an empty state
   * @param options - Skip/only filters
   */
  execute(ctx: TransformContext, options?: TransformOptions): OrchestrationResult {
    const startTime = Date.now();
    const results: TransformResult[] = [];
    const skipped: string[] = [];

    const transformersToRun = this.filterTransformers(options);

    this.logger.log(
      `Starting transformation for demo ${ctx.demoId} with ${transformersToRun.length} transformers`,
    );

    for (const transformer of transformersToRun) {
      if (transformer.shouldRun && !transformer.shouldRun(ctx)) {
        skipped.push(transformer.name);
        this.logger.debug(`Skipped ${transformer.name} (shouldRun=false)`);
        continue;
      }

      this.logger.debug(`Running ${transformer.name}...`);
      const result = transformer.transform(ctx);
      results.push(result);

      if (!result.success) {
        this.logger.error(`Transformer ${transformer.name} failed: ${result.error}`);
        break;
      }

      for (const warning of result.warnings ?? []) {
        this.logger.warn(`${transformer.name}: ${warning}`);
      }

      this.logger.debug(
        `${transformer.name} completed: ${result.recordsCreated} records in ${result.processingTimeMs}ms`,
      );
    }

    const summary = this.buildSummary(results);
    const totalTimeMs = Date.now() - startTime;

    this.logger.log(
      `Transformation completed for demo ${ctx.demoId}: ` +
        `${summary.succeeded}/${summary.total} succeeded, ` +
        `${summary.recordsCreated} records, ${totalTimeMs}ms`,
    );

    return {
      success: summary.failed === 0,
      totalTimeMs,
      results,
      skipped,
      summary,
    };
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  /**
   * Filter transformers based on options
   */
  private filterTransformers(options?: TransformOptions): Transformer[] {
    let filtered = this.transformers;
    const only = options?.only ?? [];
    const skip = options?.skip ?? [];

    if (only.length > 0) {
      filtered = filtered.filter((t) => only.includes(t.name));
    }

    if (skip.length > 0) {
      filtered = filtered.filter((t) => !skip.includes(t.name));
    }

    return filtered;
  }

  /**
   * Build summary from results
   */
  private buildSummary(results: TransformResult[]): OrchestrationResult["summary"] {
    return {
      total: results.length,
      succeeded: results.filter((r) => r.success).length,
      failed: results.filter((r) => !r.success).length,
      recordsCreated: results.reduce((sum, r) => sum + r.recordsCreated, 0),
    };
  }
}
