/**
 * Environment schema - validated once when ConfigModule loads
 */

import { z } from "zod";
import {
  DEFAULT_TICK_RATE,
  DEFAULT_TRADE_WINDOW_SECONDS,
  DEFAULT_ROSTER_SIZE,
  DEFAULT_CLUTCH_MIN_OPPONENTS,
} from "../../modules/analysis/types/constants";

export const EnvironmentSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["log", "debug"]).default("log"),

    // Derivation defaults
    DEFAULT_TICK_RATE: z.coerce.number().positive().default(DEFAULT_TICK_RATE),
    TRADE_WINDOW_SECONDS: z.coerce.number().positive().default(DEFAULT_TRADE_WINDOW_SECONDS),
    ROSTER_SIZE: z.coerce.number().int().min(1).default(DEFAULT_ROSTER_SIZE),
    CLUTCH_MIN_OPPONENTS: z.coerce.number().int().min(1).default(DEFAULT_CLUTCH_MIN_OPPONENTS),

    // Upstream parser service
    PARSER_URL: z.string().url().default("http://localhost:8001"),
    PARSER_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),

    // Output
    OUTPUT_DIR: z.string().min(1).default("data"),
  })
  .passthrough();
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * ConfigModule `validate` hook
 */
export function validateEnvironment(config: Record<string, unknown>): Environment {
  const parsed = EnvironmentSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
