/**
 * @ledgerline/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { DEFAULT_DECIMALS } from "@ledgerline/ledger";

// =============================================================================
// Schema
// =============================================================================

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("error"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Fixed-point scale for every amount in a run
  AMOUNT_DECIMALS: z.coerce.number().int().min(0).max(18).default(DEFAULT_DECIMALS),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
