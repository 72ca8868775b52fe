/**
 * @cellar/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { parseAmount } from "@cellar/math";
import { MAX_SHARE_LOCK_PERIOD } from "@cellar/vault";

// =============================================================================
// Schema
// =============================================================================

/** Decimal string scaled to 18 places, e.g. "1.25" → 1.25e18. */
const WadSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,18})?$/, "expected a non-negative decimal with at most 18 places")
  .transform((raw) => parseAmount(raw, 18));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Registry
  REGISTRY_OWNER: z.string().min(1).default("registry-owner"),

  // Persistence: unset keeps state in memory only
  STATE_DIR: z.string().min(1).optional(),

  // Simulated protocol environment; unset uses the bundled file
  PROTOCOLS_FILE: z.string().min(1).optional(),

  // Cellar defaults
  DEFAULT_SHARE_LOCK_PERIOD: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_SHARE_LOCK_PERIOD)
    .default(1200),
  DEFAULT_REBALANCE_DEVIATION: WadSchema.default("0.003"),

  // Lending-market adaptors
  MIN_HEALTH_FACTOR: WadSchema.default("1.25"),
  MIN_SELF_LEVERAGE_HEALTH_FACTOR: WadSchema.default("1.05"),
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
