/**
 * @debtgraph/settlement — Configuration.
 *
 * Loads and validates defaults from environment variables using Zod.
 * Per-call options override the loaded values. Only `settle` and
 * `resolveOptionsFromEnv` consult the environment.
 */

import { z } from "zod";
import { getLogger } from "./logger.js";
import type {
  ResolvedSettlementOptions,
  SettlementOptions,
} from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const ORDERINGS = ["insertion", "lexicographic"] as const;

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Fixed-point precision for amounts
  SETTLEMENT_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),

  // Giver / receiver line-up for greedy matching
  SETTLEMENT_ORDERING: z.enum(ORDERINGS).default("insertion"),
});

export type SettlementConfig = z.infer<typeof ConfigSchema>;

export const SettlementOptionsSchema = z.object({
  decimals: z.number().int().min(0).max(18).optional(),
  ordering: z.enum(ORDERINGS).optional(),
});

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): SettlementConfig {
  return ConfigSchema.parse(env);
}

/** Built-in defaults: what `loadConfig` yields for an empty environment. */
export const DEFAULT_CONFIG: SettlementConfig = ConfigSchema.parse({});

/**
 * Merge per-call options over a configuration.
 *
 * Pure: without an explicit `config` the built-in defaults apply and the
 * environment is never read.
 *
 * @throws {z.ZodError} if `decimals` or `ordering` is out of range
 */
export function resolveOptions(
  options: SettlementOptions = {},
  config: SettlementConfig = DEFAULT_CONFIG,
): ResolvedSettlementOptions {
  const parsed = SettlementOptionsSchema.parse({
    decimals: options.decimals,
    ordering: options.ordering,
  });

  return {
    decimals: parsed.decimals ?? config.SETTLEMENT_DECIMALS,
    ordering: parsed.ordering ?? config.SETTLEMENT_ORDERING,
    logger: options.logger ?? getLogger(config.LOG_LEVEL),
  };
}

/**
 * Merge per-call options over the environment.
 *
 * Only the variables behind options the caller left out are read and
 * validated.
 *
 * @throws {z.ZodError} if a variable that is read is invalid
 */
export function resolveOptionsFromEnv(
  options: SettlementOptions = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedSettlementOptions {
  const { shape } = ConfigSchema;

  return resolveOptions(options, {
    SETTLEMENT_DECIMALS:
      options.decimals === undefined
        ? shape.SETTLEMENT_DECIMALS.parse(env["SETTLEMENT_DECIMALS"])
        : DEFAULT_CONFIG.SETTLEMENT_DECIMALS,
    SETTLEMENT_ORDERING:
      options.ordering === undefined
        ? shape.SETTLEMENT_ORDERING.parse(env["SETTLEMENT_ORDERING"])
        : DEFAULT_CONFIG.SETTLEMENT_ORDERING,
    LOG_LEVEL:
      options.logger === undefined
        ? shape.LOG_LEVEL.parse(env["LOG_LEVEL"])
        : DEFAULT_CONFIG.LOG_LEVEL,
  });
}
