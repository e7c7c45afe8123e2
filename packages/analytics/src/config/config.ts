/**
 * Engine Configuration
 *
 * Read once from the environment and validated. Every field has a default,
 * so an empty environment yields `defaultConfig`.
 */

import { z } from "zod"
import { InvalidParameterError } from "../errors"

// =============================================================================
// SCHEMA
// =============================================================================

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const analyticsConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /** Smallest sample the anomaly detector evaluates */
  anomalyMinSample: z.coerce.number().int().min(2).default(10),
  /** Paths the flow finder explores before it stops searching */
  flowMaxPaths: z.coerce.number().int().positive().default(1000),
  /** Paths returned once the exploration cap is hit */
  flowMaxResults: z.coerce.number().int().positive().default(100),
})

export type AnalyticsConfig = z.infer<typeof analyticsConfigSchema>

export const defaultConfig: AnalyticsConfig = analyticsConfigSchema.parse({})

// =============================================================================
// LOADING
// =============================================================================

const ENV_KEYS = {
  logLevel: "TXGRAPH_LOG_LEVEL",
  anomalyMinSample: "TXGRAPH_ANOMALY_MIN_SAMPLE",
  flowMaxPaths: "TXGRAPH_FLOW_MAX_PATHS",
  flowMaxResults: "TXGRAPH_FLOW_MAX_RESULTS",
} as const satisfies Record<keyof AnalyticsConfig, string>

/**
 * Build the configuration from environment variables. Unset and empty
 * variables fall back to their defaults.
 *
 * @throws InvalidParameterError when a variable is set to an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AnalyticsConfig {
  const raw: Record<string, string> = {}
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]?.trim()
    if (value) raw[field] = field === "logLevel" ? value.toLowerCase() : value
  }

  const result = analyticsConfigSchema.safeParse(raw)
  if (!result.success) {
    throw InvalidParameterError.fromIssues(result.error.issues, raw)
  }
  return result.data
}

/**
 * Apply explicit overrides on top of a base configuration.
 */
export function resolveConfig(
  overrides: Partial<AnalyticsConfig> = {},
  base: AnalyticsConfig = defaultConfig,
): AnalyticsConfig {
  return analyticsConfigSchema.parse({ ...base, ...overrides })
}
