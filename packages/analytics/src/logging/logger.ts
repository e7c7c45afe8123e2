/**
 * Logging
 *
 * One JSON winston logger per engine; every component logs through a
 * child tagged with its name.
 */

import winston from "winston"
import type { AnalyticsConfig } from "../config"

export type Logger = winston.Logger

export type Component =
  | "metrics-cache"
  | "degree"
  | "activity"
  | "anomaly"
  | "cluster"
  | "flow"
  | "facade"

export function createLogger(config: Pick<AnalyticsConfig, "logLevel">): Logger {
  return winston.createLogger({
    level: config.logLevel,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service: "txgraph" },
    transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
  })
}

export function componentLogger(parent: Logger, component: Component): Logger {
  return parent.child({ component })
}

/**
 * Logger that drops everything. Used when no logger is supplied.
 */
export function silentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  })
}

/**
 * Run `fn` and report how long it took, in milliseconds.
 */
export function timed<T>(fn: () => T): { value: T; durationMs: number } {
  const started = performance.now()
  const value = fn()
  return { value, durationMs: Math.round((performance.now() - started) * 100) / 100 }
}
