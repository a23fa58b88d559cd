/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs. The engine only logs at debug
 * level, and only counts, never per-person amounts.
 */

import { pino } from "pino";
import type { LevelWithSilent, Logger } from "pino";

export type LogLevel = LevelWithSilent;

const loggers = new Map<LogLevel, Logger>();

/**
 * Create a fresh logger named "debtgraph" at the given level.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: "debtgraph", level });
}

/**
 * Shared logger for a level, created on first use.
 */
export function getLogger(level: LogLevel): Logger {
  let logger = loggers.get(level);
  if (logger === undefined) {
    logger = createLogger(level);
    loggers.set(level, logger);
  }
  return logger;
}
