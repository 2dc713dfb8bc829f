/**
 * Logging Types
 *
 * Six-level logging hierarchy used by the order services.
 *
 * Log levels (most to least verbose):
 * - DEBUG: Loaded records, decision inputs
 * - TRACE: Timing of store round trips
 * - INFO: Commands applied
 * - REPORT: Structured summaries (JSON)
 * - WARN: Rejected commands
 * - ERROR: Integrity violations
 */

import type { UnknownRecord } from "@clinical-orders/order-model";

export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Priority mapping for log levels. Lower numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger with one method per level; each takes a message and optional
 * structured data.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("OrderCommands", "DEBUG");
 *
 * logger.info("Order discontinued", { orderId, discontinuedAt });
 * logger.warn("Command rejected", { code: "ORDER_NOT_ACTIVE" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  trace(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  report(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * shouldLog("INFO", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}
