/**
 * ## Scoped Loggers
 *
 * Factory for component loggers with a `[scope]` prefix and level filtering.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("OrderCommands", "INFO");
 *
 * logger.debug("This is suppressed");
 * logger.info("Order revised");  // [OrderCommands] Order revised
 * ```
 */

import type { UnknownRecord } from "@clinical-orders/order-model";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Constants for trace timing operations.
 * Use with the `timing` field in trace log data.
 */
export const TRACE_TIMING = {
  START: "start",
  END: "end",
} as const;
export type TraceTiming = (typeof TRACE_TIMING)[keyof typeof TRACE_TIMING];

/**
 * Create a scoped logger with level filtering.
 *
 * Messages go to the matching `console` method, looked up at call time so
 * tests can spy on it. REPORT writes one JSON line.
 *
 * @param scope - Prefix for log messages (e.g., "OrderCommands")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const formatMessage = (message: string, data?: UnknownRecord): string => {
    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    debug(message: string, data?: UnknownRecord): void {
      if (shouldLog("DEBUG", level)) {
        console.debug(formatMessage(message, data));
      }
    },

    trace(message: string, data?: UnknownRecord): void {
      if (shouldLog("TRACE", level)) {
        const timing = data?.["timing"];
        if (timing === TRACE_TIMING.START) {
          console.time(`${prefix} ${message}`);
        } else if (timing === TRACE_TIMING.END) {
          console.timeEnd(`${prefix} ${message}`);
        } else {
          console.debug(formatMessage(message, data));
        }
      }
    },

    info(message: string, data?: UnknownRecord): void {
      if (shouldLog("INFO", level)) {
        console.info(formatMessage(message, data));
      }
    },

    report(message: string, data?: UnknownRecord): void {
      if (shouldLog("REPORT", level)) {
        console.log(
          JSON.stringify({
            scope,
            message,
            ...data,
            timestamp: Date.now(),
          })
        );
      }
    },

    warn(message: string, data?: UnknownRecord): void {
      if (shouldLog("WARN", level)) {
        console.warn(formatMessage(message, data));
      }
    },

    error(message: string, data?: UnknownRecord): void {
      if (shouldLog("ERROR", level)) {
        console.error(formatMessage(message, data));
      }
    },
  };
}

/**
 * Logger that discards everything. Default when no logger is configured.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}

