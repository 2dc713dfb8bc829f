/**
 * Logging Module
 *
 * Scoped, level-filtered loggers for the order services.
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger } from "@clinical-orders/order-service";
 *
 * const logger = createScopedLogger("OrderCommands", config.logLevel);
 * const silent = createNoOpLogger();
 * ```
 */

export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

export type { TraceTiming } from "./scoped.js";
export { createScopedLogger, createNoOpLogger, TRACE_TIMING } from "./scoped.js";
