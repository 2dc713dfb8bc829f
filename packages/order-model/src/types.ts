/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout the order packages.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for error context, log data and other loosely structured records.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * A point in time as epoch milliseconds.
 *
 * Every date field on an order record is an `Instant`, so interval checks are
 * plain numeric comparisons and "one millisecond later" is `t + 1`.
 */
export type Instant = number;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * Use in the `default` case so that adding a new urgency or action value
 * becomes a compile error at every unhandled call site.
 *
 * @param x - The value that should be of type `never` if all cases are handled
 * @param message - Optional custom error message
 * @throws Error if reached at runtime (indicates a missing case)
 *
 * @example
 * ```typescript
 * switch (order.urgency) {
 *   case "ROUTINE":
 *   case "STAT":
 *     return order.dateActivated;
 *   case "ON_SCHEDULED_DATE":
 *     return order.scheduledDate;
 *   default:
 *     return assertNever(order.urgency);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
