/**
 * ## Temporal Predicates - Order Status at an Instant
 *
 * Pure status checks over one order record and one explicit check instant.
 * Nothing here samples the clock; callers pass the same `at` to every
 * predicate of one evaluation.
 *
 * ### Boundary Rules
 *
 * | Predicate | Comparison | Exactly at the boundary |
 * |-----------|------------|-------------------------|
 * | `isFuture` | `at < dateActivated` | not future |
 * | `isStarted` | `at >= effective start` | started |
 * | `isDiscontinued` | `at > dateStopped` | not yet discontinued |
 * | `isExpired` | `at > autoExpireDate` | not yet expired |
 *
 * An order therefore becomes active at the instant it activates and is still
 * active at the instant it stops or expires.
 *
 * ### Integrity
 *
 * `isDiscontinued` and `isExpired` inspect both `dateStopped` and
 * `autoExpireDate`, and return an `OrderIntegrityError` when the stop falls
 * after the expiry. The check runs before the voided check.
 *
 * @example
 * ```typescript
 * const at = Date.parse("2024-06-01T00:00:00Z");
 * const active = isActive(order, at);
 * if (!active.ok) {
 *   logger.error("Corrupt order interval", active.error.context);
 * }
 * ```
 */

import {
  assertNever,
  stopNotAfterAutoExpire,
  type Instant,
  type OrderAction,
  type OrderRecord,
} from "@clinical-orders/order-model";
import { effectiveStartDate } from "./effectiveDates.js";
import { integrityFailure, ok, type TemporalResult } from "./result.js";

/**
 * Whether an action only ever stops another order. Such records are never
 * active themselves.
 */
export function isDiscontinuationAction(action: OrderAction): boolean {
  switch (action) {
    case "DISCONTINUE":
      return true;
    case "NEW":
    case "REVISE":
    case "RENEW":
      return false;
    default:
      return assertNever(action);
  }
}

/**
 * Check the stop/auto-expire interval on its own.
 */
export function checkIntervalIntegrity(order: OrderRecord): TemporalResult<void> {
  const result = stopNotAfterAutoExpire.validate(order);
  if (!result.valid) {
    return integrityFailure(result.error);
  }
  return ok(undefined);
}

/**
 * Whether activation itself has not happened yet.
 *
 * Looks at `dateActivated` directly, not at the effective start, so a
 * scheduled order that has been activated is not future.
 */
export function isFuture(order: OrderRecord, at: Instant): boolean {
  if (order.voided) {
    return false;
  }
  return order.dateActivated !== null && at < order.dateActivated;
}

/**
 * Whether the order had been explicitly stopped before `at`.
 */
export function isDiscontinued(order: OrderRecord, at: Instant): TemporalResult<boolean> {
  const integrity = checkIntervalIntegrity(order);
  if (!integrity.ok) {
    return integrity;
  }
  if (order.voided) {
    return ok(false);
  }
  if (order.dateActivated === null || isFuture(order, at) || order.dateStopped === null) {
    return ok(false);
  }
  return ok(at > order.dateStopped);
}

/**
 * Whether the order had run past its auto-expiry before `at`.
 *
 * A discontinued order is never reported as expired.
 */
export function isExpired(order: OrderRecord, at: Instant): TemporalResult<boolean> {
  const integrity = checkIntervalIntegrity(order);
  if (!integrity.ok) {
    return integrity;
  }
  if (order.voided) {
    return ok(false);
  }
  if (order.dateActivated === null || isFuture(order, at)) {
    return ok(false);
  }

  const discontinued = isDiscontinued(order, at);
  if (!discontinued.ok) {
    return discontinued;
  }
  if (discontinued.value || order.autoExpireDate === null) {
    return ok(false);
  }
  return ok(at > order.autoExpireDate);
}

/**
 * Whether `at` is on or after the effective start date.
 */
export function isStarted(order: OrderRecord, at: Instant): boolean {
  if (order.voided) {
    return false;
  }
  const start = effectiveStartDate(order);
  if (start === null) {
    return false;
  }
  return at >= start;
}

/**
 * Whether the order is in force at `at`: activated, not stopped, not expired.
 *
 * Voided records and discontinuation records are never active, whatever their
 * dates. The sub-checks short-circuit in order (future, discontinued, expired),
 * so a future order reports inactive without an interval check.
 */
export function isActive(order: OrderRecord, at: Instant): TemporalResult<boolean> {
  if (order.voided || isDiscontinuationAction(order.action)) {
    return ok(false);
  }
  if (isFuture(order, at)) {
    return ok(false);
  }

  const discontinued = isDiscontinued(order, at);
  if (!discontinued.ok) {
    return discontinued;
  }
  if (discontinued.value) {
    return ok(false);
  }

  const expired = isExpired(order, at);
  if (!expired.ok) {
    return expired;
  }
  return ok(!expired.value);
}
