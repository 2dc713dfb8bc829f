/**
 * Whole-order status at one instant.
 *
 * `evaluateOrderStatus` runs every predicate against the same `at`, so the
 * flags of one snapshot never disagree with each other.
 * `resolveOrderState` collapses a snapshot into a single label.
 */

import type { Instant, OrderRecord } from "@clinical-orders/order-model";
import { effectiveStartDate, effectiveStopDate } from "./effectiveDates.js";
import {
  isActive,
  isDiscontinuationAction,
  isDiscontinued,
  isExpired,
  isFuture,
  isStarted,
} from "./predicates.js";
import { ok, type TemporalResult } from "./result.js";

export interface OrderStatusSnapshot {
  readonly at: Instant;
  readonly effectiveStartDate: Instant | null;
  readonly effectiveStopDate: Instant | null;
  readonly future: boolean;
  readonly started: boolean;
  readonly discontinued: boolean;
  readonly expired: boolean;
  readonly active: boolean;
}

/**
 * Single-label states, in resolution order.
 *
 * - `voided`: soft-deleted record
 * - `discontinued`: stopped before the check instant
 * - `expired`: ran past its auto-expiry
 * - `future`: not yet activated
 * - `discontinuation`: a record whose only purpose is to stop another order
 * - `unactivated`: no effective start date at all
 * - `scheduled`: activated, but the scheduled start is still ahead
 * - `active`: in force
 */
export const ORDER_TEMPORAL_STATES = [
  "voided",
  "discontinued",
  "expired",
  "future",
  "discontinuation",
  "unactivated",
  "scheduled",
  "active",
] as const;

export type OrderTemporalState = (typeof ORDER_TEMPORAL_STATES)[number];

export function evaluateOrderStatus(
  order: OrderRecord,
  at: Instant
): TemporalResult<OrderStatusSnapshot> {
  const discontinued = isDiscontinued(order, at);
  if (!discontinued.ok) {
    return discontinued;
  }
  const expired = isExpired(order, at);
  if (!expired.ok) {
    return expired;
  }
  const active = isActive(order, at);
  if (!active.ok) {
    return active;
  }

  return ok({
    at,
    effectiveStartDate: effectiveStartDate(order),
    effectiveStopDate: effectiveStopDate(order),
    future: isFuture(order, at),
    started: isStarted(order, at),
    discontinued: discontinued.value,
    expired: expired.value,
    active: active.value,
  });
}

export function resolveOrderState(
  order: OrderRecord,
  at: Instant
): TemporalResult<OrderTemporalState> {
  const result = evaluateOrderStatus(order, at);
  if (!result.ok) {
    return result;
  }
  return ok(stateFromSnapshot(order, result.value));
}

function stateFromSnapshot(order: OrderRecord, status: OrderStatusSnapshot): OrderTemporalState {
  if (order.voided) return "voided";
  if (status.discontinued) return "discontinued";
  if (status.expired) return "expired";
  if (status.future) return "future";
  if (isDiscontinuationAction(order.action)) return "discontinuation";
  if (status.effectiveStartDate === null) return "unactivated";
  if (!status.started) return "scheduled";
  return "active";
}
