/**
 * Temporal evaluator for clinical orders.
 *
 * Pure functions over an order record and an explicit check instant.
 *
 * @example
 * ```typescript
 * import { isActive, unwrapTemporal } from "@clinical-orders/order-temporal";
 *
 * const at = Date.parse("2024-06-01T00:00:00Z");
 * const active = unwrapTemporal(isActive(order, at)); // throws OrderIntegrityError on corrupt data
 * ```
 *
 * @module @clinical-orders/order-temporal
 */

export type { TemporalResult } from "./result.js";
export { ok, integrityFailure, unwrapTemporal } from "./result.js";

export { effectiveStartDate, effectiveStopDate } from "./effectiveDates.js";

export {
  isDiscontinuationAction,
  checkIntervalIntegrity,
  isFuture,
  isDiscontinued,
  isExpired,
  isStarted,
  isActive,
} from "./predicates.js";

export type { OrderStatusSnapshot, OrderTemporalState } from "./status.js";
export { ORDER_TEMPORAL_STATES, evaluateOrderStatus, resolveOrderState } from "./status.js";
