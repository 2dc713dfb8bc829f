import { assertNever, type Instant, type OrderRecord } from "@clinical-orders/order-model";

/**
 * Start of the order's effective interval.
 *
 * Scheduled orders start at `scheduledDate`; routine and stat orders start at
 * `dateActivated`.
 */
export function effectiveStartDate(order: OrderRecord): Instant | null {
  switch (order.urgency) {
    case "ON_SCHEDULED_DATE":
      return order.scheduledDate;
    case "ROUTINE":
    case "STAT":
      return order.dateActivated;
    default:
      return assertNever(order.urgency);
  }
}

/**
 * End of the order's effective interval: an explicit stop wins over the
 * computed auto-expiry.
 */
export function effectiveStopDate(order: OrderRecord): Instant | null {
  return order.dateStopped ?? order.autoExpireDate;
}
