import type { OrderRecord } from "./order.js";

/**
 * Check whether two orders are for the same orderable (concept).
 *
 * Returns false when there is no other order. Two orders without a concept
 * count as the same orderable.
 */
export function hasSameOrderableAs(order: OrderRecord, other: OrderRecord | null): boolean {
  if (other === null) {
    return false;
  }
  return order.conceptId === other.conceptId;
}

/**
 * One-line description for logs, e.g.
 * `DC Order. orderId: 7 patient: p-1 concept: c-1 care setting: cs-1`.
 */
export function describeOrder(order: OrderRecord): string {
  const prefix = order.action === "DISCONTINUE" ? "DC " : "";
  return (
    `${prefix}Order. orderId: ${order.orderId ?? "null"} patient: ${order.patientId}` +
    ` concept: ${order.conceptId ?? "null"} care setting: ${order.careSettingId ?? "null"}`
  );
}
