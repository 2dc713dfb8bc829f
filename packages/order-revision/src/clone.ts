/**
 * ## Revision Clones - Successor Records
 *
 * Structural transformations that produce a new, unpersisted order record
 * from an existing one. None of them validate dates or business rules and
 * none of them can fail; authorising the change (is the order active, is it
 * voided) belongs to the caller.
 *
 * | Function | Action of result | `previousOrderId` |
 * |----------|------------------|-------------------|
 * | `cloneForDiscontinuing` | `DISCONTINUE` | the source |
 * | `cloneForRevision` (source not DC) | `REVISE` | the source |
 * | `cloneForRevision` (source DC) | `DISCONTINUE` | the source's target |
 * | `copyOrder` | unchanged | unchanged |
 *
 * @example
 * ```typescript
 * const dc = cloneForDiscontinuing(order);
 * const saved = await store.insert({ ...dc, dateActivated: now });
 * await store.update({ ...order, dateStopped: now });
 * ```
 */

import {
  createOrder,
  type OrderRecord,
  type PersistedOrder,
} from "@clinical-orders/order-model";

/**
 * Create the discontinuation record for a persisted order.
 *
 * Carries over patient, concept, order type and care setting. All dates are
 * left unset for the caller to assign.
 */
export function cloneForDiscontinuing(order: PersistedOrder): OrderRecord {
  return createOrder({
    patientId: order.patientId,
    conceptId: order.conceptId,
    orderTypeId: order.orderTypeId,
    careSettingId: order.careSettingId,
    action: "DISCONTINUE",
    previousOrderId: order.orderId,
  });
}

/**
 * Create a revision of an order.
 *
 * Revising a discontinuation record yields another discontinuation of the
 * same target (re-editing before it is finalised) and keeps its activation
 * date. Revising anything else yields a `REVISE` record pointing at the
 * source, keeping its auto-expiry.
 */
export function cloneForRevision(order: OrderRecord): OrderRecord {
  const carried = {
    patientId: order.patientId,
    conceptId: order.conceptId,
    orderTypeId: order.orderTypeId,
    careSettingId: order.careSettingId,
    scheduledDate: order.scheduledDate,
    instructions: order.instructions,
    urgency: order.urgency,
    commentToFulfiller: order.commentToFulfiller,
    orderReason: order.orderReason,
    orderReasonNonCoded: order.orderReasonNonCoded,
  };

  if (order.action === "DISCONTINUE") {
    return createOrder({
      ...carried,
      action: "DISCONTINUE",
      previousOrderId: order.previousOrderId,
      dateActivated: order.dateActivated,
    });
  }

  return createOrder({
    ...carried,
    action: "REVISE",
    previousOrderId: order.orderId,
    autoExpireDate: order.autoExpireDate,
  });
}

/**
 * Shallow copy of every field except identity.
 *
 * Lifecycle state (`action`, `previousOrderId`) and `orderNumber` are copied
 * verbatim; the store assigns a fresh identity on insert.
 */
export function copyOrder(order: OrderRecord): OrderRecord {
  return {
    ...order,
    orderId: null,
    audit: { ...order.audit },
  };
}
