/**
 * ReviseOrder decider - pure decision logic.
 *
 * Produces the revision record for an order. Revising a discontinuation
 * record re-edits it before it is finalised; nothing is stopped in that case.
 */

import { isPersisted, type OrderRecord } from "@clinical-orders/order-model";
import { cloneForRevision } from "@clinical-orders/order-revision";
import {
  checkIntervalIntegrity,
  isActive,
  isDiscontinuationAction,
} from "@clinical-orders/order-temporal";
import { rejected, success, type DeciderContext } from "./decision.js";
import { momentBefore } from "./discontinueOrder.js";
import {
  OrderRejectionCodes,
  type OrderRevisedEvent,
  type OrderRevisionChanges,
  type ReviseOrderInput,
  type ReviseOrderOutput,
} from "./types.js";

const keep = <T>(next: T | undefined, current: T): T => (next === undefined ? current : next);

/**
 * Apply revision changes on top of a cloned record.
 */
export function applyRevisionChanges(
  order: OrderRecord,
  changes: OrderRevisionChanges
): OrderRecord {
  return {
    ...order,
    instructions: keep(changes.instructions, order.instructions),
    urgency: keep(changes.urgency, order.urgency),
    scheduledDate: keep(changes.scheduledDate, order.scheduledDate),
    autoExpireDate: keep(changes.autoExpireDate, order.autoExpireDate),
    commentToFulfiller: keep(changes.commentToFulfiller, order.commentToFulfiller),
    orderReason: keep(changes.orderReason, order.orderReason),
    orderReasonNonCoded: keep(changes.orderReasonNonCoded, order.orderReasonNonCoded),
    ordererId: keep(changes.ordererId, order.ordererId),
  };
}

/**
 * Decide whether an order can be revised.
 *
 * Invariants:
 * - Order must not be voided
 * - Order interval must be intact
 * - For anything but a discontinuation record: order must be persisted,
 *   active at the revision instant and activated before it
 *
 * @param order - Order to revise
 * @param command - Revision instant and changed fields
 * @param context - Decider context (now)
 */
export function decideReviseOrder(
  order: OrderRecord,
  command: ReviseOrderInput,
  context: DeciderContext
): ReviseOrderOutput {
  if (order.voided) {
    return rejected(OrderRejectionCodes.ORDER_VOIDED, "Cannot revise a voided order", {
      orderId: order.orderId,
    });
  }

  const integrity = checkIntervalIntegrity(order);
  if (!integrity.ok) {
    return rejected(OrderRejectionCodes.ORDER_INTEGRITY_VIOLATION, integrity.error.message, {
      orderId: order.orderId,
      integrityCode: integrity.error.code,
    });
  }

  const revisedAt = command.revisedAt ?? context.now;
  const revisedOrder = applyRevisionChanges(cloneForRevision(order), command.changes);

  // Re-editing a discontinuation replaces it; nothing is superseded.
  if (isDiscontinuationAction(order.action)) {
    const event: OrderRevisedEvent = {
      eventType: "OrderRevised",
      payload: { previousOrderId: order.previousOrderId, revisedAt, action: "DISCONTINUE" },
    };
    return success({ data: { revisedOrder }, event, stateUpdate: null });
  }

  if (!isPersisted(order)) {
    return rejected(OrderRejectionCodes.ORDER_NOT_PERSISTED, "Cannot revise an unsaved order");
  }

  const active = isActive(order, revisedAt);
  if (!active.ok) {
    return rejected(OrderRejectionCodes.ORDER_INTEGRITY_VIOLATION, active.error.message, {
      orderId: order.orderId,
      integrityCode: active.error.code,
    });
  }
  if (!active.value) {
    return rejected(OrderRejectionCodes.ORDER_NOT_ACTIVE, "Only an active order can be revised", {
      orderId: order.orderId,
      revisedAt,
    });
  }
  if (revisedAt === order.dateActivated) {
    return rejected(
      OrderRejectionCodes.SUPERSEDED_AT_ACTIVATION,
      "Cannot revise an order at the instant it was activated",
      { orderId: order.orderId, revisedAt }
    );
  }

  const event: OrderRevisedEvent = {
    eventType: "OrderRevised",
    payload: { previousOrderId: order.orderId, revisedAt, action: "REVISE" },
  };

  return success({
    data: { revisedOrder: { ...revisedOrder, dateActivated: revisedAt } },
    event,
    stateUpdate: { dateStopped: momentBefore(revisedAt) },
  });
}
