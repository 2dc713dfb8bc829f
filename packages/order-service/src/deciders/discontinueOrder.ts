/**
 * DiscontinueOrder decider - pure decision logic.
 *
 * Authorises stopping an order and produces the discontinuation record that
 * documents it.
 */

import {
  describeOrder,
  isPersisted,
  orderActionFSM,
  type OrderRecord,
} from "@clinical-orders/order-model";
import { cloneForDiscontinuing } from "@clinical-orders/order-revision";
import { isActive } from "@clinical-orders/order-temporal";
import { rejected, success, type DeciderContext } from "./decision.js";
import {
  OrderRejectionCodes,
  type DiscontinueOrderInput,
  type DiscontinueOrderOutput,
  type OrderDiscontinuedEvent,
} from "./types.js";

/**
 * The superseded order stops one millisecond before its successor takes
 * effect, so the two are never active at the same instant.
 */
export function momentBefore(instant: number): number {
  return instant - 1;
}

/**
 * Decide whether an order can be discontinued.
 *
 * Invariants:
 * - Order must be persisted (the discontinuation references it by id)
 * - Order must not be voided
 * - Order must not itself be a discontinuation
 * - Order interval must be intact
 * - Order must be active at the discontinuation instant
 * - The discontinuation must fall after activation, so the stop instant is
 *   never before `dateActivated`
 *
 * @param order - Order to stop
 * @param command - Discontinuation instant, reason, orderer
 * @param context - Decider context (now)
 */
export function decideDiscontinueOrder(
  order: OrderRecord,
  command: DiscontinueOrderInput,
  context: DeciderContext
): DiscontinueOrderOutput {
  if (!isPersisted(order)) {
    return rejected(OrderRejectionCodes.ORDER_NOT_PERSISTED, "Cannot discontinue an unsaved order");
  }

  if (order.voided) {
    return rejected(OrderRejectionCodes.ORDER_VOIDED, "Cannot discontinue a voided order", {
      orderId: order.orderId,
    });
  }

  if (!orderActionFSM.canTransition(order.action, "DISCONTINUE")) {
    return rejected(
      OrderRejectionCodes.CANNOT_DISCONTINUE_DISCONTINUATION_ORDER,
      `Cannot discontinue a ${order.action} order: ${describeOrder(order)}`,
      { orderId: order.orderId }
    );
  }

  const discontinueDate = command.discontinueDate ?? context.now;
  const active = isActive(order, discontinueDate);
  if (!active.ok) {
    return rejected(OrderRejectionCodes.ORDER_INTEGRITY_VIOLATION, active.error.message, {
      orderId: order.orderId,
      integrityCode: active.error.code,
    });
  }
  if (!active.value) {
    return rejected(
      OrderRejectionCodes.ORDER_NOT_ACTIVE,
      "Only an active order can be discontinued",
      { orderId: order.orderId, discontinueDate }
    );
  }
  if (discontinueDate === order.dateActivated) {
    return rejected(
      OrderRejectionCodes.SUPERSEDED_AT_ACTIVATION,
      "Cannot discontinue an order at the instant it was activated",
      { orderId: order.orderId, discontinueDate }
    );
  }

  const reason = command.reasonNonCoded ?? null;
  const event: OrderDiscontinuedEvent = {
    eventType: "OrderDiscontinued",
    payload: {
      orderId: order.orderId,
      discontinuedAt: discontinueDate,
      reason,
    },
  };

  return success({
    data: {
      discontinuationOrder: {
        ...cloneForDiscontinuing(order),
        dateActivated: discontinueDate,
        orderReasonNonCoded: reason,
        ordererId: command.ordererId ?? null,
      },
    },
    event,
    stateUpdate: { dateStopped: momentBefore(discontinueDate) },
  });
}
