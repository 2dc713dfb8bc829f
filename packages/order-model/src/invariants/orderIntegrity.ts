/**
 * Order data-integrity rules.
 *
 * Integrity errors signal upstream corruption (an impossible interval, a
 * broken or cyclic revision chain). They are reported, never approximated
 * into a plausible-looking status.
 */

import type { OrderRecord } from "../order.js";
import type { UnknownRecord } from "../types.js";
import { createInvariant } from "./createInvariant.js";
import { InvariantError } from "./InvariantError.js";

/**
 * Error codes for order integrity violations.
 */
export const OrderIntegrityCodes = {
  INVALID_STOP_AFTER_AUTO_EXPIRE: "INVALID_STOP_AFTER_AUTO_EXPIRE",
  REVISION_CHAIN_BROKEN: "REVISION_CHAIN_BROKEN",
  REVISION_CHAIN_CYCLE: "REVISION_CHAIN_CYCLE",
  REVISION_CHAIN_TOO_DEEP: "REVISION_CHAIN_TOO_DEEP",
} as const;

export type OrderIntegrityCode = (typeof OrderIntegrityCodes)[keyof typeof OrderIntegrityCodes];

/**
 * Raised (or returned inside a result) when order data is internally
 * inconsistent.
 */
export class OrderIntegrityError extends InvariantError<OrderIntegrityCode> {
  constructor(code: OrderIntegrityCode, message: string, context?: UnknownRecord) {
    super(code, message, context);
    this.name = "OrderIntegrityError";
  }
}

const iso = (instant: number): string => new Date(instant).toISOString();

/**
 * `dateStopped` must not be strictly after `autoExpireDate` when both are set.
 */
export const stopNotAfterAutoExpire = createInvariant<
  OrderRecord,
  OrderIntegrityCode,
  OrderIntegrityError
>(
  {
    name: "stopNotAfterAutoExpire",
    code: OrderIntegrityCodes.INVALID_STOP_AFTER_AUTO_EXPIRE,
    check: (order) =>
      order.dateStopped === null ||
      order.autoExpireDate === null ||
      order.dateStopped <= order.autoExpireDate,
    message: (order) =>
      `Order has dateStopped ${iso(order.dateStopped ?? 0)} after autoExpireDate ${iso(
        order.autoExpireDate ?? 0
      )}`,
    context: (order) => ({
      orderId: order.orderId,
      dateStopped: order.dateStopped,
      autoExpireDate: order.autoExpireDate,
    }),
  },
  OrderIntegrityError
);
