/**
 * Branded Types for Order Identities
 *
 * An order's identity is assigned by the persistence layer and is the only
 * thing a revision chain stores about its predecessor. Branding keeps an
 * arbitrary string (a patient or concept reference, say) from being passed
 * where an order identity is expected.
 *
 * @example
 * ```typescript
 * const id = toOrderId("0190f1c2-7a55-7c1e-9d4e-2b8f3a1c5d60");
 * const dc = cloneForDiscontinuing({ ...order, orderId: id });
 * dc.previousOrderId === id; // true
 * ```
 *
 * @module
 */

/**
 * Unique symbol for OrderId branding.
 * @internal
 */
declare const OrderIdBrand: unique symbol;

/**
 * A branded string type for order identities.
 */
export type OrderId = string & { readonly [OrderIdBrand]: void };

/**
 * Convert a raw string to an OrderId.
 *
 * @param value - Identity assigned by the store
 * @returns The same string, branded
 */
export function toOrderId(value: string): OrderId {
  return value as OrderId;
}
