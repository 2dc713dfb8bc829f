/**
 * Order type hierarchy.
 *
 * Order types form a tree through `parentId` (e.g. "Drug order" under
 * "Medication order"). An order is "of type T" when its own type is T or a
 * descendant of T.
 */

import type { OrderRecord } from "./order.js";

export interface OrderTypeRecord {
  readonly orderTypeId: string;
  readonly name: string;
  readonly parentId: string | null;
}

export interface OrderTypeLookup {
  findById(orderTypeId: string): OrderTypeRecord | undefined;
}

/**
 * Build a lookup over a fixed list of order types.
 */
export function createOrderTypeLookup(types: readonly OrderTypeRecord[]): OrderTypeLookup {
  const byId = new Map(types.map((type) => [type.orderTypeId, type]));
  return {
    findById: (orderTypeId) => byId.get(orderTypeId),
  };
}

/**
 * Check whether the order's type is `orderTypeId` or one of its subtypes.
 *
 * A parent cycle ends the walk instead of looping.
 */
export function isOrderOfType(
  order: OrderRecord,
  orderTypeId: string,
  lookup: OrderTypeLookup
): boolean {
  const visited = new Set<string>();
  let current = order.orderTypeId;

  while (current !== null && !visited.has(current)) {
    if (current === orderTypeId) {
      return true;
    }
    visited.add(current);
    current = lookup.findById(current)?.parentId ?? null;
  }
  return false;
}
