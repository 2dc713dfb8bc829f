/**
 * Revision chain traversal.
 *
 * A chain is the sequence of records linked through `previousOrderId`.
 * Records are acyclic by construction, so a repeated id, a dangling link or
 * an implausibly long chain means the stored data is corrupt; each comes back
 * as an `OrderIntegrityError` rather than a partial chain.
 */

import {
  OrderIntegrityCodes,
  OrderIntegrityError,
  type OrderId,
  type OrderIntegrityCode,
  type OrderRecord,
  type PersistedOrder,
  type UnknownRecord,
} from "@clinical-orders/order-model";

export const DEFAULT_MAX_CHAIN_DEPTH = 500;

export interface OrderLookup {
  findById(orderId: OrderId): OrderRecord | undefined;
}

export interface ChainOptions {
  /** Maximum number of predecessor links followed (default 500) */
  maxDepth?: number;
}

export type ChainResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: OrderIntegrityError };

/**
 * Build a lookup over a fixed set of persisted orders.
 */
export function createOrderLookup(orders: readonly PersistedOrder[]): OrderLookup {
  const byId = new Map<OrderId, OrderRecord>(orders.map((order) => [order.orderId, order]));
  return {
    findById: (orderId) => byId.get(orderId),
  };
}

/**
 * Predecessors of `order`, newest first. The starting record is not included.
 */
export function walkRevisionChain(
  order: OrderRecord,
  lookup: OrderLookup,
  options: ChainOptions = {}
): ChainResult<OrderRecord[]> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_CHAIN_DEPTH;
  const ancestors: OrderRecord[] = [];
  const visited = new Set<OrderId>();
  if (order.orderId !== null) {
    visited.add(order.orderId);
  }

  let nextId = order.previousOrderId;
  while (nextId !== null) {
    if (visited.has(nextId)) {
      return chainFailure(
        OrderIntegrityCodes.REVISION_CHAIN_CYCLE,
        `Revision chain of order ${order.orderId ?? "(unsaved)"} revisits order ${nextId}`,
        { orderId: order.orderId, repeatedOrderId: nextId }
      );
    }
    if (ancestors.length >= maxDepth) {
      return chainFailure(
        OrderIntegrityCodes.REVISION_CHAIN_TOO_DEEP,
        `Revision chain of order ${order.orderId ?? "(unsaved)"} exceeds ${maxDepth} links`,
        { orderId: order.orderId, maxDepth }
      );
    }

    const previous = lookup.findById(nextId);
    if (previous === undefined) {
      return chainFailure(
        OrderIntegrityCodes.REVISION_CHAIN_BROKEN,
        `Revision chain of order ${order.orderId ?? "(unsaved)"} references missing order ${nextId}`,
        { orderId: order.orderId, missingOrderId: nextId }
      );
    }

    visited.add(nextId);
    ancestors.push(previous);
    nextId = previous.previousOrderId;
  }

  return { ok: true, value: ancestors };
}

/**
 * Oldest record of the chain; the order itself when it has no predecessor.
 */
export function findChainRoot(
  order: OrderRecord,
  lookup: OrderLookup,
  options: ChainOptions = {}
): ChainResult<OrderRecord> {
  const chain = walkRevisionChain(order, lookup, options);
  if (!chain.ok) {
    return chain;
  }
  return { ok: true, value: chain.value[chain.value.length - 1] ?? order };
}

function chainFailure(
  code: OrderIntegrityCode,
  message: string,
  context: UnknownRecord
): ChainResult<never> {
  return { ok: false, error: new OrderIntegrityError(code, message, context) };
}
