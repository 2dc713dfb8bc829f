/**
 * In-process `OrderStore` for tests and examples.
 *
 * Identities are UUIDv7; order numbers are sequential (`ORD-1`, `ORD-2`, ...).
 */

import { v7 as uuidv7 } from "uuid";
import {
  toOrderId,
  type OrderId,
  type OrderRecord,
  type PersistedOrder,
} from "@clinical-orders/order-model";
import type { OrderStore } from "../store/types.js";

export class InMemoryOrderStore implements OrderStore {
  private readonly orders = new Map<OrderId, PersistedOrder>();
  private nextOrderNumber = 1;

  async load(orderId: OrderId): Promise<PersistedOrder | undefined> {
    return this.orders.get(orderId);
  }

  async insert(order: OrderRecord): Promise<PersistedOrder> {
    const persisted: PersistedOrder = {
      ...order,
      orderId: toOrderId(uuidv7()),
      orderNumber: order.orderNumber ?? `ORD-${this.nextOrderNumber++}`,
    };
    this.orders.set(persisted.orderId, persisted);
    return persisted;
  }

  async update(order: PersistedOrder): Promise<void> {
    if (!this.orders.has(order.orderId)) {
      throw new Error(`Cannot update unknown order ${order.orderId}`);
    }
    this.orders.set(order.orderId, order);
  }

  /**
   * Store a record under the id it already carries. For seeding fixtures,
   * including deliberately corrupt chains.
   */
  seed(order: PersistedOrder): PersistedOrder {
    this.orders.set(order.orderId, order);
    return order;
  }

  all(): PersistedOrder[] {
    return [...this.orders.values()];
  }

  get size(): number {
    return this.orders.size;
  }
}
