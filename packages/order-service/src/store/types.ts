/**
 * Persistence port for order records.
 *
 * The command service depends only on this interface. Implementations own
 * identity and order-number assignment.
 */

import type { OrderId, OrderRecord, PersistedOrder } from "@clinical-orders/order-model";

export interface OrderStore {
  /** Record by id, voided records included; `undefined` when unknown */
  load(orderId: OrderId): Promise<PersistedOrder | undefined>;

  /**
   * Persist a new record. Assigns `orderId` and, when absent, `orderNumber`.
   */
  insert(order: OrderRecord): Promise<PersistedOrder>;

  /**
   * Replace a stored record.
   *
   * @throws Error when no record with that id exists
   */
  update(order: PersistedOrder): Promise<void>;
}
