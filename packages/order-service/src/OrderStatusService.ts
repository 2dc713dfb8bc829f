/**
 * ## OrderStatusService - Clock-Aware Status Queries
 *
 * Convenience layer over the pure temporal evaluator for callers that want
 * plain booleans "as of now". Each call samples the clock at most once and
 * evaluates every predicate against that instant.
 *
 * Integrity violations are logged at ERROR and then thrown as
 * `OrderIntegrityError`.
 *
 * @example
 * ```typescript
 * const statuses = new OrderStatusService({ clock: systemClock, logger });
 *
 * if (statuses.isActive(order)) {
 *   // ...
 * }
 * const label = statuses.state(order, Date.parse("2024-06-01T00:00:00Z"));
 * ```
 */

import type { Instant, OrderIntegrityError, OrderRecord } from "@clinical-orders/order-model";
import {
  evaluateOrderStatus,
  isActive,
  isDiscontinued,
  isExpired,
  isFuture,
  isStarted,
  resolveOrderState,
  type OrderStatusSnapshot,
  type OrderTemporalState,
  type TemporalResult,
} from "@clinical-orders/order-temporal";
import { systemClock, type Clock } from "./clock.js";
import { createNoOpLogger } from "./logging/scoped.js";
import type { Logger } from "./logging/types.js";

export interface OrderStatusServiceDependencies {
  /** Defaults to the system clock */
  clock?: Clock;
  /** Defaults to a no-op logger */
  logger?: Logger;
}

export class OrderStatusService {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: OrderStatusServiceDependencies = {}) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createNoOpLogger();
  }

  isFuture(order: OrderRecord, at?: Instant): boolean {
    return isFuture(order, this.resolveInstant(at));
  }

  isStarted(order: OrderRecord, at?: Instant): boolean {
    return isStarted(order, this.resolveInstant(at));
  }

  isDiscontinued(order: OrderRecord, at?: Instant): boolean {
    return this.unwrap(order, isDiscontinued(order, this.resolveInstant(at)));
  }

  isExpired(order: OrderRecord, at?: Instant): boolean {
    return this.unwrap(order, isExpired(order, this.resolveInstant(at)));
  }

  isActive(order: OrderRecord, at?: Instant): boolean {
    return this.unwrap(order, isActive(order, this.resolveInstant(at)));
  }

  /**
   * Every predicate evaluated against one instant.
   */
  status(order: OrderRecord, at?: Instant): OrderStatusSnapshot {
    const instant = this.resolveInstant(at);
    const snapshot = this.unwrap(order, evaluateOrderStatus(order, instant));
    this.logger.debug("Order status evaluated", {
      orderId: order.orderId,
      at: instant,
      active: snapshot.active,
    });
    return snapshot;
  }

  state(order: OrderRecord, at?: Instant): OrderTemporalState {
    return this.unwrap(order, resolveOrderState(order, this.resolveInstant(at)));
  }

  private resolveInstant(at: Instant | undefined): Instant {
    return at ?? this.clock.now();
  }

  private unwrap<T>(order: OrderRecord, result: TemporalResult<T>): T {
    if (result.ok) {
      return result.value;
    }
    this.reportIntegrityViolation(order, result.error);
    throw result.error;
  }

  private reportIntegrityViolation(order: OrderRecord, error: OrderIntegrityError): void {
    this.logger.error("Order integrity violation", {
      orderId: order.orderId,
      code: error.code,
      message: error.message,
    });
  }
}
