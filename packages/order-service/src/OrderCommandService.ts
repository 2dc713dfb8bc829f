/**
 * ## OrderCommandService - Load, Decide, Persist
 *
 * Applies order commands against an `OrderStore`:
 *
 * | Step | Action | Component |
 * |------|--------|-----------|
 * | 1 | Load target order | Store |
 * | 2 | Sample `now` once | Clock |
 * | 3 | Decide | Pure decider |
 * | 4 | Handle rejection | Logged at WARN, returned |
 * | 5 | Stop the superseded order | Store |
 * | 6 | Insert successor record | Store |
 *
 * Rejections come back as results; store failures propagate. A failed insert
 * writes the superseded order back unchanged before the error propagates.
 *
 * @example
 * ```typescript
 * const commands = new OrderCommandService({ store, clock: systemClock });
 *
 * const result = await commands.discontinue(orderId, { reasonNonCoded: "Completed course" });
 * if (result.status === "rejected") {
 *   console.warn(result.code);
 * }
 * ```
 */

import type {
  OrderId,
  OrderIntegrityError,
  OrderRecord,
  PersistedOrder,
  UnknownRecord,
} from "@clinical-orders/order-model";
import { walkRevisionChain, type OrderLookup } from "@clinical-orders/order-revision";
import { systemClock, type Clock } from "./clock.js";
import { DEFAULT_ORDER_SERVICE_CONFIG, type OrderServiceConfig } from "./config.js";
import type { DecisionRejected } from "./deciders/decision.js";
import { decideDiscontinueOrder } from "./deciders/discontinueOrder.js";
import { decideReviseOrder } from "./deciders/reviseOrder.js";
import {
  OrderRejectionCodes,
  type DiscontinueOrderInput,
  type OrderDiscontinuedEvent,
  type OrderRevisedEvent,
  type ReviseOrderInput,
  type StopOrderUpdate,
} from "./deciders/types.js";
import { createScopedLogger, TRACE_TIMING } from "./logging/scoped.js";
import type { Logger } from "./logging/types.js";
import type { OrderStore } from "./store/types.js";

export interface OrderCommandServiceDependencies {
  store: OrderStore;
  /** Defaults to the system clock */
  clock?: Clock;
  /** Defaults to a scoped logger at `config.logLevel` */
  logger?: Logger;
  config?: OrderServiceConfig;
}

export interface CommandSuccess<TData> {
  status: "success";
  data: TData;
}

export interface CommandRejected {
  status: "rejected";
  code: string;
  message: string;
  context?: UnknownRecord;
}

export type CommandResult<TData> = CommandSuccess<TData> | CommandRejected;

export interface DiscontinueOrderResult {
  /** Newly stored DISCONTINUE record */
  discontinuationOrder: PersistedOrder;
  /** Target order after its stop date was set */
  stoppedOrder: PersistedOrder;
  event: OrderDiscontinuedEvent;
}

export interface ReviseOrderResult {
  revisedOrder: PersistedOrder;
  /** Superseded order after its stop date was set; null when re-editing a discontinuation */
  stoppedOrder: PersistedOrder | null;
  event: OrderRevisedEvent;
}

export interface RevisionHistory {
  order: PersistedOrder;
  /** Predecessors, newest first */
  predecessors: OrderRecord[];
}

const SCOPE = "OrderCommands";

export class OrderCommandService {
  private readonly store: OrderStore;
  private readonly clock: Clock;
  private readonly config: OrderServiceConfig;
  private readonly logger: Logger;

  constructor(deps: OrderCommandServiceDependencies) {
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.config = deps.config ?? DEFAULT_ORDER_SERVICE_CONFIG;
    this.logger = deps.logger ?? createScopedLogger(SCOPE, this.config.logLevel);
  }

  /**
   * Discontinue an order: stop the target and store a DISCONTINUE record.
   */
  async discontinue(
    orderId: OrderId,
    command: DiscontinueOrderInput
  ): Promise<CommandResult<DiscontinueOrderResult>> {
    const order = await this.store.load(orderId);
    if (order === undefined) {
      return this.notFound("DiscontinueOrder", orderId);
    }

    const decision = decideDiscontinueOrder(order, command, { now: this.clock.now() });
    if (decision.status === "rejected") {
      return this.reject("DiscontinueOrder", orderId, decision);
    }

    const stoppedOrder = await this.stop(order, decision.stateUpdate);
    const discontinuationOrder = await this.insertSuccessor(
      decision.data.discontinuationOrder,
      order
    );

    this.logger.info("Order discontinued", {
      orderId,
      discontinuationOrderId: discontinuationOrder.orderId,
      dateStopped: stoppedOrder.dateStopped,
    });

    return {
      status: "success",
      data: { discontinuationOrder, stoppedOrder, event: decision.event },
    };
  }

  /**
   * Revise an order: stop the superseded order and store the revision.
   */
  async revise(
    orderId: OrderId,
    command: ReviseOrderInput
  ): Promise<CommandResult<ReviseOrderResult>> {
    const order = await this.store.load(orderId);
    if (order === undefined) {
      return this.notFound("ReviseOrder", orderId);
    }

    const decision = decideReviseOrder(order, command, { now: this.clock.now() });
    if (decision.status === "rejected") {
      return this.reject("ReviseOrder", orderId, decision);
    }

    if (decision.stateUpdate === null) {
      const revisedOrder = await this.store.insert(decision.data.revisedOrder);
      this.logRevised(orderId, revisedOrder);
      return {
        status: "success",
        data: { revisedOrder, stoppedOrder: null, event: decision.event },
      };
    }

    const stoppedOrder = await this.stop(order, decision.stateUpdate);
    const revisedOrder = await this.insertSuccessor(decision.data.revisedOrder, order);

    this.logRevised(orderId, revisedOrder);

    return {
      status: "success",
      data: { revisedOrder, stoppedOrder, event: decision.event },
    };
  }

  /**
   * Load an order and its predecessors.
   *
   * @throws OrderIntegrityError when the stored chain is broken, cyclic or
   * deeper than `config.maxChainDepth`
   */
  async revisionHistory(orderId: OrderId): Promise<CommandResult<RevisionHistory>> {
    const order = await this.store.load(orderId);
    if (order === undefined) {
      return this.notFound("RevisionHistory", orderId);
    }

    this.logger.trace("Load revision chain", { orderId, timing: TRACE_TIMING.START });
    const lookup = await this.prefetchChain(order);
    this.logger.trace("Load revision chain", { orderId, timing: TRACE_TIMING.END });

    const chain = walkRevisionChain(order, lookup, { maxDepth: this.config.maxChainDepth });
    if (!chain.ok) {
      this.reportIntegrityViolation(orderId, chain.error);
      throw chain.error;
    }

    this.logger.report("Revision history loaded", { orderId, depth: chain.value.length });
    return { status: "success", data: { order, predecessors: chain.value } };
  }

  /**
   * Load every record reachable through `previousOrderId` into memory.
   *
   * Stops at a missing record, a repeated id or one link past the depth
   * limit; the chain walk then reports which of those it was.
   */
  private async prefetchChain(order: PersistedOrder): Promise<OrderLookup> {
    const loaded = new Map<OrderId, PersistedOrder>([[order.orderId, order]]);
    let nextId = order.previousOrderId;

    while (nextId !== null && !loaded.has(nextId) && loaded.size <= this.config.maxChainDepth) {
      const previous = await this.store.load(nextId);
      if (previous === undefined) {
        break;
      }
      loaded.set(nextId, previous);
      nextId = previous.previousOrderId;
    }

    this.logger.debug("Revision chain loaded", { orderId: order.orderId, records: loaded.size });
    return { findById: (id) => loaded.get(id) };
  }

  private async stop(order: PersistedOrder, update: StopOrderUpdate): Promise<PersistedOrder> {
    const stoppedOrder: PersistedOrder = { ...order, ...update };
    await this.store.update(stoppedOrder);
    return stoppedOrder;
  }

  /**
   * Insert the successor of an order that was just stopped. A failed insert
   * writes the order back as it was before the stop, then rethrows.
   */
  private async insertSuccessor(
    successor: OrderRecord,
    superseded: PersistedOrder
  ): Promise<PersistedOrder> {
    try {
      return await this.store.insert(successor);
    } catch (error) {
      await this.store.update(superseded);
      this.logger.error("Successor insert failed, stop reverted", {
        orderId: superseded.orderId,
        action: successor.action,
      });
      throw error;
    }
  }

  private logRevised(orderId: OrderId, revisedOrder: PersistedOrder): void {
    this.logger.info("Order revised", {
      orderId,
      revisedOrderId: revisedOrder.orderId,
      action: revisedOrder.action,
    });
  }

  private notFound(commandType: string, orderId: OrderId): CommandRejected {
    return this.reject(commandType, orderId, {
      status: "rejected",
      code: OrderRejectionCodes.ORDER_NOT_FOUND,
      message: `Order ${orderId} not found`,
    });
  }

  private reject(
    commandType: string,
    orderId: OrderId,
    decision: DecisionRejected
  ): CommandRejected {
    this.logger.warn("Command rejected", { commandType, orderId, code: decision.code });
    const result: CommandRejected = {
      status: "rejected",
      code: decision.code,
      message: decision.message,
    };
    if (decision.context !== undefined) {
      result.context = decision.context;
    }
    return result;
  }

  private reportIntegrityViolation(orderId: OrderId, error: OrderIntegrityError): void {
    this.logger.error("Order integrity violation", {
      orderId,
      code: error.code,
      message: error.message,
    });
  }
}
