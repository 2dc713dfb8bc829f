/**
 * Types for order decider functions: command inputs, event payloads, data
 * returned on success and rejection codes.
 */

import type { Instant, OrderId, OrderRecord } from "@clinical-orders/order-model";
import type { DecisionEvent, DecisionOutput } from "./decision.js";

// =============================================================================
// Rejection Codes
// =============================================================================

export const OrderRejectionCodes = {
  ORDER_NOT_FOUND: "ORDER_NOT_FOUND",
  ORDER_NOT_PERSISTED: "ORDER_NOT_PERSISTED",
  ORDER_VOIDED: "ORDER_VOIDED",
  ORDER_NOT_ACTIVE: "ORDER_NOT_ACTIVE",
  ORDER_INTEGRITY_VIOLATION: "ORDER_INTEGRITY_VIOLATION",
  CANNOT_DISCONTINUE_DISCONTINUATION_ORDER: "CANNOT_DISCONTINUE_DISCONTINUATION_ORDER",
  SUPERSEDED_AT_ACTIVATION: "SUPERSEDED_AT_ACTIVATION",
} as const;

export type OrderRejectionCode = (typeof OrderRejectionCodes)[keyof typeof OrderRejectionCodes];

// =============================================================================
// Command Inputs
// =============================================================================

export interface DiscontinueOrderInput {
  /** Instant the discontinuation takes effect (default: context.now) */
  discontinueDate?: Instant;
  reasonNonCoded?: string;
  ordererId?: string;
}

/**
 * Fields a revision may change. Absent keys keep the source's value; an
 * explicit `null` clears it.
 */
export interface OrderRevisionChanges {
  instructions?: OrderRecord["instructions"];
  urgency?: OrderRecord["urgency"];
  scheduledDate?: OrderRecord["scheduledDate"];
  autoExpireDate?: OrderRecord["autoExpireDate"];
  commentToFulfiller?: OrderRecord["commentToFulfiller"];
  orderReason?: OrderRecord["orderReason"];
  orderReasonNonCoded?: OrderRecord["orderReasonNonCoded"];
  ordererId?: OrderRecord["ordererId"];
}

export interface ReviseOrderInput {
  /** Instant the revision takes effect (default: context.now) */
  revisedAt?: Instant;
  changes: OrderRevisionChanges;
}

// =============================================================================
// Events
// =============================================================================

export interface OrderDiscontinuedPayload {
  orderId: OrderId;
  discontinuedAt: Instant;
  reason: string | null;
}

export interface OrderRevisedPayload {
  /** Order the revision supersedes */
  previousOrderId: OrderId | null;
  revisedAt: Instant;
  action: OrderRecord["action"];
}

export type OrderDiscontinuedEvent = DecisionEvent<"OrderDiscontinued", OrderDiscontinuedPayload>;

export type OrderRevisedEvent = DecisionEvent<"OrderRevised", OrderRevisedPayload>;

// =============================================================================
// Success Data and State Updates
// =============================================================================

export interface DiscontinueOrderData {
  /** Unsaved DISCONTINUE record */
  discontinuationOrder: OrderRecord;
}

export interface ReviseOrderData {
  /** Unsaved REVISE (or re-edited DISCONTINUE) record */
  revisedOrder: OrderRecord;
}

/**
 * Update applied to the superseded order.
 */
export type StopOrderUpdate = Pick<OrderRecord, "dateStopped">;

export type DiscontinueOrderOutput = DecisionOutput<
  OrderDiscontinuedEvent,
  DiscontinueOrderData,
  StopOrderUpdate
>;

/** State update is null when re-editing a discontinuation: nothing to stop */
export type ReviseOrderOutput = DecisionOutput<
  OrderRevisedEvent,
  ReviseOrderData,
  StopOrderUpdate | null
>;
