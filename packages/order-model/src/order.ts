/**
 * ## Order Record - Clinical Order Snapshot
 *
 * One clinical order's identity, references, temporal fields and lifecycle
 * action. Records are immutable values: discontinuation, revision and copy
 * all produce new records, and stopping an order produces an updated copy.
 *
 * ### Temporal Fields
 *
 * | Field | Meaning |
 * |-------|---------|
 * | `dateActivated` | When the order takes legal effect |
 * | `scheduledDate` | Effective start when urgency is `ON_SCHEDULED_DATE` |
 * | `dateStopped` | Explicit stop set by a discontinuation |
 * | `autoExpireDate` | Natural expiry computed upstream |
 *
 * ### References
 *
 * Patient, concept, order type, care setting, encounter and orderer are opaque
 * string references owned by the caller. The predecessor in a revision chain
 * is referenced by identity only (`previousOrderId`), never embedded, so a
 * record can never own or reach a cycle through itself.
 *
 * @example
 * ```typescript
 * const order = createOrder({
 *   patientId: "patient-1",
 *   conceptId: "concept-aspirin",
 *   dateActivated: Date.parse("2024-01-01T00:00:00Z"),
 * });
 *
 * order.urgency; // "ROUTINE"
 * order.action;  // "NEW"
 * ```
 */

import type { OrderId } from "./ids.js";
import { orderActionFSM } from "./lifecycle/orderActionFSM.js";
import type { Instant } from "./types.js";

// ============================================================================
// Closed Enumerations
// ============================================================================

/**
 * Urgency values, in declaration order.
 */
export const URGENCIES = ["ROUTINE", "STAT", "ON_SCHEDULED_DATE"] as const;

/**
 * How the effective start of an order is determined.
 *
 * - `ROUTINE`, `STAT`: starts at `dateActivated`
 * - `ON_SCHEDULED_DATE`: starts at `scheduledDate`
 */
export type Urgency = (typeof URGENCIES)[number];

/**
 * Lifecycle action values, in declaration order.
 */
export const ORDER_ACTIONS = ["NEW", "REVISE", "DISCONTINUE", "RENEW"] as const;

/**
 * The lifecycle action a record represents.
 */
export type OrderAction = (typeof ORDER_ACTIONS)[number];

// ============================================================================
// Record Types
// ============================================================================

/**
 * Provenance fields maintained by the persistence layer.
 */
export interface OrderAudit {
  readonly creator: string | null;
  readonly dateCreated: Instant | null;
  readonly changedBy: string | null;
  readonly dateChanged: Instant | null;
  readonly voidedBy: string | null;
  readonly dateVoided: Instant | null;
  readonly voidReason: string | null;
}

/**
 * A clinical order as evaluated by the temporal and revision packages.
 */
export interface OrderRecord {
  /** Identity, null until persisted */
  readonly orderId: OrderId | null;
  /** Human-facing number assigned on persistence */
  readonly orderNumber: string | null;

  readonly patientId: string;
  readonly conceptId: string | null;
  readonly orderTypeId: string | null;
  readonly careSettingId: string | null;
  readonly encounterId: string | null;
  readonly ordererId: string | null;

  readonly instructions: string | null;
  readonly accessionNumber: string | null;

  readonly dateActivated: Instant | null;
  readonly scheduledDate: Instant | null;
  readonly dateStopped: Instant | null;
  readonly autoExpireDate: Instant | null;

  readonly urgency: Urgency;
  readonly action: OrderAction;
  /** Weak back-reference to the superseded order */
  readonly previousOrderId: OrderId | null;

  /** Coded reason (opaque concept reference) */
  readonly orderReason: string | null;
  readonly orderReasonNonCoded: string | null;
  readonly commentToFulfiller: string | null;

  /** Voided orders are inert for every status computation */
  readonly voided: boolean;
  readonly audit: OrderAudit;
}

/**
 * An order that has been assigned an identity by the store.
 */
export type PersistedOrder = OrderRecord & { readonly orderId: OrderId };

/**
 * Fields accepted by `createOrder`. Only the patient reference is required.
 */
export type OrderInit = Partial<Omit<OrderRecord, "patientId" | "audit">> & {
  patientId: string;
  audit?: Partial<OrderAudit>;
};

/**
 * Audit block with every field unset.
 */
export const EMPTY_AUDIT: OrderAudit = {
  creator: null,
  dateCreated: null,
  changedBy: null,
  dateChanged: null,
  voidedBy: null,
  dateVoided: null,
  voidReason: null,
};

// ============================================================================
// Factories and Guards
// ============================================================================

/**
 * Create an order record, filling every omitted field with its default.
 *
 * Defaults: references and dates `null`, urgency `ROUTINE`, the lifecycle's
 * initial action (`NEW`), not voided, empty audit block.
 */
export function createOrder(init: OrderInit): OrderRecord {
  return {
    orderId: init.orderId ?? null,
    orderNumber: init.orderNumber ?? null,
    patientId: init.patientId,
    conceptId: init.conceptId ?? null,
    orderTypeId: init.orderTypeId ?? null,
    careSettingId: init.careSettingId ?? null,
    encounterId: init.encounterId ?? null,
    ordererId: init.ordererId ?? null,
    instructions: init.instructions ?? null,
    accessionNumber: init.accessionNumber ?? null,
    dateActivated: init.dateActivated ?? null,
    scheduledDate: init.scheduledDate ?? null,
    dateStopped: init.dateStopped ?? null,
    autoExpireDate: init.autoExpireDate ?? null,
    urgency: init.urgency ?? "ROUTINE",
    action: init.action ?? orderActionFSM.initial,
    previousOrderId: init.previousOrderId ?? null,
    orderReason: init.orderReason ?? null,
    orderReasonNonCoded: init.orderReasonNonCoded ?? null,
    commentToFulfiller: init.commentToFulfiller ?? null,
    voided: init.voided ?? false,
    audit: { ...EMPTY_AUDIT, ...init.audit },
  };
}

/**
 * Type guard for orders that carry an identity.
 */
export function isPersisted(order: OrderRecord): order is PersistedOrder {
  return order.orderId !== null;
}
