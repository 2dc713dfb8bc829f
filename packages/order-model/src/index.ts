/**
 * Order record model.
 *
 * The leaf package of the workspace: record shape and defaults, identity
 * branding, zod schemas for untrusted input, integrity invariants, the action
 * lifecycle FSM, order-type hierarchy and orderable matching.
 *
 * @example
 * ```typescript
 * import { createOrder, stopNotAfterAutoExpire } from "@clinical-orders/order-model";
 *
 * const order = createOrder({ patientId: "patient-1", dateActivated: Date.now() });
 * stopNotAfterAutoExpire.validate(order); // { valid: true }
 * ```
 *
 * @module @clinical-orders/order-model
 */

// Types
export type { UnknownRecord, Instant } from "./types.js";
export { assertNever } from "./types.js";
export type { OrderId } from "./ids.js";
export { toOrderId } from "./ids.js";

// Record
export type {
  Urgency,
  OrderAction,
  OrderAudit,
  OrderRecord,
  PersistedOrder,
  OrderInit,
} from "./order.js";
export { URGENCIES, ORDER_ACTIONS, EMPTY_AUDIT, createOrder, isPersisted } from "./order.js";

// Schemas
export type { OrderRecordInput } from "./schemas.js";
export {
  InstantSchema,
  UrgencySchema,
  OrderActionSchema,
  OrderIdSchema,
  OrderAuditSchema,
  OrderRecordSchema,
  parseOrderRecord,
  safeParseOrderRecord,
} from "./schemas.js";

// Invariants
export type { InvariantErrorConstructor } from "./invariants/InvariantError.js";
export { InvariantError } from "./invariants/InvariantError.js";
export type { Invariant, InvariantConfig, InvariantResult } from "./invariants/createInvariant.js";
export { createInvariant } from "./invariants/createInvariant.js";
export type { OrderIntegrityCode } from "./invariants/orderIntegrity.js";
export {
  OrderIntegrityCodes,
  OrderIntegrityError,
  stopNotAfterAutoExpire,
} from "./invariants/orderIntegrity.js";

// Lifecycle
export type { FSM, FSMDefinition } from "./lifecycle/types.js";
export { defineFSM } from "./lifecycle/defineFSM.js";
export { orderActionFSM } from "./lifecycle/orderActionFSM.js";

// Order types and orderables
export type { OrderTypeRecord, OrderTypeLookup } from "./orderType.js";
export { createOrderTypeLookup, isOrderOfType } from "./orderType.js";
export { hasSameOrderableAs, describeOrder } from "./orderable.js";
