/**
 * Order deciders: pure functions from (order, command, context) to a
 * success or rejection.
 */

export type {
  DecisionEvent,
  DecisionSuccess,
  DecisionRejected,
  DecisionOutput,
  DeciderContext,
} from "./decision.js";
export { success, rejected, isSuccess, isRejected } from "./decision.js";

export type {
  OrderRejectionCode,
  DiscontinueOrderInput,
  OrderRevisionChanges,
  ReviseOrderInput,
  OrderDiscontinuedPayload,
  OrderRevisedPayload,
  OrderDiscontinuedEvent,
  OrderRevisedEvent,
  DiscontinueOrderData,
  ReviseOrderData,
  StopOrderUpdate,
  DiscontinueOrderOutput,
  ReviseOrderOutput,
} from "./types.js";
export { OrderRejectionCodes } from "./types.js";

export { decideDiscontinueOrder, momentBefore } from "./discontinueOrder.js";
export { decideReviseOrder, applyRevisionChanges } from "./reviseOrder.js";
