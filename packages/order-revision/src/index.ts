/**
 * Revision chain manager for clinical orders.
 *
 * @example
 * ```typescript
 * import { cloneForRevision, walkRevisionChain } from "@clinical-orders/order-revision";
 *
 * const revision = cloneForRevision(order);
 * const history = walkRevisionChain(order, lookup);
 * ```
 *
 * @module @clinical-orders/order-revision
 */

export { cloneForDiscontinuing, cloneForRevision, copyOrder } from "./clone.js";

export type { OrderLookup, ChainOptions, ChainResult } from "./chain.js";
export {
  DEFAULT_MAX_CHAIN_DEPTH,
  createOrderLookup,
  walkRevisionChain,
  findChainRoot,
} from "./chain.js";
