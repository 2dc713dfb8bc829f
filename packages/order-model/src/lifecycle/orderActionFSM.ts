/**
 * Order action lifecycle.
 *
 * Transitions read "a record in state X may be superseded by a record whose
 * action is Y". A discontinuation is terminal: it cannot itself be
 * discontinued, revised or renewed.
 *
 * Re-editing an unfinalised discontinuation replaces the record rather than
 * superseding it, so it is not a transition here. The clone operations in the
 * revision package are total and never consult this machine.
 *
 * @example
 * ```typescript
 * if (!orderActionFSM.canTransition(order.action, "DISCONTINUE")) {
 *   return rejected("CANNOT_DISCONTINUE_DISCONTINUATION_ORDER", "...");
 * }
 * ```
 */

import type { OrderAction } from "../order.js";
import { defineFSM } from "./defineFSM.js";

export const orderActionFSM = defineFSM<OrderAction>({
  initial: "NEW",
  transitions: {
    NEW: ["REVISE", "DISCONTINUE", "RENEW"],
    REVISE: ["REVISE", "DISCONTINUE", "RENEW"],
    DISCONTINUE: [],
    RENEW: ["REVISE", "DISCONTINUE", "RENEW"],
  },
});
