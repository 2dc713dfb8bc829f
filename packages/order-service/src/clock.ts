/**
 * Source of "now" for the service layer.
 *
 * The core packages never read the clock. Services sample it once per
 * evaluation or command and pass the instant down explicitly.
 */

import type { Instant } from "@clinical-orders/order-model";

export interface Clock {
  now(): Instant;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock frozen at one instant.
 */
export function fixedClock(instant: Instant): Clock {
  return {
    now: () => instant,
  };
}
