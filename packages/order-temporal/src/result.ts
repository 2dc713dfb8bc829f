/**
 * Result type for predicates that can detect corrupt order data.
 *
 * Integrity violations travel as values so that callers decide whether to
 * throw, log or reject; the evaluator itself never throws for them.
 */

import type { OrderIntegrityError } from "@clinical-orders/order-model";

export type TemporalResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: OrderIntegrityError };

export function ok<T>(value: T): TemporalResult<T> {
  return { ok: true, value };
}

export function integrityFailure(error: OrderIntegrityError): TemporalResult<never> {
  return { ok: false, error };
}

/**
 * Return the value, or throw the carried integrity error.
 *
 * @throws OrderIntegrityError
 */
export function unwrapTemporal<T>(result: TemporalResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
