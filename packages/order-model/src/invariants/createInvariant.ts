/**
 * ## Invariant Framework - Declarative Record Rules
 *
 * Builds an invariant from one configuration object. `validate()` hands back
 * the error instance instead of throwing it, which is what the
 * result-returning temporal predicates need.
 *
 * @example
 * ```typescript
 * const hasPatient = createInvariant<OrderRecord, "NO_PATIENT">({
 *   name: "hasPatient",
 *   code: "NO_PATIENT",
 *   check: (order) => order.patientId.length > 0,
 *   message: () => "Order has no patient",
 * }, InvariantError);
 *
 * hasPatient.validate(order);  // { valid: false, error } on violation
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { InvariantError, InvariantErrorConstructor } from "./InvariantError.js";

/**
 * Configuration for creating an invariant.
 *
 * @typeParam TState - The value being validated
 * @typeParam TCode - The error code type
 */
export interface InvariantConfig<TState, TCode extends string> {
  /** Unique name for introspection and logging */
  name: string;

  /** Error code when the invariant is violated */
  code: TCode;

  /** Returns true if the state satisfies the rule */
  check: (state: TState) => boolean;

  /** Human-readable message for a violating state */
  message: (state: TState) => string;

  /** Optional context for error reporting */
  context?: (state: TState) => UnknownRecord;
}

/**
 * Outcome of `Invariant.validate`.
 */
export type InvariantResult<TError> = { valid: true } | { valid: false; error: TError };

/**
 * A single rule that can be validated against a value.
 */
export interface Invariant<TState, TCode extends string, TError extends InvariantError<TCode>> {
  readonly name: string;
  readonly code: TCode;

  validate(state: TState): InvariantResult<TError>;
}

/**
 * Create a typed invariant from configuration.
 *
 * @param config - Rule definition
 * @param ErrorClass - Error constructor used for violations
 */
export function createInvariant<
  TState,
  TCode extends string,
  TError extends InvariantError<TCode> = InvariantError<TCode>,
>(
  config: InvariantConfig<TState, TCode>,
  ErrorClass: InvariantErrorConstructor<TCode, TError>
): Invariant<TState, TCode, TError> {
  const { name, code, check, message, context } = config;

  return {
    name,
    code,

    validate(state: TState): InvariantResult<TError> {
      if (check(state)) {
        return { valid: true };
      }
      return { valid: false, error: new ErrorClass(code, message(state), context?.(state)) };
    },
  };
}
