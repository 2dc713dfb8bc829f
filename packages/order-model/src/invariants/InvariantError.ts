import type { UnknownRecord } from "../types.js";

/**
 * Base invariant error class for domain rule violations.
 *
 * Carries a typed code for programmatic handling and a context record with
 * the ids and instants that broke the rule.
 *
 * @example
 * ```typescript
 * throw new InvariantError("SOME_RULE", "Rule broken", { orderId });
 * ```
 */
export class InvariantError<TCode extends string = string> extends Error {
  /**
   * Error code for programmatic handling.
   */
  public readonly code: TCode;

  /**
   * Additional context for debugging and error reporting.
   */
  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "InvariantError";
  }
}

/**
 * Constructor shape accepted by `createInvariant`.
 */
export type InvariantErrorConstructor<
  TCode extends string,
  TError extends InvariantError<TCode> = InvariantError<TCode>,
> = new (code: TCode, message: string, context?: UnknownRecord) => TError;
