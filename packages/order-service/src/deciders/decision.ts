/**
 * ## Decision Outputs - Pure Authorisation Results
 *
 * A decider takes an order, a command and a context and returns either a
 * success (new records, the event to publish, the update to apply to the
 * target order) or a rejection with a code. Deciders never throw and never
 * touch the store; the command service applies their output.
 *
 * | Concern | Decider (**Pure**) | Command service (Effectful) |
 * |---------|-------------------|-----------------------------|
 * | I/O | None | Load, insert, update |
 * | Clock | `context.now` | Samples `Clock` once |
 * | Returns | `DecisionOutput` | `CommandResult` |
 */

import type { Instant, UnknownRecord } from "@clinical-orders/order-model";

/**
 * Event emitted by a successful decision.
 */
export interface DecisionEvent<TType extends string = string, TPayload extends object = object> {
  eventType: TType;
  payload: TPayload;
}

export interface DecisionSuccess<TEvent extends DecisionEvent, TData, TStateUpdate> {
  status: "success";

  /** Data handed back to the caller */
  data: TData;

  /** Event describing what happened */
  event: TEvent;

  /** Update to apply to the target order */
  stateUpdate: TStateUpdate;
}

export interface DecisionRejected {
  status: "rejected";
  code: string;
  message: string;
  context?: UnknownRecord;
}

export type DecisionOutput<TEvent extends DecisionEvent, TData, TStateUpdate> =
  | DecisionSuccess<TEvent, TData, TStateUpdate>
  | DecisionRejected;

/**
 * Inputs a decider must not produce itself.
 */
export interface DeciderContext {
  /** The single "now" of this command */
  now: Instant;
}

export function success<TEvent extends DecisionEvent, TData, TStateUpdate>(
  output: Omit<DecisionSuccess<TEvent, TData, TStateUpdate>, "status">
): DecisionSuccess<TEvent, TData, TStateUpdate> {
  return { status: "success", ...output };
}

export function rejected(code: string, message: string, context?: UnknownRecord): DecisionRejected {
  const result: DecisionRejected = { status: "rejected", code, message };
  if (context !== undefined) {
    result.context = context;
  }
  return result;
}

export function isSuccess<TEvent extends DecisionEvent, TData, TStateUpdate>(
  output: DecisionOutput<TEvent, TData, TStateUpdate>
): output is DecisionSuccess<TEvent, TData, TStateUpdate> {
  return output.status === "success";
}

export function isRejected<TEvent extends DecisionEvent, TData, TStateUpdate>(
  output: DecisionOutput<TEvent, TData, TStateUpdate>
): output is DecisionRejected {
  return output.status === "rejected";
}
