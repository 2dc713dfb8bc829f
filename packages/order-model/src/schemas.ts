/**
 * Zod schemas for order records arriving from outside the core.
 *
 * Parsing fills defaults the same way `createOrder` does. It deliberately does
 * not enforce the stop/auto-expire interval: a corrupt interval must still load
 * so the temporal evaluator can report it as an integrity error.
 *
 * @module schemas
 */

import { z } from "zod";
import { toOrderId } from "./ids.js";
import { ORDER_ACTIONS, URGENCIES, type OrderRecord } from "./order.js";

// ============================================================================
// Field Schemas
// ============================================================================

/**
 * Epoch milliseconds.
 */
export const InstantSchema = z.number().int().finite();

const nullableInstant = InstantSchema.nullable().default(null);
const nullableRef = z.string().min(1).nullable().default(null);
const nullableText = z.string().nullable().default(null);

export const UrgencySchema = z.enum(URGENCIES);

export const OrderActionSchema = z.enum(ORDER_ACTIONS);

export const OrderIdSchema = z.string().min(1).transform(toOrderId);

export const OrderAuditSchema = z.object({
  creator: nullableRef,
  dateCreated: nullableInstant,
  changedBy: nullableRef,
  dateChanged: nullableInstant,
  voidedBy: nullableRef,
  dateVoided: nullableInstant,
  voidReason: nullableText,
});

// ============================================================================
// Order Record Schema
// ============================================================================

export const OrderRecordSchema = z.object({
  orderId: OrderIdSchema.nullable().default(null),
  orderNumber: nullableRef,

  patientId: z.string().min(1),
  conceptId: nullableRef,
  orderTypeId: nullableRef,
  careSettingId: nullableRef,
  encounterId: nullableRef,
  ordererId: nullableRef,

  instructions: nullableText,
  accessionNumber: nullableRef,

  dateActivated: nullableInstant,
  scheduledDate: nullableInstant,
  dateStopped: nullableInstant,
  autoExpireDate: nullableInstant,

  urgency: UrgencySchema.default("ROUTINE"),
  action: OrderActionSchema.default("NEW"),
  previousOrderId: OrderIdSchema.nullable().default(null),

  orderReason: nullableRef,
  orderReasonNonCoded: nullableText,
  commentToFulfiller: nullableText,

  voided: z.boolean().default(false),
  audit: OrderAuditSchema.default({}),
});

export type OrderRecordInput = z.input<typeof OrderRecordSchema>;

/**
 * Parse an untrusted value into an order record.
 *
 * @throws ZodError when the value is not a well-formed order
 */
export function parseOrderRecord(input: unknown): OrderRecord {
  return OrderRecordSchema.parse(input);
}

/**
 * Non-throwing variant of `parseOrderRecord`.
 */
export function safeParseOrderRecord(input: unknown) {
  return OrderRecordSchema.safeParse(input);
}
