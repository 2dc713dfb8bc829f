/**
 * Unit tests for parsing untrusted order records.
 */
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { createOrder, parseOrderRecord, safeParseOrderRecord } from "../../src/index.js";

describe("parseOrderRecord", () => {
  it("should fill the same defaults as createOrder", () => {
    expect(parseOrderRecord({ patientId: "patient-1" })).toEqual(
      createOrder({ patientId: "patient-1" })
    );
  });

  it("should keep identities and instants", () => {
    const order = parseOrderRecord({
      orderId: "order-2",
      previousOrderId: "order-1",
      patientId: "patient-1",
      dateActivated: 1_704_067_200_000,
      urgency: "ON_SCHEDULED_DATE",
      scheduledDate: 1_704_153_600_000,
      action: "REVISE",
      audit: { creator: "user-1" },
    });

    expect(order.orderId).toBe("order-2");
    expect(order.previousOrderId).toBe("order-1");
    expect(order.dateActivated).toBe(1_704_067_200_000);
    expect(order.scheduledDate).toBe(1_704_153_600_000);
    expect(order.urgency).toBe("ON_SCHEDULED_DATE");
    expect(order.action).toBe("REVISE");
    expect(order.audit.creator).toBe("user-1");
    expect(order.audit.dateCreated).toBeNull();
  });

  it("should load a record whose stop date is after its auto-expiry", () => {
    const order = parseOrderRecord({
      patientId: "patient-1",
      dateStopped: 2_000,
      autoExpireDate: 1_000,
    });

    expect(order.dateStopped).toBe(2_000);
    expect(order.autoExpireDate).toBe(1_000);
  });

  it("should reject an unknown urgency", () => {
    expect(() => parseOrderRecord({ patientId: "patient-1", urgency: "WHENEVER" })).toThrow(
      ZodError
    );
  });

  it("should reject an unknown action", () => {
    expect(() => parseOrderRecord({ patientId: "patient-1", action: "CANCEL" })).toThrow(ZodError);
  });

  it("should reject a fractional instant", () => {
    expect(() => parseOrderRecord({ patientId: "patient-1", dateActivated: 1.5 })).toThrow(
      ZodError
    );
  });

  it("should reject a missing patient", () => {
    expect(() => parseOrderRecord({ dateActivated: 1_000 })).toThrow(ZodError);
  });

  it("should reject an empty order id", () => {
    expect(() => parseOrderRecord({ patientId: "patient-1", orderId: "" })).toThrow(ZodError);
  });
});

describe("safeParseOrderRecord", () => {
  it("should report failure without throwing", () => {
    const result = safeParseOrderRecord({ patientId: "patient-1", voided: "yes" });

    expect(result.success).toBe(false);
  });

  it("should return the parsed record on success", () => {
    const result = safeParseOrderRecord({ patientId: "patient-1", voided: true });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.voided).toBe(true);
    }
  });
});
