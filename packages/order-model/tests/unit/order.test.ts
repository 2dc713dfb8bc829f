/**
 * Unit tests for the order record: defaults, identity guard, orderable
 * matching and description.
 */
import { describe, it, expect } from "vitest";
import {
  createOrder,
  describeOrder,
  EMPTY_AUDIT,
  hasSameOrderableAs,
  isPersisted,
  toOrderId,
} from "../../src/index.js";

describe("createOrder", () => {
  it("should fill defaults for omitted fields", () => {
    const order = createOrder({ patientId: "patient-1" });

    expect(order).toEqual({
      orderId: null,
      orderNumber: null,
      patientId: "patient-1",
      conceptId: null,
      orderTypeId: null,
      careSettingId: null,
      encounterId: null,
      ordererId: null,
      instructions: null,
      accessionNumber: null,
      dateActivated: null,
      scheduledDate: null,
      dateStopped: null,
      autoExpireDate: null,
      urgency: "ROUTINE",
      action: "NEW",
      previousOrderId: null,
      orderReason: null,
      orderReasonNonCoded: null,
      commentToFulfiller: null,
      voided: false,
      audit: EMPTY_AUDIT,
    });
  });

  it("should keep provided values", () => {
    const order = createOrder({
      patientId: "patient-1",
      orderId: toOrderId("order-1"),
      urgency: "STAT",
      action: "RENEW",
      dateActivated: 1_000,
      voided: true,
    });

    expect(order.orderId).toBe("order-1");
    expect(order.urgency).toBe("STAT");
    expect(order.action).toBe("RENEW");
    expect(order.dateActivated).toBe(1_000);
    expect(order.voided).toBe(true);
  });

  it("should merge a partial audit block over empty defaults", () => {
    const order = createOrder({ patientId: "patient-1", audit: { creator: "user-1" } });

    expect(order.audit).toEqual({ ...EMPTY_AUDIT, creator: "user-1" });
  });

  it("should not share the audit block between records", () => {
    const first = createOrder({ patientId: "patient-1" });
    const second = createOrder({ patientId: "patient-1" });

    expect(first.audit).not.toBe(second.audit);
  });
});

describe("isPersisted", () => {
  it("should return false without an identity", () => {
    expect(isPersisted(createOrder({ patientId: "patient-1" }))).toBe(false);
  });

  it("should return true with an identity", () => {
    expect(isPersisted(createOrder({ patientId: "patient-1", orderId: toOrderId("order-1") }))).toBe(
      true
    );
  });
});

describe("hasSameOrderableAs", () => {
  const aspirin = createOrder({ patientId: "patient-1", conceptId: "concept-aspirin" });

  it("should return false when there is no other order", () => {
    expect(hasSameOrderableAs(aspirin, null)).toBe(false);
  });

  it("should compare concepts", () => {
    const sameConcept = createOrder({ patientId: "patient-2", conceptId: "concept-aspirin" });
    const otherConcept = createOrder({ patientId: "patient-1", conceptId: "concept-other" });

    expect(hasSameOrderableAs(aspirin, sameConcept)).toBe(true);
    expect(hasSameOrderableAs(aspirin, otherConcept)).toBe(false);
  });

  it("should treat two orders without a concept as the same orderable", () => {
    const first = createOrder({ patientId: "patient-1" });
    const second = createOrder({ patientId: "patient-1" });

    expect(hasSameOrderableAs(first, second)).toBe(true);
  });
});

describe("describeOrder", () => {
  it("should describe a discontinuation with a DC prefix", () => {
    const order = createOrder({
      patientId: "p-1",
      orderId: toOrderId("7"),
      conceptId: "c-1",
      careSettingId: "cs-1",
      action: "DISCONTINUE",
    });

    expect(describeOrder(order)).toBe(
      "DC Order. orderId: 7 patient: p-1 concept: c-1 care setting: cs-1"
    );
  });

  it("should render absent references as null", () => {
    const order = createOrder({ patientId: "p-1" });

    expect(describeOrder(order)).toBe(
      "Order. orderId: null patient: p-1 concept: null care setting: null"
    );
  });
});
