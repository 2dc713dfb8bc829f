/**
 * Unit tests for revision chain traversal.
 */
import { describe, it, expect } from "vitest";
import {
  createOrder,
  OrderIntegrityError,
  toOrderId,
  type PersistedOrder,
} from "@clinical-orders/order-model";
import {
  createOrderLookup,
  DEFAULT_MAX_CHAIN_DEPTH,
  findChainRoot,
  walkRevisionChain,
} from "../../src/index.js";

const persisted = (id: string, previousId: string | null = null): PersistedOrder => ({
  ...createOrder({
    patientId: "patient-1",
    action: previousId === null ? "NEW" : "REVISE",
    previousOrderId: previousId === null ? null : toOrderId(previousId),
  }),
  orderId: toOrderId(id),
});

const original = persisted("order-1");
const firstRevision = persisted("order-2", "order-1");
const secondRevision = persisted("order-3", "order-2");
const lookup = createOrderLookup([original, firstRevision, secondRevision]);

describe("walkRevisionChain", () => {
  it("should list predecessors newest first", () => {
    expect(walkRevisionChain(secondRevision, lookup)).toEqual({
      ok: true,
      value: [firstRevision, original],
    });
  });

  it("should return an empty chain for an original order", () => {
    expect(walkRevisionChain(original, lookup)).toEqual({ ok: true, value: [] });
  });

  it("should walk from an unsaved record", () => {
    const draft = createOrder({ patientId: "patient-1", previousOrderId: toOrderId("order-3") });

    expect(walkRevisionChain(draft, lookup)).toEqual({
      ok: true,
      value: [secondRevision, firstRevision, original],
    });
  });

  it("should report a missing predecessor", () => {
    const orphan = persisted("order-9", "order-8");

    const result = walkRevisionChain(orphan, lookup);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(OrderIntegrityError);
      expect(result.error.code).toBe("REVISION_CHAIN_BROKEN");
      expect(result.error.message).toBe(
        "Revision chain of order order-9 references missing order order-8"
      );
      expect(result.error.context).toEqual({ orderId: "order-9", missingOrderId: "order-8" });
    }
  });

  it("should report a cycle", () => {
    const a = persisted("order-a", "order-b");
    const b = persisted("order-b", "order-a");

    const result = walkRevisionChain(a, createOrderLookup([a, b]));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("REVISION_CHAIN_CYCLE");
      expect(result.error.context).toEqual({ orderId: "order-a", repeatedOrderId: "order-a" });
    }
  });

  it("should report a record that references itself", () => {
    const self = persisted("order-s", "order-s");

    const result = walkRevisionChain(self, createOrderLookup([self]));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("REVISION_CHAIN_CYCLE");
    }
  });

  it("should stop at the depth limit", () => {
    expect(walkRevisionChain(secondRevision, lookup, { maxDepth: 2 }).ok).toBe(true);

    const result = walkRevisionChain(secondRevision, lookup, { maxDepth: 1 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("REVISION_CHAIN_TOO_DEEP");
      expect(result.error.message).toBe("Revision chain of order order-3 exceeds 1 links");
      expect(result.error.context).toEqual({ orderId: "order-3", maxDepth: 1 });
    }
  });

  it("should follow up to 500 links by default", () => {
    expect(DEFAULT_MAX_CHAIN_DEPTH).toBe(500);

    const orders = Array.from({ length: 502 }, (_, i) =>
      persisted(`order-${i}`, i === 0 ? null : `order-${i - 1}`)
    );
    const longLookup = createOrderLookup(orders);

    const atLimit = walkRevisionChain(orders[500] ?? original, longLookup);
    expect(atLimit.ok && atLimit.value.length).toBe(500);

    const pastLimit = walkRevisionChain(orders[501] ?? original, longLookup);
    expect(pastLimit.ok).toBe(false);
  });
});

describe("findChainRoot", () => {
  it("should return the oldest record", () => {
    expect(findChainRoot(secondRevision, lookup)).toEqual({ ok: true, value: original });
  });

  it("should return the order itself when it has no predecessor", () => {
    expect(findChainRoot(original, lookup)).toEqual({ ok: true, value: original });
  });

  it("should propagate chain errors", () => {
    expect(findChainRoot(persisted("order-9", "order-8"), lookup).ok).toBe(false);
  });
});
