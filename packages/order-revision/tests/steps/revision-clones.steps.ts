/**
 * Step definitions for the revision clone feature.
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import {
  isPersisted,
  toOrderId,
  type OrderRecord,
  type PersistedOrder,
} from "@clinical-orders/order-model";
import { orderFromTable, parseInstant, type DataTableRow } from "@clinical-orders/order-model/testing";
import {
  cloneForDiscontinuing,
  cloneForRevision,
  createOrderLookup,
  walkRevisionChain,
} from "../../src/index.js";

// ============================================================================
// Test State
// ============================================================================

interface ScenarioState {
  order: PersistedOrder | null;
  discontinuation: PersistedOrder | null;
  clone: OrderRecord | null;
  chain: OrderRecord[] | null;
}

const state: ScenarioState = { order: null, discontinuation: null, clone: null, chain: null };

function resetState(): void {
  state.order = null;
  state.discontinuation = null;
  state.clone = null;
  state.chain = null;
}

function requireOrder(): PersistedOrder {
  if (state.order === null) {
    throw new Error("No saved order given");
  }
  return state.order;
}

function requireDiscontinuation(): PersistedOrder {
  if (state.discontinuation === null) {
    throw new Error("No discontinuation given");
  }
  return state.discontinuation;
}

function requireClone(): OrderRecord {
  if (state.clone === null) {
    throw new Error("Nothing was cloned");
  }
  return state.clone;
}

function givenDiscontinuation(orderId: string, activatedAt: string): void {
  state.discontinuation = {
    ...cloneForDiscontinuing(requireOrder()),
    orderId: toOrderId(orderId),
    dateActivated: parseInstant(activatedAt),
  };
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/revision-clones.feature", import.meta.url))
);

describeFeature(feature, ({ Background, Scenario, AfterEachScenario }) => {
  AfterEachScenario(() => {
    resetState();
  });

  Background(({ Given }) => {
    Given("a saved order with:", (_ctx: unknown, table: DataTableRow[]) => {
      const order = orderFromTable(table);
      if (!isPersisted(order)) {
        throw new Error("Saved order needs an orderId row");
      }
      state.order = order;
    });
  });

  Scenario("Discontinuing a new order", ({ When, Then, And }) => {
    When("the order is cloned for discontinuation", () => {
      state.clone = cloneForDiscontinuing(requireOrder());
    });

    Then("the clone has action {string}", (_ctx: unknown, action: string) => {
      expect(requireClone().action).toBe(action);
    });

    And("the clone points at {string}", (_ctx: unknown, orderId: string) => {
      expect(requireClone().previousOrderId).toBe(orderId);
    });

    And("the clone has no dates set", () => {
      const clone = requireClone();
      expect(clone.dateActivated).toBeNull();
      expect(clone.scheduledDate).toBeNull();
      expect(clone.dateStopped).toBeNull();
      expect(clone.autoExpireDate).toBeNull();
    });
  });

  Scenario("Revising a new order", ({ When, Then, And }) => {
    When("the order is cloned for revision", () => {
      state.clone = cloneForRevision(requireOrder());
    });

    Then("the clone has action {string}", (_ctx: unknown, action: string) => {
      expect(requireClone().action).toBe(action);
    });

    And("the clone points at {string}", (_ctx: unknown, orderId: string) => {
      expect(requireClone().previousOrderId).toBe(orderId);
    });

    And("the clone expires at {string}", (_ctx: unknown, instant: string) => {
      expect(requireClone().autoExpireDate).toBe(parseInstant(instant));
    });
  });

  Scenario(
    "Revising a discontinuation keeps it a discontinuation",
    ({ Given, When, Then, And }) => {
      Given(
        "a discontinuation {string} of the order activated at {string}",
        (_ctx: unknown, orderId: string, activatedAt: string) => {
          givenDiscontinuation(orderId, activatedAt);
        }
      );

      When("the discontinuation is cloned for revision", () => {
        state.clone = cloneForRevision(requireDiscontinuation());
      });

      Then("the clone has action {string}", (_ctx: unknown, action: string) => {
        expect(requireClone().action).toBe(action);
      });

      And("the clone points at {string}", (_ctx: unknown, orderId: string) => {
        expect(requireClone().previousOrderId).toBe(orderId);
      });

      And("the clone was activated at {string}", (_ctx: unknown, instant: string) => {
        expect(requireClone().dateActivated).toBe(parseInstant(instant));
      });
    }
  );

  Scenario("The revision chain leads back to the original order", ({ Given, When, Then }) => {
    Given(
      "a discontinuation {string} of the order activated at {string}",
      (_ctx: unknown, orderId: string, activatedAt: string) => {
        givenDiscontinuation(orderId, activatedAt);
      }
    );

    When("the revision chain of {string} is walked", (_ctx: unknown, orderId: string) => {
      const discontinuation = requireDiscontinuation();
      expect(discontinuation.orderId).toBe(orderId);
      const result = walkRevisionChain(
        discontinuation,
        createOrderLookup([requireOrder(), discontinuation])
      );
      if (!result.ok) {
        throw result.error;
      }
      state.chain = result.value;
    });

    Then("the chain is {string}", (_ctx: unknown, orderIds: string) => {
      expect(state.chain?.map((order) => order.orderId).join(", ")).toBe(orderIds);
    });
  });
});
