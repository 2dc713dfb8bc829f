import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "@clinical-orders/order-service",
    environment: "node",
    include: [
      "tests/unit/**/*.test.ts",
      "tests/steps/**/*.steps.ts", // Gherkin step files
    ],
  },
});
