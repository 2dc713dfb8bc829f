import { defineConfig } from "vitest/config";

/**
 * Root Vitest configuration.
 *
 * Each workspace package carries its own project config with the unit and
 * Gherkin step file globs.
 *
 * Usage: npm test
 */
export default defineConfig({
  test: {
    projects: ["packages/*"],
  },
});
