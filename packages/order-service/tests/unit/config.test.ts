/**
 * Unit tests for environment configuration.
 */
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_ORDER_SERVICE_CONFIG, loadOrderServiceConfig } from "../../src/index.js";

describe("loadOrderServiceConfig", () => {
  it("should fall back to defaults", () => {
    expect(loadOrderServiceConfig({})).toEqual({ logLevel: "INFO", maxChainDepth: 500 });
    expect(DEFAULT_ORDER_SERVICE_CONFIG).toEqual({ logLevel: "INFO", maxChainDepth: 500 });
  });

  it("should read and coerce environment variables", () => {
    expect(
      loadOrderServiceConfig({
        ORDER_SERVICE_LOG_LEVEL: "DEBUG",
        ORDER_SERVICE_MAX_CHAIN_DEPTH: "25",
      })
    ).toEqual({ logLevel: "DEBUG", maxChainDepth: 25 });
  });

  it("should reject an unknown log level", () => {
    expect(() => loadOrderServiceConfig({ ORDER_SERVICE_LOG_LEVEL: "VERBOSE" })).toThrow(ZodError);
  });

  it.each(["0", "-3", "2.5", "many"])("should reject a chain depth of %s", (depth) => {
    expect(() => loadOrderServiceConfig({ ORDER_SERVICE_MAX_CHAIN_DEPTH: depth })).toThrow(
      ZodError
    );
  });
});
