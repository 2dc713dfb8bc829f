/**
 * Service configuration.
 *
 * Read from environment variables and validated with zod:
 *
 * | Variable | Field | Default |
 * |----------|-------|---------|
 * | `ORDER_SERVICE_LOG_LEVEL` | `logLevel` | `INFO` |
 * | `ORDER_SERVICE_MAX_CHAIN_DEPTH` | `maxChainDepth` | `500` |
 */

import { z } from "zod";
import { DEFAULT_MAX_CHAIN_DEPTH } from "@clinical-orders/order-revision";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "./logging/types.js";

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const OrderServiceConfigSchema = z.object({
  /** Minimum level emitted by the service loggers */
  logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),

  /** Longest revision chain followed before reporting corruption */
  maxChainDepth: z.coerce.number().int().positive().default(DEFAULT_MAX_CHAIN_DEPTH),
});

export type OrderServiceConfig = z.infer<typeof OrderServiceConfigSchema>;

export const DEFAULT_ORDER_SERVICE_CONFIG: OrderServiceConfig = OrderServiceConfigSchema.parse({});

/**
 * Load configuration from an environment map.
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadOrderServiceConfig(
  env: Record<string, string | undefined> = process.env
): OrderServiceConfig {
  return OrderServiceConfigSchema.parse({
    logLevel: env["ORDER_SERVICE_LOG_LEVEL"],
    maxChainDepth: env["ORDER_SERVICE_MAX_CHAIN_DEPTH"],
  });
}
