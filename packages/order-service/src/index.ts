/**
 * Order service layer.
 *
 * Samples the clock, logs, and applies decider output through a store port.
 * The pure packages underneath never do any of these.
 *
 * @module @clinical-orders/order-service
 */

// Clock and configuration
export type { Clock } from "./clock.js";
export { systemClock, fixedClock } from "./clock.js";
export type { OrderServiceConfig } from "./config.js";
export {
  LogLevelSchema,
  OrderServiceConfigSchema,
  DEFAULT_ORDER_SERVICE_CONFIG,
  loadOrderServiceConfig,
} from "./config.js";

// Logging
export * from "./logging/index.js";

// Deciders
export * from "./deciders/index.js";

// Store port
export type { OrderStore } from "./store/types.js";

// Services
export type { OrderStatusServiceDependencies } from "./OrderStatusService.js";
export { OrderStatusService } from "./OrderStatusService.js";
export type {
  OrderCommandServiceDependencies,
  CommandSuccess,
  CommandRejected,
  CommandResult,
  DiscontinueOrderResult,
  ReviseOrderResult,
  RevisionHistory,
} from "./OrderCommandService.js";
export { OrderCommandService } from "./OrderCommandService.js";
