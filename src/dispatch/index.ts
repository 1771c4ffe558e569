export { OrderDispatcher } from "./order-dispatcher.js";
export type { OrderDispatcherConfig } from "./order-dispatcher.js";
export { DEFAULT_RETRY_CONFIG, computeDelay, retryResult } from "./retry.js";
export type { RetryConfig, RetryHooks } from "./retry.js";
export type {
	ClosePositionRequest,
	MarketOrderRequest,
	OrderConfirmation,
	OrderOutcome,
	OrderRequest,
	SlaveGateway,
} from "./types.js";
