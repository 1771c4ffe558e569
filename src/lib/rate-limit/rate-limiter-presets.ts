import type { Clock } from "../../shared/time.js";
import { RateLimiterManager } from "./rate-limiter-manager.js";
import type { RateLimiterConfig } from "./rate-limiter.js";

export const TRADING_BUCKET = "trading";
export const DATA_BUCKET = "data";

/**
 * Open API request budgets: 50 trading requests and 5 data requests in any
 * rolling second. Burst plus refill rate equals the budget.
 */
export const TRADING_LIMITS: Omit<RateLimiterConfig, "clock"> = { capacity: 10, refillRate: 40 };
export const DATA_LIMITS: Omit<RateLimiterConfig, "clock"> = { capacity: 1, refillRate: 4 };

export function openApiPresets(clock: Clock): RateLimiterManager {
	const manager = new RateLimiterManager(clock);
	manager.getOrCreate(TRADING_BUCKET, TRADING_LIMITS);
	manager.getOrCreate(DATA_BUCKET, DATA_LIMITS);
	return manager;
}
