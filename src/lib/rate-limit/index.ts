export { TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RateLimiterConfig, RateLimiterStats } from "./rate-limiter.js";
export { RateLimiterManager } from "./rate-limiter-manager.js";
export {
	DATA_BUCKET,
	DATA_LIMITS,
	TRADING_BUCKET,
	TRADING_LIMITS,
	openApiPresets,
} from "./rate-limiter-presets.js";
