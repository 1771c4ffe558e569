import type { Clock } from "../../shared/time.js";
import type { RateLimiterConfig, RateLimiterStats } from "./rate-limiter.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

/**
 * Named token buckets sharing one clock.
 *
 * First registration wins: a second `getOrCreate` with the same name returns
 * the existing bucket and ignores the new config.
 */
export class RateLimiterManager {
	private readonly clock: Clock;
	private readonly limiters: Map<string, TokenBucketRateLimiter> = new Map();

	constructor(clock: Clock) {
		this.clock = clock;
	}

	getOrCreate(name: string, config: Omit<RateLimiterConfig, "clock">): TokenBucketRateLimiter {
		const existing = this.limiters.get(name);
		if (existing) return existing;
		const limiter = new TokenBucketRateLimiter({ ...config, clock: this.clock });
		this.limiters.set(name, limiter);
		return limiter;
	}

	get(name: string): TokenBucketRateLimiter | undefined {
		return this.limiters.get(name);
	}

	getAllStats(): ReadonlyMap<string, RateLimiterStats> {
		const stats = new Map<string, RateLimiterStats>();
		for (const [name, limiter] of this.limiters) {
			stats.set(name, limiter.getStats());
		}
		return stats;
	}

	/** Reject every waiter on every bucket; used when shutdown outlives its grace period. */
	cancelAll(reason?: string): void {
		for (const limiter of this.limiters.values()) {
			limiter.cancelAll(reason);
		}
	}
}
