import { ConfigError, RateLimitError } from "../../shared/errors.js";
import type { Clock } from "../../shared/time.js";

/**
 * Configuration for TokenBucketRateLimiter.
 *
 * `capacity` is the burst size and `refillRate` the steady rate in tokens per
 * second. No window of one second ever admits more than
 * `capacity + refillRate` requests.
 */
export interface RateLimiterConfig {
	readonly capacity: number;
	readonly refillRate: number;
	readonly clock: Clock;
	/** Default timeout for `acquire()`; Infinity waits forever */
	readonly acquireTimeoutMs?: number;
}

/** Snapshot of rate limiter usage statistics. */
export interface RateLimiterStats {
	readonly hits: number;
	readonly misses: number;
	readonly waits: number;
	readonly avgWaitMs: number;
	readonly queued: number;
}

interface Waiter {
	readonly enqueuedAt: number;
	readonly resolve: () => void;
	readonly reject: (error: Error) => void;
	timeout: ReturnType<typeof setTimeout> | null;
}

/**
 * Token-bucket rate limiter with a FIFO wait queue.
 *
 * Tokens accumulate at `refillRate` tokens/second up to `capacity`.
 * `tryAcquire()` never blocks; `acquire()` queues behind earlier waiters, so
 * callers are admitted in the order they asked. Nothing is dropped unless a
 * wait times out or the queue is cancelled.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly acquireTimeoutMs: number;
	private tokens: number;
	private lastRefillMs: number;
	private readonly waiters: Waiter[] = [];
	private drainTimer: ReturnType<typeof setTimeout> | null = null;

	private _hits = 0;
	private _misses = 0;
	private _waits = 0;
	private _totalWaitMs = 0;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate <= 0) {
			throw new ConfigError("refillRate must be > 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.acquireTimeoutMs = config.acquireTimeoutMs ?? 30_000;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/**
	 * Take a token if one is free and nobody is queued ahead.
	 * @returns true if a token was acquired
	 */
	tryAcquire(): boolean {
		const acquired = this.waiters.length === 0 && this.take();
		if (acquired) {
			this._hits++;
		} else {
			this._misses++;
		}
		return acquired;
	}

	/**
	 * Wait in line for a token.
	 * @throws RateLimitError if `timeoutMs` passes first, or the queue is cancelled
	 */
	acquire(timeoutMs = this.acquireTimeoutMs): Promise<void> {
		if (this.waiters.length === 0 && this.take()) {
			this._hits++;
			return Promise.resolve();
		}

		this._waits++;
		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = {
				enqueuedAt: this.clock.now(),
				resolve,
				reject,
				timeout: null,
			};
			if (Number.isFinite(timeoutMs)) {
				waiter.timeout = setTimeout(() => {
					this.removeWaiter(waiter);
					reject(new RateLimitError("Timeout waiting for rate limit token", timeoutMs));
				}, timeoutMs);
			}
			this.waiters.push(waiter);
			this.scheduleDrain();
		});
	}

	/** Number of callers waiting in `acquire()`. */
	get queued(): number {
		return this.waiters.length;
	}

	/**
	 * Returns the current number of available tokens (after refill).
	 * @returns Number of tokens available (floored to integer).
	 */
	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	/** Milliseconds until the next token is free; 0 if one is free now. */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		return Math.max(1, Math.ceil(((1 - this.tokens) / this.refillRate) * 1000));
	}

	/** Reject every queued waiter, e.g. on shutdown. */
	cancelAll(reason = "Rate limiter queue cancelled"): void {
		if (this.drainTimer !== null) {
			clearTimeout(this.drainTimer);
			this.drainTimer = null;
		}
		const pending = this.waiters.splice(0);
		for (const waiter of pending) {
			if (waiter.timeout !== null) clearTimeout(waiter.timeout);
			waiter.reject(new RateLimitError(reason, 0));
		}
	}

	/** Returns a snapshot of rate limiter usage statistics. */
	getStats(): RateLimiterStats {
		return {
			hits: this._hits,
			misses: this._misses,
			waits: this._waits,
			avgWaitMs: this._waits > 0 ? this._totalWaitMs / this._waits : 0,
			queued: this.waiters.length,
		};
	}

	private take(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	private scheduleDrain(): void {
		if (this.drainTimer !== null || this.waiters.length === 0) return;
		this.drainTimer = setTimeout(() => {
			this.drainTimer = null;
			this.drain();
		}, this.timeUntilNextTokenMs());
	}

	private drain(): void {
		let head = this.waiters[0];
		while (head && this.take()) {
			this.waiters.shift();
			if (head.timeout !== null) clearTimeout(head.timeout);
			this._hits++;
			this._totalWaitMs += this.clock.now() - head.enqueuedAt;
			head.resolve();
			head = this.waiters[0];
		}
		this.scheduleDrain();
	}

	private removeWaiter(waiter: Waiter): void {
		const idx = this.waiters.indexOf(waiter);
		if (idx !== -1) this.waiters.splice(idx, 1);
		if (this.waiters.length === 0 && this.drainTimer !== null) {
			clearTimeout(this.drainTimer);
			this.drainTimer = null;
		}
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		const newTokens = (elapsedMs / 1000) * this.refillRate;
		this.tokens = Math.min(this.capacity, this.tokens + newTokens);
		this.lastRefillMs = now;
	}
}
