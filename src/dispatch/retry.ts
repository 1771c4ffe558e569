/**
 * Retry with exponential backoff and jitter for gateway calls.
 *
 * Only errors marked retryable (transport, timeout, rate limit) are retried.
 * Business rejections and fatal errors come back on the first attempt.
 */

import { RateLimitError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { sleep } from "../shared/time.js";

export interface RetryConfig {
	/** Total attempts including the first one */
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 250,
	maxDelayMs: 5_000,
	jitterFactor: 0.1,
};

export interface RetryHooks {
	/** Called before each wait, with the attempt number that just failed (1-based). */
	readonly onRetry?: (attempt: number, delayMs: number, error: TradingError) => void;
	/** Injected wait; defaults to a real timer. */
	readonly sleep?: (ms: number) => Promise<void>;
}

/** @internal Exported for testing only. */
export function computeDelay(attempt: number, config: RetryConfig, error: TradingError): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	let delay = Math.min(exponential, config.maxDelayMs);

	if (error instanceof RateLimitError) {
		delay = Math.max(delay, error.retryAfterMs);
	}

	const jitter = 1 + (Math.random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` is spent. The last result is returned as-is.
 *
 * @example
 * ```ts
 * const result = await retryResult(() => gateway.closePosition(req), config.dispatch);
 * ```
 */
export async function retryResult<T>(
	operation: () => Promise<Result<T, TradingError>>,
	config: RetryConfig,
	hooks: RetryHooks = {},
): Promise<Result<T, TradingError>> {
	const wait = hooks.sleep ?? sleep;
	let last = await operation();

	for (let attempt = 1; attempt < config.maxAttempts; attempt++) {
		if (last.ok || !last.error.isRetryable) return last;

		const delay = computeDelay(attempt - 1, config, last.error);
		hooks.onRetry?.(attempt, delay, last.error);
		await wait(delay);
		last = await operation();
	}

	return last;
}
