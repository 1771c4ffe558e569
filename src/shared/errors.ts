/**
 * TradingError hierarchy: structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). The
 * dispatcher retries only retryable errors; the session coordinator treats
 * fatal ones as a reason to stop.
 */

/** Error severity categories that drive retry and shutdown behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Machine-readable error kinds, also reported in OrderOutcome.errorKind. */
export const ErrorKind = {
	Transport: "TRANSPORT_ERROR",
	Timeout: "TIMEOUT_ERROR",
	RateLimit: "RATE_LIMIT_ERROR",
	Auth: "AUTH_ERROR",
	NotFound: "NOT_FOUND",
	DuplicateKey: "DUPLICATE_KEY",
	Rejected: "ORDER_REJECTED",
	Config: "CONFIG_ERROR",
	Validation: "VALIDATION_FAILED",
	System: "SYSTEM_ERROR",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error class for all mirror operations, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: ErrorKind;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: ErrorKind,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Connection lost, socket failure, or request sent while disconnected. */
export class TransportError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.Transport, ErrorCategory.Retryable, context);
		this.name = "TransportError";
	}
}

/** A request did not receive its correlated response in time. */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.Timeout, ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

/** Venue-side throttling, or a local token wait that timed out. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;

	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		super(message, ErrorKind.RateLimit, ErrorCategory.Retryable, context);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

/** Bad client credentials or an invalid/expired access token. Never retried silently. */
export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.Auth, ErrorCategory.Fatal, context);
		this.name = "AuthError";
	}
}

/** A decision or lookup references something that does not exist (ledger entry, symbol). */
export class NotFoundError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.NotFound, ErrorCategory.NonRetryable, context);
		this.name = "NotFoundError";
	}
}

/** Second OPEN for a master position that is already in the ledger. */
export class DuplicateKeyError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.DuplicateKey, ErrorCategory.NonRetryable, context);
		this.name = "DuplicateKeyError";
	}
}

/** Business rejection from the venue: invalid volume, unknown symbol, insufficient margin. */
export class RejectedOrderError extends TradingError {
	readonly reason: string;

	constructor(message: string, reason: string, context: ErrorContext = {}) {
		super(message, ErrorKind.Rejected, ErrorCategory.NonRetryable, context);
		this.name = "RejectedOrderError";
		this.reason = reason;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), reason: this.reason };
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.Config, ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** Unexpected internal failure. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, ErrorKind.System, ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Non-fatal conditions ─────────────────────────────────────────────

/**
 * Pip-equalization could not find pip values for one side and used the
 * fallback multiplier instead. Reported as a value, never thrown.
 */
export interface PolicyFallbackWarning {
	readonly kind: "policy_fallback";
	readonly instrumentId: number;
	readonly missing: readonly ("master" | "slave")[];
	readonly fallbackMultiplier: string;
}

// ── Classification helper ────────────────────────────────────────────

/** Map an unknown thrown value into the TradingError hierarchy by inspecting its code and message. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = "code" in error ? error.code : undefined;

		if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (
			code === "ECONNREFUSED" ||
			code === "ECONNRESET" ||
			code === "ENOTFOUND" ||
			code === "EPIPE" ||
			msg.includes("socket") ||
			msg.includes("not connected")
		) {
			return new TransportError(error.message, { cause: error });
		}
		if (msg.includes("rate limit") || msg.includes("too many requests")) {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isTransportError(e: unknown): e is TransportError {
	return e instanceof TransportError;
}

export function isAuthError(e: unknown): e is AuthError {
	return e instanceof AuthError;
}

export function isNotFoundError(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}

export function isRejectedOrderError(e: unknown): e is RejectedOrderError {
	return e instanceof RejectedOrderError;
}
