import { describe, expect, it } from "vitest";
import {
	AuthError,
	ConfigError,
	DuplicateKeyError,
	ErrorCategory,
	ErrorKind,
	NotFoundError,
	RateLimitError,
	RejectedOrderError,
	SystemError,
	TimeoutError,
	TradingError,
	TransportError,
	classifyError,
	isAuthError,
	isNotFoundError,
	isRejectedOrderError,
	isTransportError,
} from "./errors.js";

describe("TradingError hierarchy", () => {
	const cases: Array<[string, TradingError, ErrorCategory, ErrorKind]> = [
		["TransportError", new TransportError("socket closed"), ErrorCategory.Retryable, ErrorKind.Transport],
		["TimeoutError", new TimeoutError("no reply"), ErrorCategory.Retryable, ErrorKind.Timeout],
		["RateLimitError", new RateLimitError("throttled", 250), ErrorCategory.Retryable, ErrorKind.RateLimit],
		["AuthError", new AuthError("bad token"), ErrorCategory.Fatal, ErrorKind.Auth],
		["NotFoundError", new NotFoundError("no such position"), ErrorCategory.NonRetryable, ErrorKind.NotFound],
		["DuplicateKeyError", new DuplicateKeyError("exists"), ErrorCategory.NonRetryable, ErrorKind.DuplicateKey],
		[
			"RejectedOrderError",
			new RejectedOrderError("rejected", "NOT_ENOUGH_MONEY"),
			ErrorCategory.NonRetryable,
			ErrorKind.Rejected,
		],
		["ConfigError", new ConfigError("missing"), ErrorCategory.Fatal, ErrorKind.Config],
		["SystemError", new SystemError("panic"), ErrorCategory.Fatal, ErrorKind.System],
	];

	it.each(cases)("%s is classified", (name, error, category, kind) => {
		expect(error.name).toBe(name);
		expect(error.category).toBe(category);
		expect(error.code).toBe(kind);
		expect(error).toBeInstanceOf(TradingError);
		expect(error).toBeInstanceOf(Error);
	});

	it("retryable and fatal flags follow the category", () => {
		expect(new TransportError("x").isRetryable).toBe(true);
		expect(new RejectedOrderError("x", "r").isRetryable).toBe(false);
		expect(new AuthError("x").isFatal).toBe(true);
		expect(new NotFoundError("x").isFatal).toBe(false);
	});

	it("splits cause out of the context", () => {
		const root = new Error("econnreset");
		const e = new TransportError("lost", { cause: root, attempt: 2 });
		expect(e.cause).toBe(root);
		expect(e.context).toEqual({ attempt: 2 });
	});

	it("toJSON carries subclass fields", () => {
		expect(new RateLimitError("slow down", 500).toJSON()).toEqual({
			name: "RateLimitError",
			message: "slow down",
			code: "RATE_LIMIT_ERROR",
			category: "retryable",
			retryable: true,
			context: {},
			retryAfterMs: 500,
		});
		expect(new RejectedOrderError("no", "MARKET_CLOSED").toJSON()).toMatchObject({
			reason: "MARKET_CLOSED",
			retryable: false,
		});
	});
});

describe("classifyError", () => {
	it("passes TradingErrors through", () => {
		const e = new AuthError("expired");
		expect(classifyError(e)).toBe(e);
	});

	it("maps timeouts", () => {
		expect(classifyError(new Error("request timed out"))).toBeInstanceOf(TimeoutError);
	});

	it("maps socket failures by code and by message", () => {
		const refused = Object.assign(new Error("connect failed"), { code: "ECONNREFUSED" });
		expect(classifyError(refused)).toBeInstanceOf(TransportError);
		expect(classifyError(new Error("WebSocket is not connected"))).toBeInstanceOf(TransportError);
	});

	it("maps throttling", () => {
		const e = classifyError(new Error("Too Many Requests"));
		expect(e).toBeInstanceOf(RateLimitError);
		expect(e).toMatchObject({ retryAfterMs: 1000 });
	});

	it("defaults to SystemError", () => {
		expect(classifyError(new Error("weird"))).toBeInstanceOf(SystemError);
		const wrapped = classifyError("a string");
		expect(wrapped).toBeInstanceOf(SystemError);
		expect(wrapped.message).toBe("a string");
	});
});

describe("type guards", () => {
	it("narrow by class", () => {
		expect(isTransportError(new TransportError("x"))).toBe(true);
		expect(isTransportError(new TimeoutError("x"))).toBe(false);
		expect(isAuthError(new AuthError("x"))).toBe(true);
		expect(isNotFoundError(new NotFoundError("x"))).toBe(true);
		expect(isRejectedOrderError(new RejectedOrderError("x", "r"))).toBe(true);
		expect(isRejectedOrderError(new Error("x"))).toBe(false);
	});
});
