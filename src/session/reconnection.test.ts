import { afterEach, describe, expect, it, vi } from "vitest";
import { ReconnectionPolicy } from "./reconnection.js";

function policy(baseDelayMs = 1_000, maxDelayMs = 30_000, maxAttempts = 10, jitterFactor = 0) {
	return new ReconnectionPolicy({ baseDelayMs, maxDelayMs, maxAttempts, jitterFactor });
}

describe("ReconnectionPolicy", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("doubles from the base delay up to the cap", () => {
		const p = policy(1_000, 5_000);
		expect([p.nextDelay(), p.nextDelay(), p.nextDelay(), p.nextDelay()]).toEqual([
			1_000, 2_000, 4_000, 5_000,
		]);
		expect(p.attemptCount).toBe(4);
	});

	it("starts over after reset", () => {
		const p = policy();
		p.nextDelay();
		p.nextDelay();
		p.reset();
		expect(p.attemptCount).toBe(0);
		expect(p.nextDelay()).toBe(1_000);
	});

	it("stops retrying after maxAttempts", () => {
		const p = policy(1_000, 30_000, 2);
		expect(p.shouldRetry()).toBe(true);
		p.nextDelay();
		expect(p.shouldRetry()).toBe(true);
		p.nextDelay();
		expect(p.shouldRetry()).toBe(false);
	});

	it("jitters by up to jitterFactor either way", () => {
		vi.spyOn(Math, "random").mockReturnValue(1);
		expect(policy(1_000, 30_000, 10, 0.2).nextDelay()).toBe(1_200);
		vi.spyOn(Math, "random").mockReturnValue(0);
		expect(policy(1_000, 30_000, 10, 0.2).nextDelay()).toBe(800);
	});

	it("never returns a negative delay", () => {
		vi.spyOn(Math, "random").mockReturnValue(0);
		expect(policy(10, 30_000, 10, 1).nextDelay()).toBe(0);
	});
});
