import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";

describe("Decimal", () => {
	describe("factories", () => {
		it("parses strings and numbers", () => {
			expect(Decimal.from("1.5").toString()).toBe("1.5");
			expect(Decimal.from("0.01").toString()).toBe("0.01");
			expect(Decimal.from(100).toString()).toBe("100");
			expect(Decimal.from(-0.25).toString()).toBe("-0.25");
			expect(Decimal.from(".5").toString()).toBe("0.5");
		});

		it("parses exponent notation", () => {
			expect(Decimal.from(1e-7).toString()).toBe("0.0000001");
			expect(Decimal.from("2.5e-3").toString()).toBe("0.0025");
		});

		it("rejects malformed input", () => {
			expect(() => Decimal.from("")).toThrow("empty string");
			expect(() => Decimal.from("abc")).toThrow("invalid decimal string");
			expect(() => Decimal.from("-")).toThrow("invalid decimal string");
			expect(() => Decimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => Decimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
			expect(() => Decimal.from("1e300")).toThrow("out of range");
		});

		it("zero and one", () => {
			expect(Decimal.zero().toString()).toBe("0");
			expect(Decimal.one().toString()).toBe("1");
		});
	});

	describe("arithmetic", () => {
		it("is exact for lot arithmetic", () => {
			expect(Decimal.from("0.1").add(Decimal.from("0.2")).toString()).toBe("0.3");
			expect(Decimal.from("0.10").sub(Decimal.from("0.04")).toString()).toBe("0.06");
			expect(Decimal.from("0.10").mul(Decimal.from("0.5")).toString()).toBe("0.05");
			expect(Decimal.from("0.06").div(Decimal.from("0.10")).toString()).toBe("0.6");
		});

		it("throws on division by zero", () => {
			expect(() => Decimal.one().div(Decimal.zero())).toThrow("division by zero");
		});

		it("neg and abs", () => {
			expect(Decimal.from("5").neg().toString()).toBe("-5");
			expect(Decimal.from("-3.5").abs().toString()).toBe("3.5");
		});
	});

	describe("roundToStep", () => {
		const step = Decimal.from("0.01");

		it("rounds half up by default", () => {
			expect(Decimal.from("0.034").roundToStep(step).toString()).toBe("0.03");
			expect(Decimal.from("0.035").roundToStep(step).toString()).toBe("0.04");
			expect(Decimal.from("0.03").roundToStep(step).toString()).toBe("0.03");
		});

		it("truncates in down mode", () => {
			expect(Decimal.from("0.039").roundToStep(step, "down").toString()).toBe("0.03");
		});

		it("handles coarser steps", () => {
			expect(Decimal.from("1.26").roundToStep(Decimal.from("0.5")).toString()).toBe("1.5");
			expect(Decimal.from("1.24").roundToStep(Decimal.from("0.5")).toString()).toBe("1");
		});

		it("leaves the value alone for a non-positive step", () => {
			expect(Decimal.from("0.037").roundToStep(Decimal.zero()).toString()).toBe("0.037");
		});

		it("is idempotent", () => {
			fc.assert(
				fc.property(fc.integer({ min: 0, max: 10_000_000 }), (n) => {
					const v = Decimal.from(n).div(Decimal.from(100_000));
					const once = v.roundToStep(step);
					expect(once.roundToStep(step).eq(once)).toBe(true);
				}),
			);
		});
	});

	describe("comparison", () => {
		const a = Decimal.from("1.5");
		const b = Decimal.from("2.5");

		it("orders values", () => {
			expect(a.lt(b)).toBe(true);
			expect(a.lte(Decimal.from("1.50"))).toBe(true);
			expect(b.gt(a)).toBe(true);
			expect(b.gte(b)).toBe(true);
			expect(a.eq(Decimal.from("1.500"))).toBe(true);
		});

		it("sign predicates", () => {
			expect(Decimal.zero().isZero()).toBe(true);
			expect(a.isPositive()).toBe(true);
			expect(a.neg().isNegative()).toBe(true);
		});

		it("min and max", () => {
			expect(Decimal.min(a, b)).toBe(a);
			expect(Decimal.max(a, b)).toBe(b);
		});
	});

	describe("conversion", () => {
		it("toFixed truncates to the requested places", () => {
			expect(Decimal.from("1.23456").toFixed(2)).toBe("1.23");
			expect(Decimal.from("-0.5").toFixed(3)).toBe("-0.500");
			expect(Decimal.from("7.9").toFixed(0)).toBe("7");
		});

		it("serializes to a JSON string", () => {
			expect(JSON.stringify({ volume: Decimal.from("0.05") })).toBe('{"volume":"0.05"}');
		});

		it("toNumber", () => {
			expect(Decimal.from("0.25").toNumber()).toBe(0.25);
		});
	});

	it("addition commutes", () => {
		fc.assert(
			fc.property(fc.integer(), fc.integer(), (x, y) => {
				const a = Decimal.from(x).div(Decimal.from(1000));
				const b = Decimal.from(y).div(Decimal.from(1000));
				expect(a.add(b).eq(b.add(a))).toBe(true);
			}),
		);
	});
});
