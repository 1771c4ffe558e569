import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { instrumentId } from "../shared/identifiers.js";
import {
	ASSET,
	MASTER_EURUSD,
	MASTER_USDJPY,
	MASTER_XAUUSD,
	makeSpec,
} from "../symbols/symbol-test-helpers.js";
import { pipSize, pipValuePerLot, unitsPerLot } from "./pip-value.js";

describe("pipSize", () => {
	it("is 10^-pipPosition", () => {
		expect(pipSize(4).toString()).toBe("0.0001");
		expect(pipSize(2).toString()).toBe("0.01");
		expect(pipSize(0).toString()).toBe("1");
	});
});

describe("pipValuePerLot", () => {
	it("uses pipSize × units when the deposit currency is the quote currency", () => {
		expect(unitsPerLot(MASTER_EURUSD).toString()).toBe("100000");
		expect(pipValuePerLot(MASTER_EURUSD, ASSET.USD, null)?.toString()).toBe("10");
		expect(pipValuePerLot(MASTER_XAUUSD, ASSET.USD, null)?.toString()).toBe("10");
	});

	it("converts through the mid price when the deposit currency is the base currency", () => {
		const value = pipValuePerLot(MASTER_USDJPY, ASSET.USD, Decimal.from("125"));
		expect(value?.toString()).toBe("8");
	});

	it("needs a mid price for base-currency conversion", () => {
		expect(pipValuePerLot(MASTER_USDJPY, ASSET.USD, null)).toBeNull();
		expect(pipValuePerLot(MASTER_USDJPY, ASSET.USD, Decimal.zero())).toBeNull();
	});

	it("has no value for crosses or an unknown deposit asset", () => {
		const eurjpy = makeSpec({
			id: instrumentId(9),
			name: "EURJPY",
			pipPosition: 2,
			baseAssetId: ASSET.EUR,
			quoteAssetId: ASSET.JPY,
		});
		expect(pipValuePerLot(eurjpy, ASSET.USD, Decimal.from("160"))).toBeNull();
		expect(pipValuePerLot(MASTER_EURUSD, null, Decimal.from("1.1"))).toBeNull();
	});
});
