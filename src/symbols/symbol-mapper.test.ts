import { describe, expect, it } from "vitest";
import { NotFoundError } from "../shared/errors.js";
import { idToNumber, instrumentId } from "../shared/identifiers.js";
import { SymbolMapper, normalizeSymbolName } from "./symbol-mapper.js";
import {
	MASTER_CATALOG,
	MASTER_EURUSD,
	MASTER_USDJPY,
	MASTER_XAUUSD,
	SLAVE_CATALOG,
	SLAVE_GOLD,
	loadedMapper,
} from "./symbol-test-helpers.js";
import { Broker } from "./types.js";

describe("SymbolMapper", () => {
	it("maps same-named symbols across catalogs", () => {
		const result = loadedMapper().resolve(MASTER_EURUSD.id, Broker.Master, Broker.Slave);
		expect(result.ok && idToNumber(result.value)).toBe(101);
	});

	it("ignores case and surrounding whitespace", () => {
		const result = loadedMapper().resolve(MASTER_USDJPY.id, Broker.Master, Broker.Slave);
		expect(result.ok && idToNumber(result.value)).toBe(103);
	});

	it("follows aliases in both directions", () => {
		const mapper = loadedMapper();
		const forward = mapper.resolve(MASTER_XAUUSD.id, Broker.Master, Broker.Slave);
		expect(forward.ok && idToNumber(forward.value)).toBe(141);
		const back = mapper.resolve(SLAVE_GOLD.id, Broker.Slave, Broker.Master);
		expect(back.ok && idToNumber(back.value)).toBe(41);
	});

	it("returns the source spec when source and target are the same broker", () => {
		const result = loadedMapper().resolveSpec(MASTER_EURUSD.id, Broker.Master, Broker.Master);
		expect(result.ok && result.value).toBe(MASTER_EURUSD);
	});

	it("reports an unknown source id as NotFoundError", () => {
		const result = loadedMapper().resolve(instrumentId(999), Broker.Master, Broker.Slave);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(NotFoundError);
		expect(result.error.message).toBe("Instrument 999 is not in the master catalog");
	});

	it("reports a symbol missing on the target side", () => {
		const mapper = new SymbolMapper();
		mapper.loadCatalog(MASTER_CATALOG);
		mapper.loadCatalog(SLAVE_CATALOG);
		const result = mapper.resolve(MASTER_XAUUSD.id, Broker.Master, Broker.Slave);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.message).toBe("Symbol XAUUSD is not in the slave catalog");
	});

	it("is ready only once both catalogs are loaded", () => {
		const mapper = new SymbolMapper();
		expect(mapper.isReady).toBe(false);
		mapper.loadCatalog(MASTER_CATALOG);
		expect(mapper.isReady).toBe(false);
		expect(mapper.resolve(MASTER_EURUSD.id, Broker.Master, Broker.Slave).ok).toBe(false);
		mapper.loadCatalog(SLAVE_CATALOG);
		expect(mapper.isReady).toBe(true);
	});

	it("reloading a catalog replaces it", () => {
		const mapper = loadedMapper();
		mapper.loadCatalog({ ...SLAVE_CATALOG, instruments: [SLAVE_GOLD] });
		expect(mapper.resolve(MASTER_EURUSD.id, Broker.Master, Broker.Slave).ok).toBe(false);
		expect(mapper.catalog(Broker.Slave)?.instruments).toHaveLength(1);
	});

	it("finds specs by name", () => {
		expect(loadedMapper().findByName(Broker.Slave, " gold")).toBe(SLAVE_GOLD);
	});
});

describe("normalizeSymbolName", () => {
	it("trims and upper-cases", () => {
		expect(normalizeSymbolName(" eurUsd\t")).toBe("EURUSD");
	});
});
