/**
 * Instrument fixtures shared by tests. Master and slave number their
 * symbols differently and the slave lists gold as "GOLD".
 */

import { Decimal } from "../shared/decimal.js";
import { instrumentId } from "../shared/identifiers.js";
import { SymbolMapper } from "./symbol-mapper.js";
import { Broker, type InstrumentSpec, type SymbolCatalog } from "./types.js";

export const ASSET = { EUR: 1, USD: 2, JPY: 3, XAU: 4 } as const;

export function makeSpec(overrides: Partial<InstrumentSpec> & Pick<InstrumentSpec, "id" | "name">): InstrumentSpec {
	return {
		digits: 5,
		pipPosition: 4,
		lotSize: 10_000_000,
		lotStep: Decimal.from("0.01"),
		minVolume: Decimal.from("0.01"),
		baseAssetId: ASSET.EUR,
		quoteAssetId: ASSET.USD,
		...overrides,
	};
}

export const MASTER_EURUSD = makeSpec({ id: instrumentId(1), name: "EURUSD" });
export const MASTER_USDJPY = makeSpec({
	id: instrumentId(3),
	name: "USDJPY",
	digits: 3,
	pipPosition: 2,
	baseAssetId: ASSET.USD,
	quoteAssetId: ASSET.JPY,
});
export const MASTER_XAUUSD = makeSpec({
	id: instrumentId(41),
	name: "XAUUSD",
	digits: 2,
	pipPosition: 1,
	lotSize: 10_000,
	baseAssetId: ASSET.XAU,
});

export const SLAVE_EURUSD = makeSpec({ id: instrumentId(101), name: "EURUSD" });
export const SLAVE_USDJPY = makeSpec({
	id: instrumentId(103),
	name: "usdjpy ",
	digits: 3,
	pipPosition: 2,
	baseAssetId: ASSET.USD,
	quoteAssetId: ASSET.JPY,
});
export const SLAVE_GOLD = makeSpec({
	id: instrumentId(141),
	name: "GOLD",
	digits: 2,
	pipPosition: 1,
	lotSize: 10_000,
	lotStep: Decimal.from("0.1"),
	minVolume: Decimal.from("0.1"),
	baseAssetId: ASSET.XAU,
});

export const MASTER_CATALOG: SymbolCatalog = {
	broker: Broker.Master,
	depositAssetId: ASSET.USD,
	instruments: [MASTER_EURUSD, MASTER_USDJPY, MASTER_XAUUSD],
};

export const SLAVE_CATALOG: SymbolCatalog = {
	broker: Broker.Slave,
	depositAssetId: ASSET.USD,
	instruments: [SLAVE_EURUSD, SLAVE_USDJPY, SLAVE_GOLD],
};

export const GOLD_ALIASES: ReadonlyMap<string, string> = new Map([["XAUUSD", "GOLD"]]);

/** A mapper with both fixture catalogs loaded. */
export function loadedMapper(aliases: ReadonlyMap<string, string> = GOLD_ALIASES): SymbolMapper {
	const mapper = new SymbolMapper(aliases);
	mapper.loadCatalog(MASTER_CATALOG);
	mapper.loadCatalog(SLAVE_CATALOG);
	return mapper;
}
