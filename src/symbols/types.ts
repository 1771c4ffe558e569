import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";

/** Which side of the mirror a catalog or id belongs to. */
export const Broker = {
	Master: "master",
	Slave: "slave",
} as const;

export type Broker = (typeof Broker)[keyof typeof Broker];

/**
 * Contract specification of one instrument in one broker's catalog.
 * Volumes are in lots; `lotSize` is the venue's integer volume per lot.
 */
export interface InstrumentSpec {
	readonly id: InstrumentId;
	readonly name: string;
	readonly digits: number;
	readonly pipPosition: number;
	/** Venue volume units per lot (hundredths of a base unit) */
	readonly lotSize: number;
	readonly lotStep: Decimal;
	readonly minVolume: Decimal;
	readonly baseAssetId: number;
	readonly quoteAssetId: number;
}

export interface SymbolCatalog {
	readonly broker: Broker;
	/** Asset the account balance is held in; null until the trader query returns */
	readonly depositAssetId: number | null;
	readonly instruments: readonly InstrumentSpec[];
}
