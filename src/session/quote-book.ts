import { Decimal } from "../shared/decimal.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import type { SpotQuote } from "../transport/types.js";

const TWO = Decimal.from(2);

/**
 * Latest spot quote per (account, instrument). Spot events may carry only
 * one side; the missing side keeps its previous value.
 */
export class QuoteBook {
	private readonly quotes = new Map<string, SpotQuote>();

	private static key(account: AccountId, instrument: InstrumentId): string {
		return `${account}:${instrument}`;
	}

	update(account: AccountId, quote: SpotQuote): void {
		const key = QuoteBook.key(account, quote.instrumentId);
		const previous = this.quotes.get(key);
		this.quotes.set(key, {
			instrumentId: quote.instrumentId,
			bid: quote.bid ?? previous?.bid ?? null,
			ask: quote.ask ?? previous?.ask ?? null,
			receivedAt: quote.receivedAt,
		});
	}

	get(account: AccountId, instrument: InstrumentId): SpotQuote | null {
		return this.quotes.get(QuoteBook.key(account, instrument)) ?? null;
	}

	/** (bid + ask) / 2, or the one side that is known; null with no quote. */
	mid(account: AccountId, instrument: InstrumentId): Decimal | null {
		const quote = this.get(account, instrument);
		if (!quote) return null;
		if (quote.bid && quote.ask) return quote.bid.add(quote.ask).div(TWO);
		return quote.bid ?? quote.ask;
	}

	get size(): number {
		return this.quotes.size;
	}

	clear(): void {
		this.quotes.clear();
	}
}
