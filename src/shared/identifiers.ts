/**
 * Domain primitive identifiers: branded numbers for compile-time safety.
 *
 * The venue identifies accounts, positions and symbols by integers. Branding
 * keeps a master position id from being passed where a symbol id is expected.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Venue-assigned position identifier (master or slave). */
export type PositionId = Brand<number, "PositionId">;
/** Numeric symbol identifier in one broker's catalog. */
export type InstrumentId = Brand<number, "InstrumentId">;
/** Trading account identifier (ctidTraderAccountId). */
export type AccountId = Brand<number, "AccountId">;

function createBrandedId<B extends string>(value: number, label: B): Brand<number, B> {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new Error(`${label} must be a positive integer, got ${value}`);
	}
	return value as Brand<number, B>;
}

export function positionId(value: number): PositionId {
	return createBrandedId(value, "PositionId");
}

export function instrumentId(value: number): InstrumentId {
	return createBrandedId(value, "InstrumentId");
}

export function accountId(value: number): AccountId {
	return createBrandedId(value, "AccountId");
}

/** Extract the raw number from any branded identifier type. */
export function idToNumber(id: PositionId | InstrumentId | AccountId): number {
	return id;
}
