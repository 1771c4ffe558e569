/**
 * Pip value per lot in the account's deposit currency.
 *
 * pipSize = 10^-pipPosition. When the deposit currency is the quote currency
 * one pip on one lot is worth pipSize × units-per-lot; when it is the base
 * currency the value is converted through the mid price. Crosses with neither
 * leg in the deposit currency have no pip value here.
 */

import { Decimal } from "../shared/decimal.js";
import type { InstrumentSpec } from "../symbols/types.js";

const HUNDRED = Decimal.from(100);
const TEN = Decimal.from(10);

export function pipSize(pipPosition: number): Decimal {
	let size = Decimal.one();
	for (let i = 0; i < pipPosition; i++) size = size.div(TEN);
	return size;
}

/** Units of the base asset in one lot (`lotSize` is in hundredths). */
export function unitsPerLot(spec: InstrumentSpec): Decimal {
	return Decimal.from(spec.lotSize).div(HUNDRED);
}

/**
 * @param depositAssetId - null when the account's deposit asset is not known yet
 * @param mid - current mid price, needed only when the deposit asset is the base asset
 */
export function pipValuePerLot(
	spec: InstrumentSpec,
	depositAssetId: number | null,
	mid: Decimal | null,
): Decimal | null {
	if (depositAssetId === null) return null;
	const perUnit = pipSize(spec.pipPosition);

	if (spec.quoteAssetId === depositAssetId) {
		return perUnit.mul(unitsPerLot(spec));
	}
	if (spec.baseAssetId === depositAssetId && mid !== null && mid.isPositive()) {
		return perUnit.div(mid).mul(unitsPerLot(spec));
	}
	return null;
}
