/**
 * TradeSide: direction of a position and of the order that opens it.
 *
 * A long position is opened with a buy and reduced with a sell; the venue's
 * close request takes care of the opposite leg, so the mirror only ever
 * needs the opening direction.
 */

export const TradeSide = {
	Long: "long",
	Short: "short",
} as const;

export type TradeSide = (typeof TradeSide)[keyof typeof TradeSide];

/** Venue wire value for the side (1 = BUY, 2 = SELL). */
export function tradeSideToWire(side: TradeSide): 1 | 2 {
	return side === TradeSide.Long ? 1 : 2;
}

export function tradeSideFromWire(value: number): TradeSide | null {
	if (value === 1) return TradeSide.Long;
	if (value === 2) return TradeSide.Short;
	return null;
}
