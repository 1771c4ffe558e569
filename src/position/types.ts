import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId, PositionId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/trade-side.js";

/** One master position and the slave position that mirrors it. */
export interface MirroredPosition {
	/** Master-side instrument */
	readonly instrumentId: InstrumentId;
	readonly slaveInstrumentId: InstrumentId;
	readonly masterPositionId: PositionId;
	/** Null until the slave order is confirmed */
	readonly slavePositionId: PositionId | null;
	readonly side: TradeSide;
	readonly masterVolume: Decimal;
	readonly slaveVolume: Decimal;
	/** Volumes at open time; partial closes scale from these */
	readonly openMasterVolume: Decimal;
	readonly openSlaveVolume: Decimal;
	readonly openedAt: number;
	/** The master's opening order has reported a partial fill and no final fill yet */
	readonly stillFilling: boolean;
}

/** An open position as reported by the venue for one account. */
export interface LivePosition {
	readonly positionId: PositionId;
	readonly instrumentId: InstrumentId;
	readonly side: TradeSide;
	readonly volume: Decimal;
	readonly openedAt: number;
	readonly comment: string | null;
}
