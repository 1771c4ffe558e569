import { Decimal } from "../shared/decimal.js";
import { instrumentId, positionId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import type { LivePosition, MirroredPosition } from "./types.js";

/** EURUSD pair: master 0.10 lot mirrored at 0.05 lot. */
export function makeMirrored(overrides: Partial<MirroredPosition> = {}): MirroredPosition {
	return {
		instrumentId: instrumentId(1),
		slaveInstrumentId: instrumentId(101),
		masterPositionId: positionId(5001),
		slavePositionId: positionId(9001),
		side: TradeSide.Long,
		masterVolume: Decimal.from("0.1"),
		slaveVolume: Decimal.from("0.05"),
		openMasterVolume: Decimal.from("0.1"),
		openSlaveVolume: Decimal.from("0.05"),
		openedAt: 1_000,
		stillFilling: false,
		...overrides,
	};
}

export function makeLive(
	id: number,
	instrument: number,
	volume: string,
	overrides: Partial<LivePosition> = {},
): LivePosition {
	return {
		positionId: positionId(id),
		instrumentId: instrumentId(instrument),
		side: TradeSide.Long,
		volume: Decimal.from(volume),
		openedAt: 1_000,
		comment: null,
		...overrides,
	};
}
