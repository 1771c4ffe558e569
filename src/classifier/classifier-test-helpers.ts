import type { MirroredPosition } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import { instrumentId, positionId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { type ExecutionEvent, ExecutionKind, type LedgerReader } from "./types.js";

/** EURUSD fill on master position 5001. */
export function makeEvent(overrides: Partial<ExecutionEvent> = {}): ExecutionEvent {
	return {
		masterPositionId: positionId(5001),
		instrumentId: instrumentId(1),
		kind: ExecutionKind.OrderFilled,
		side: TradeSide.Long,
		volumeDelta: Decimal.from("0.1"),
		resultingMasterVolume: Decimal.from("0.1"),
		timestamp: 1_000,
		sequenceNo: 1,
		...overrides,
	};
}

export function ledgerOf(...positions: MirroredPosition[]): LedgerReader {
	const byId = new Map(positions.map((p) => [p.masterPositionId, p]));
	return { get: (id) => byId.get(id) ?? null };
}

export const EMPTY_LEDGER: LedgerReader = { get: () => null };
