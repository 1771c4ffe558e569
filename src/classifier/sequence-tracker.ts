import type { InstrumentId } from "../shared/identifiers.js";

export type SequenceCheck = "new" | "duplicate" | "out_of_order";

/**
 * Last processed sequence number per instrument. Delivery order is only
 * trusted within one connection epoch, so the coordinator calls `reset()`
 * on every reconnect.
 */
export class SequenceTracker {
	private readonly last = new Map<InstrumentId, number>();

	/** Check `sequenceNo` and record it when it is new. */
	observe(instrument: InstrumentId, sequenceNo: number): SequenceCheck {
		const previous = this.last.get(instrument);
		if (previous !== undefined) {
			if (sequenceNo === previous) return "duplicate";
			if (sequenceNo < previous) return "out_of_order";
		}
		this.last.set(instrument, sequenceNo);
		return "new";
	}

	reset(): void {
		this.last.clear();
	}
}
