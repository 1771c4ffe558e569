/**
 * Execution event classifier: turns one master execution into a CopyDecision.
 *
 * The ledger is only read here. The sequence tracker is the classifier's
 * own state.
 */

import type { MirroredPosition } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { SequenceTracker } from "./sequence-tracker.js";
import {
	type CopyDecision,
	DecisionAction,
	type ExecutionEvent,
	ExecutionKind,
	type LedgerReader,
	POSITION_IMPACTING_KINDS,
	type SkipDecision,
	SkipReason,
} from "./types.js";

export interface EventClassifierConfig {
	/** Lot step of a slave instrument, or null when unknown */
	readonly lotStepOf: (slaveInstrument: InstrumentId) => Decimal | null;
}

function skip(event: ExecutionEvent, reason: SkipReason): SkipDecision {
	return {
		action: DecisionAction.Skip,
		instrumentId: event.instrumentId,
		masterPositionId: event.masterPositionId,
		sequenceNo: event.sequenceNo,
		timestamp: event.timestamp,
		requestedSlaveVolume: null,
		reason,
	};
}

export class EventClassifier {
	private readonly config: EventClassifierConfig;
	private readonly sequences = new SequenceTracker();

	constructor(config: EventClassifierConfig) {
		this.config = config;
	}

	/** Forget sequence expectations; called when a new connection epoch starts. */
	resetSequences(): void {
		this.sequences.reset();
	}

	classify(event: ExecutionEvent, ledger: LedgerReader): CopyDecision {
		const check = this.sequences.observe(event.instrumentId, event.sequenceNo);
		if (check === "duplicate") return skip(event, SkipReason.Duplicate);
		if (check === "out_of_order") return skip(event, SkipReason.OutOfOrder);

		if (!POSITION_IMPACTING_KINDS.has(event.kind)) {
			return skip(event, SkipReason.NotPositionImpacting);
		}

		const entry = ledger.get(event.masterPositionId);
		return entry ? this.classifyKnown(event, entry) : this.classifyUnknown(event);
	}

	private classifyUnknown(event: ExecutionEvent): CopyDecision {
		const base = {
			instrumentId: event.instrumentId,
			masterPositionId: event.masterPositionId,
			sequenceNo: event.sequenceNo,
			timestamp: event.timestamp,
		};
		const resulting = event.resultingMasterVolume;

		if (resulting.isZero() || event.kind === ExecutionKind.PositionClosed) {
			return {
				...base,
				action: DecisionAction.Close,
				requestedSlaveVolume: null,
				reason: "unknown_position",
			};
		}
		if (resulting.eq(event.volumeDelta)) {
			return {
				...base,
				action: DecisionAction.Open,
				side: event.side,
				masterVolume: resulting,
				requestedSlaveVolume: null,
				stillFilling: event.kind === ExecutionKind.OrderPartiallyFilled,
				reason: "new_position",
			};
		}
		if (resulting.lt(event.volumeDelta)) {
			return {
				...base,
				action: DecisionAction.Adjust,
				newMasterVolume: resulting,
				requestedSlaveVolume: null,
				reason: "unknown_position",
			};
		}
		// Scaling into a position opened before tracking started.
		return skip(event, SkipReason.UntrackedPosition);
	}

	private classifyKnown(event: ExecutionEvent, entry: MirroredPosition): CopyDecision {
		const base = {
			instrumentId: event.instrumentId,
			masterPositionId: event.masterPositionId,
			sequenceNo: event.sequenceNo,
			timestamp: event.timestamp,
		};
		const resulting = event.resultingMasterVolume;

		if (resulting.isZero()) {
			return {
				...base,
				action: DecisionAction.Close,
				requestedSlaveVolume: entry.slaveVolume,
				reason: "full_close",
			};
		}
		if (resulting.eq(entry.masterVolume)) return skip(event, SkipReason.NoVolumeChange);
		if (resulting.gt(entry.masterVolume)) {
			// Scaling in is not mirrored; only the rest of a partially filled opening order is.
			if (!entry.stillFilling || event.kind === ExecutionKind.PositionClosed) {
				return skip(event, SkipReason.VolumeIncrease);
			}
			return {
				...base,
				action: DecisionAction.Increase,
				side: entry.side,
				newMasterVolume: resulting,
				requestedSlaveVolume: null,
				stillFilling: event.kind === ExecutionKind.OrderPartiallyFilled,
				reason: "opening_fill",
			};
		}

		const target = this.proportionalSlaveVolume(entry, resulting);
		if (target === null) {
			return {
				...base,
				action: DecisionAction.Close,
				requestedSlaveVolume: entry.slaveVolume,
				reason: "remainder_below_step",
			};
		}
		return {
			...base,
			action: DecisionAction.Adjust,
			newMasterVolume: resulting,
			requestedSlaveVolume: target,
			reason: "partial_close",
		};
	}

	/**
	 * resulting / openMaster × openSlave, on the slave lot step. Null when
	 * less than one step would remain.
	 */
	private proportionalSlaveVolume(entry: MirroredPosition, resulting: Decimal): Decimal | null {
		if (!entry.openMasterVolume.isPositive()) return null;
		const raw = resulting.div(entry.openMasterVolume).mul(entry.openSlaveVolume);
		const step = this.config.lotStepOf(entry.slaveInstrumentId);
		const target = step ? raw.roundToStep(step) : raw;
		return target.isPositive() ? target : null;
	}
}
