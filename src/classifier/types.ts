/**
 * Execution event and copy decision types.
 *
 * The classifier reads the ledger through `LedgerReader` only, so it can be
 * driven from a plain map in tests.
 */

import type { MirroredPosition } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId, PositionId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/trade-side.js";

// ── Execution events ────────────────────────────────────────────────

export const ExecutionKind = {
	OrderFilled: "order_filled",
	OrderPartiallyFilled: "order_partially_filled",
	PositionClosed: "position_closed",
	OrderAccepted: "order_accepted",
	OrderRejected: "order_rejected",
	OrderCancelled: "order_cancelled",
	OrderExpired: "order_expired",
	OrderReplaced: "order_replaced",
	Swap: "swap",
	DepositWithdraw: "deposit_withdraw",
	Other: "other",
} as const;

export type ExecutionKind = (typeof ExecutionKind)[keyof typeof ExecutionKind];

/** Kinds that change a position's volume. */
export const POSITION_IMPACTING_KINDS: ReadonlySet<ExecutionKind> = new Set([
	ExecutionKind.OrderFilled,
	ExecutionKind.OrderPartiallyFilled,
	ExecutionKind.PositionClosed,
]);

/** A master-account execution notification, normalized from the wire. */
export interface ExecutionEvent {
	readonly masterPositionId: PositionId;
	/** Master-side instrument */
	readonly instrumentId: InstrumentId;
	readonly kind: ExecutionKind;
	/** Side of the position, not of the order that changed it */
	readonly side: TradeSide;
	/** Volume filled by this execution, in lots */
	readonly volumeDelta: Decimal;
	/** Master position volume after this execution, in lots */
	readonly resultingMasterVolume: Decimal;
	readonly timestamp: number;
	/** Venue deal id; increases with every execution */
	readonly sequenceNo: number;
}

// ── Copy decisions ──────────────────────────────────────────────────

export const DecisionAction = {
	Open: "open",
	Increase: "increase",
	Adjust: "adjust",
	Close: "close",
	Skip: "skip",
} as const;

export type DecisionAction = (typeof DecisionAction)[keyof typeof DecisionAction];

export const SkipReason = {
	Duplicate: "duplicate",
	OutOfOrder: "out_of_order",
	NotPositionImpacting: "not_position_impacting",
	NoVolumeChange: "no_volume_change",
	VolumeIncrease: "volume_increase",
	UntrackedPosition: "untracked_position",
} as const;

export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

interface DecisionBase {
	readonly instrumentId: InstrumentId;
	readonly masterPositionId: PositionId;
	readonly sequenceNo: number;
	readonly timestamp: number;
}

/** Open a slave copy. The volume is filled in by the volume calculator. */
export interface OpenDecision extends DecisionBase {
	readonly action: typeof DecisionAction.Open;
	readonly side: TradeSide;
	readonly masterVolume: Decimal;
	readonly requestedSlaveVolume: Decimal | null;
	/** Opened by a partial fill; later fills of the same order top the copy up */
	readonly stillFilling: boolean;
	readonly reason: "new_position" | "reconcile_unpaired";
}

/**
 * A further fill of the order that opened a tracked position. The engine
 * fills in the slave volume to add.
 */
export interface IncreaseDecision extends DecisionBase {
	readonly action: typeof DecisionAction.Increase;
	readonly side: TradeSide;
	readonly newMasterVolume: Decimal;
	readonly requestedSlaveVolume: Decimal | null;
	/** False once the master reports the order fully filled */
	readonly stillFilling: boolean;
	readonly reason: "opening_fill";
}

/** Partial close: bring the slave down to `requestedSlaveVolume`. */
export interface AdjustDecision extends DecisionBase {
	readonly action: typeof DecisionAction.Adjust;
	readonly newMasterVolume: Decimal;
	/** Null when the position is not in the ledger */
	readonly requestedSlaveVolume: Decimal | null;
	readonly reason: "partial_close" | "unknown_position";
}

export interface CloseDecision extends DecisionBase {
	readonly action: typeof DecisionAction.Close;
	/** Null when the position is not in the ledger */
	readonly requestedSlaveVolume: Decimal | null;
	readonly reason: "full_close" | "remainder_below_step" | "unknown_position";
}

export interface SkipDecision extends DecisionBase {
	readonly action: typeof DecisionAction.Skip;
	readonly requestedSlaveVolume: null;
	readonly reason: SkipReason;
}

export type CopyDecision =
	| OpenDecision
	| IncreaseDecision
	| AdjustDecision
	| CloseDecision
	| SkipDecision;

// ── Slim collaborators ──────────────────────────────────────────────

/** Read side of the position ledger. */
export interface LedgerReader {
	get(masterPositionId: PositionId): MirroredPosition | null;
}
