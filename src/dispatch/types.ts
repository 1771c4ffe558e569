import type { DecisionAction } from "../classifier/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { ErrorKind, TradingError } from "../shared/errors.js";
import type { InstrumentId, PositionId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { TradeSide } from "../shared/trade-side.js";

// ── Requests ────────────────────────────────────────────────────────

/** Market order opening a new slave position, or adding to one. */
export interface MarketOrderRequest {
	readonly kind: "market";
	/** Slave-side instrument */
	readonly instrumentId: InstrumentId;
	readonly side: TradeSide;
	readonly volume: Decimal;
	readonly comment: string;
	readonly attemptNo: number;
	/** Existing slave position to increase */
	readonly slavePositionId?: PositionId;
}

/** Full or partial close of an existing slave position. */
export interface ClosePositionRequest {
	readonly kind: "close";
	readonly instrumentId: InstrumentId;
	readonly slavePositionId: PositionId;
	readonly volume: Decimal;
	readonly attemptNo: number;
}

export type OrderRequest = MarketOrderRequest | ClosePositionRequest;

/** What the venue reports once it has filled the request. */
export interface OrderConfirmation {
	readonly slavePositionId: PositionId;
	/** Filled volume in lots */
	readonly volume: Decimal;
}

/**
 * Slave-account operations the dispatcher needs. The session coordinator
 * implements this over its single transport.
 */
export interface SlaveGateway {
	sendOrder(request: OrderRequest): Promise<Result<OrderConfirmation, TradingError>>;
	queryBalance(): Promise<Result<Decimal, TradingError>>;
}

// ── Outcomes ────────────────────────────────────────────────────────

export interface OrderOutcome {
	readonly action: DecisionAction;
	readonly masterPositionId: PositionId;
	readonly accepted: boolean;
	readonly slavePositionId: PositionId | null;
	/** Volume sent to the venue; null when no order went out */
	readonly volume: Decimal | null;
	readonly errorKind: ErrorKind | null;
	readonly error: TradingError | null;
	/** Requests sent, retries included */
	readonly attempts: number;
}
