import type { ExecutionEvent } from "../classifier/types.js";
import type { OrderConfirmation, OrderRequest } from "../dispatch/types.js";
import type { TypedEmitter } from "../lib/events/index.js";
import type { LivePosition } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { InstrumentSpec } from "../symbols/types.js";

/** Latest bid/ask for one instrument, in price units. Either side may be missing. */
export interface SpotQuote {
	readonly instrumentId: InstrumentId;
	readonly bid: Decimal | null;
	readonly ask: Decimal | null;
	readonly receivedAt: number;
}

export interface TraderInfo {
	readonly accountId: AccountId;
	readonly balance: Decimal;
	readonly depositAssetId: number;
}

export interface TransportEvents {
	execution: (accountId: AccountId, event: ExecutionEvent) => void;
	spot: (accountId: AccountId, quote: SpotQuote) => void;
	disconnect: (reason: string) => void;
	/** Undecodable frames and unsolicited venue errors */
	error: (error: TradingError) => void;
}

/**
 * One shared Open API connection carrying both accounts. Volumes cross this
 * boundary in lots; conversion to venue units happens inside.
 */
export interface OpenApiTransport {
	readonly events: TypedEmitter<TransportEvents>;
	connect(): Promise<Result<void, TradingError>>;
	authenticateApplication(clientId: string, clientSecret: string): Promise<Result<void, TradingError>>;
	authorizeAccount(accountId: AccountId, accessToken: string): Promise<Result<void, TradingError>>;
	/** Start forwarding this account's execution events on `events`. */
	subscribeExecutionEvents(accountId: AccountId): Promise<Result<void, TradingError>>;
	subscribeSpots(
		accountId: AccountId,
		instrumentIds: readonly InstrumentId[],
	): Promise<Result<void, TradingError>>;
	sendOrder(
		accountId: AccountId,
		request: OrderRequest,
	): Promise<Result<OrderConfirmation, TradingError>>;
	queryOpenPositions(accountId: AccountId): Promise<Result<LivePosition[], TradingError>>;
	queryTrader(accountId: AccountId): Promise<Result<TraderInfo, TradingError>>;
	queryBalance(accountId: AccountId): Promise<Result<Decimal, TradingError>>;
	querySymbols(accountId: AccountId): Promise<Result<InstrumentSpec[], TradingError>>;
	close(): void;
}
