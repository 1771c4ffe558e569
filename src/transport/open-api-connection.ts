/**
 * OpenApiConnection: Open API JSON protocol over one websocket.
 *
 * Requests carry a generated clientMsgId and settle when a frame with the
 * same id arrives, or fail after `requestTimeoutMs`. A heartbeat frame goes
 * out every `heartbeatIntervalMs` while connected. Lot sizes learned from
 * querySymbols drive every lot ⇄ venue-unit conversion.
 */

import type { OrderConfirmation, OrderRequest } from "../dispatch/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { WsClientLike } from "../lib/websocket/index.js";
import { validate } from "../lib/validation/index.js";
import type { LivePosition } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import {
	AuthError,
	NotFoundError,
	RateLimitError,
	RejectedOrderError,
	TimeoutError,
	type TradingError,
	TransportError,
} from "../shared/errors.js";
import { type AccountId, type InstrumentId, positionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { tradeSideToWire } from "../shared/trade-side.js";
import type { InstrumentSpec } from "../symbols/types.js";
import {
	type ErrorPayload,
	type Frame,
	type LotSizeLookup,
	decodeExecutionEvent,
	decodeFrame,
	decodeInstruments,
	decodePositions,
	decodeSpot,
	decodeTrader,
	errorPayloadSchema,
	lotsToUnits,
	parseExecutionPayload,
	symbolByIdResSchema,
	symbolsListResSchema,
	unitsToLots,
} from "./codec.js";
import {
	AUTH_ERROR_CODES,
	ExecutionType,
	NOT_FOUND_ERROR_CODES,
	OrderType,
	PayloadType,
	RATE_LIMIT_ERROR_CODE,
} from "./protocol.js";
import type { OpenApiTransport, TraderInfo, TransportEvents } from "./types.js";

export interface OpenApiConnectionOptions {
	readonly client: WsClientLike;
	readonly requestTimeoutMs: number;
	readonly heartbeatIntervalMs: number;
	readonly logger: Logger;
	readonly clock?: Clock;
}

/** Settles a pending request from a correlated frame; null keeps waiting. */
type FrameMatcher<T> = (frame: Frame) => Result<T, TradingError> | null;

interface PendingRequest {
	readonly payloadType: number;
	readonly settle: (frame: Frame) => boolean;
	readonly fail: (error: TradingError) => void;
	readonly timer: ReturnType<typeof setTimeout>;
}

/** Back-off suggested by the venue's frequency limit, in ms. */
const RATE_LIMIT_RETRY_MS = 1_000;

/** Map a venue error code to the error hierarchy. */
export function errorFromPayload(payload: ErrorPayload): TradingError {
	const message = payload.description ?? payload.errorCode;
	const context = { errorCode: payload.errorCode };
	if (AUTH_ERROR_CODES.has(payload.errorCode)) return new AuthError(message, context);
	if (NOT_FOUND_ERROR_CODES.has(payload.errorCode)) return new NotFoundError(message, context);
	if (payload.errorCode === RATE_LIMIT_ERROR_CODE) {
		return new RateLimitError(message, RATE_LIMIT_RETRY_MS, context);
	}
	return new RejectedOrderError(message, payload.errorCode, context);
}

function isErrorFrame(frame: Frame): boolean {
	return frame.payloadType === PayloadType.ErrorRes || frame.payloadType === PayloadType.OrderErrorEvent;
}

export class OpenApiConnection implements OpenApiTransport {
	readonly events = new TypedEmitter<TransportEvents>();
	private readonly client: WsClientLike;
	private readonly requestTimeoutMs: number;
	private readonly heartbeatIntervalMs: number;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly pending = new Map<string, PendingRequest>();
	private readonly executionAccounts = new Map<number, AccountId>();
	private readonly lotSizes = new Map<number, Map<number, number>>();
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private nextMsgId = 1;
	private closing = false;

	constructor(options: OpenApiConnectionOptions) {
		this.client = options.client;
		this.requestTimeoutMs = options.requestTimeoutMs;
		this.heartbeatIntervalMs = options.heartbeatIntervalMs;
		this.logger = options.logger;
		this.clock = options.clock ?? SystemClock;
		this.client.events.on("message", (data) => this.handleMessage(data));
		this.client.events.on("close", (code, reason) => this.handleClose(code, reason));
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	async connect(): Promise<Result<void, TradingError>> {
		this.closing = false;
		this.executionAccounts.clear();
		try {
			await this.client.connect();
		} catch (error) {
			return err(
				error instanceof TransportError
					? error
					: new TransportError("Connection failed", {
							cause: error instanceof Error ? error.message : String(error),
						}),
			);
		}
		this.startHeartbeat();
		return ok(undefined);
	}

	close(): void {
		this.closing = true;
		this.stopHeartbeat();
		this.failPending(new TransportError("Connection closed"));
		this.client.close();
	}

	// ── Session setup ──────────────────────────────────────────────

	async authenticateApplication(
		clientId: string,
		clientSecret: string,
	): Promise<Result<void, TradingError>> {
		const result = await this.request(
			PayloadType.ApplicationAuthReq,
			{ clientId, clientSecret },
			PayloadType.ApplicationAuthRes,
		);
		return result.ok ? ok(undefined) : result;
	}

	async authorizeAccount(
		accountId: AccountId,
		accessToken: string,
	): Promise<Result<void, TradingError>> {
		const result = await this.request(
			PayloadType.AccountAuthReq,
			{ ctidTraderAccountId: accountId, accessToken },
			PayloadType.AccountAuthRes,
		);
		return result.ok ? ok(undefined) : result;
	}

	async subscribeExecutionEvents(accountId: AccountId): Promise<Result<void, TradingError>> {
		this.executionAccounts.set(accountId, accountId);
		return ok(undefined);
	}

	async subscribeSpots(
		accountId: AccountId,
		instrumentIds: readonly InstrumentId[],
	): Promise<Result<void, TradingError>> {
		if (instrumentIds.length === 0) return ok(undefined);
		const result = await this.request(
			PayloadType.SubscribeSpotsReq,
			{ ctidTraderAccountId: accountId, symbolId: [...instrumentIds] },
			PayloadType.SubscribeSpotsRes,
		);
		return result.ok ? ok(undefined) : result;
	}

	// ── Queries ────────────────────────────────────────────────────

	async querySymbols(accountId: AccountId): Promise<Result<InstrumentSpec[], TradingError>> {
		const listFrame = await this.request(
			PayloadType.SymbolsListReq,
			{ ctidTraderAccountId: accountId, includeArchivedSymbols: false },
			PayloadType.SymbolsListRes,
		);
		if (!listFrame.ok) return listFrame;
		const list = validate(symbolsListResSchema, listFrame.value.payload, "Malformed symbol list");
		if (!list.ok) return list;

		const ids = list.value.symbol.filter((s) => s.enabled !== false).map((s) => s.symbolId);
		if (ids.length === 0) return ok([]);

		const detailFrame = await this.request(
			PayloadType.SymbolByIdReq,
			{ ctidTraderAccountId: accountId, symbolId: ids },
			PayloadType.SymbolByIdRes,
		);
		if (!detailFrame.ok) return detailFrame;
		const details = validate(
			symbolByIdResSchema,
			detailFrame.value.payload,
			"Malformed symbol details",
		);
		if (!details.ok) return details;

		const specs = decodeInstruments(list.value, details.value);
		this.lotSizes.set(accountId, new Map(specs.map((s): [number, number] => [s.id, s.lotSize])));
		return ok(specs);
	}

	async queryOpenPositions(accountId: AccountId): Promise<Result<LivePosition[], TradingError>> {
		const frame = await this.request(
			PayloadType.ReconcileReq,
			{ ctidTraderAccountId: accountId },
			PayloadType.ReconcileRes,
		);
		if (!frame.ok) return frame;
		return decodePositions(frame.value.payload, this.lotSizeLookup(accountId));
	}

	async queryTrader(accountId: AccountId): Promise<Result<TraderInfo, TradingError>> {
		const frame = await this.request(
			PayloadType.TraderReq,
			{ ctidTraderAccountId: accountId },
			PayloadType.TraderRes,
		);
		if (!frame.ok) return frame;
		return decodeTrader(frame.value.payload);
	}

	async queryBalance(accountId: AccountId): Promise<Result<Decimal, TradingError>> {
		const trader = await this.queryTrader(accountId);
		return trader.ok ? ok(trader.value.balance) : trader;
	}

	// ── Orders ─────────────────────────────────────────────────────

	/**
	 * Resolves once the venue reports the order filled. Rejections,
	 * cancellations and expiries fail with RejectedOrderError.
	 */
	sendOrder(
		accountId: AccountId,
		request: OrderRequest,
	): Promise<Result<OrderConfirmation, TradingError>> {
		const lotSize = this.lotSizeLookup(accountId)(request.instrumentId);
		if (lotSize === null) {
			return Promise.resolve(
				err(
					new NotFoundError(`No lot size known for instrument ${request.instrumentId}`, {
						instrumentId: request.instrumentId,
					}),
				),
			);
		}
		const volume = lotsToUnits(request.volume, lotSize);

		const payload =
			request.kind === "market"
				? {
						ctidTraderAccountId: accountId,
						symbolId: request.instrumentId,
						orderType: OrderType.Market,
						tradeSide: tradeSideToWire(request.side),
						volume,
						comment: request.comment,
						...(request.slavePositionId === undefined ? {} : { positionId: request.slavePositionId }),
					}
				: {
						ctidTraderAccountId: accountId,
						positionId: request.slavePositionId,
						volume,
					};
		const payloadType =
			request.kind === "market" ? PayloadType.NewOrderReq : PayloadType.ClosePositionReq;

		return this.send(payloadType, payload, (frame) => {
			if (frame.payloadType !== PayloadType.ExecutionEvent) return null;
			const parsed = parseExecutionPayload(frame.payload);
			if (!parsed.ok) return parsed;
			const { executionType, position, deal, errorCode } = parsed.value;

			switch (executionType) {
				case ExecutionType.OrderFilled: {
					const filled = deal ? (deal.filledVolume ?? deal.volume) : volume;
					const id = position?.positionId ?? deal?.positionId;
					if (id === undefined) {
						return err(new TransportError("Fill reported without a position id"));
					}
					return ok({ slavePositionId: positionId(id), volume: unitsToLots(filled, lotSize) });
				}
				case ExecutionType.OrderRejected:
				case ExecutionType.OrderCancelled:
				case ExecutionType.OrderExpired:
					return err(
						new RejectedOrderError(`Order ${request.kind} not filled`, errorCode ?? "not_filled", {
							executionType,
						}),
					);
				default:
					return null;
			}
		});
	}

	// ── Request plumbing ───────────────────────────────────────────

	private request(
		payloadType: number,
		payload: Record<string, unknown>,
		responseType: number,
	): Promise<Result<Frame, TradingError>> {
		return this.send(payloadType, payload, (frame) =>
			frame.payloadType === responseType ? ok(frame) : null,
		);
	}

	private send<T>(
		payloadType: number,
		payload: Record<string, unknown>,
		match: FrameMatcher<T>,
	): Promise<Result<T, TradingError>> {
		const clientMsgId = `cm_${this.nextMsgId++}`;

		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				this.pending.delete(clientMsgId);
				resolve(
					err(
						new TimeoutError(`No response to payload ${payloadType} within ${this.requestTimeoutMs}ms`, {
							payloadType,
							clientMsgId,
						}),
					),
				);
			}, this.requestTimeoutMs);

			const finish = (result: Result<T, TradingError>) => {
				clearTimeout(timer);
				this.pending.delete(clientMsgId);
				resolve(result);
			};

			this.pending.set(clientMsgId, {
				payloadType,
				timer,
				fail: (error) => finish(err(error)),
				settle: (frame) => {
					if (isErrorFrame(frame)) {
						const parsed = validate(errorPayloadSchema, frame.payload, "Malformed error frame");
						finish(err(parsed.ok ? errorFromPayload(parsed.value) : parsed.error));
						return true;
					}
					const result = match(frame);
					if (result === null) return false;
					finish(result);
					return true;
				},
			});

			const sent = this.client.send(JSON.stringify({ clientMsgId, payloadType, payload }));
			if (!sent.ok) finish(sent);
		});
	}

	private failPending(error: TradingError): void {
		for (const request of [...this.pending.values()]) {
			request.fail(error);
		}
	}

	// ── Inbound ────────────────────────────────────────────────────

	private handleMessage(data: string): void {
		const decoded = decodeFrame(data);
		if (!decoded.ok) {
			this.events.emit("error", decoded.error);
			return;
		}
		const frame = decoded.value;
		if (frame.payloadType === PayloadType.Heartbeat) return;

		if (frame.clientMsgId !== undefined) {
			const request = this.pending.get(frame.clientMsgId);
			if (request?.settle(frame)) {
				if (frame.payloadType !== PayloadType.ExecutionEvent) return;
			}
		}

		switch (frame.payloadType) {
			case PayloadType.ExecutionEvent:
				this.routeExecution(frame);
				break;
			case PayloadType.SpotEvent:
				this.routeSpot(frame);
				break;
			case PayloadType.ErrorRes:
			case PayloadType.OrderErrorEvent: {
				const parsed = validate(errorPayloadSchema, frame.payload, "Malformed error frame");
				this.events.emit("error", parsed.ok ? errorFromPayload(parsed.value) : parsed.error);
				break;
			}
			case PayloadType.AccountsTokenInvalidatedEvent:
				this.events.emit("error", new AuthError("Account access token invalidated"));
				break;
			case PayloadType.ClientDisconnectEvent:
				this.logger.warn({ payload: frame.payload }, "venue requested disconnect");
				this.client.close();
				break;
			default:
				this.logger.debug({ payloadType: frame.payloadType }, "unhandled frame");
		}
	}

	private routeExecution(frame: Frame): void {
		const parsed = parseExecutionPayload(frame.payload);
		if (!parsed.ok) {
			this.events.emit("error", parsed.error);
			return;
		}
		const account = this.executionAccounts.get(parsed.value.ctidTraderAccountId);
		if (account === undefined) return;

		const decoded = decodeExecutionEvent(parsed.value, this.lotSizeLookup(account), this.clock.now());
		if (!decoded.ok) {
			this.events.emit("error", decoded.error);
			return;
		}
		this.events.emit("execution", account, decoded.value);
	}

	private routeSpot(frame: Frame): void {
		const decoded = decodeSpot(frame.payload, this.clock.now());
		if (!decoded.ok) {
			this.events.emit("error", decoded.error);
			return;
		}
		this.events.emit("spot", decoded.value.accountId, decoded.value.quote);
	}

	private handleClose(code: number, reason: string): void {
		this.stopHeartbeat();
		this.failPending(new TransportError("Connection closed", { code, reason }));
		if (!this.closing) {
			this.events.emit("disconnect", reason || `socket closed (${code})`);
		}
	}

	// ── Helpers ────────────────────────────────────────────────────

	private lotSizeLookup(accountId: number): LotSizeLookup {
		const sizes = this.lotSizes.get(accountId);
		return (id) => sizes?.get(id) ?? null;
	}

	private startHeartbeat(): void {
		this.stopHeartbeat();
		if (this.heartbeatIntervalMs <= 0) return;
		this.heartbeatTimer = setInterval(() => {
			const sent = this.client.send(JSON.stringify({ payloadType: PayloadType.Heartbeat, payload: {} }));
			if (!sent.ok) this.logger.debug({ err: sent.error.message }, "heartbeat not sent");
		}, this.heartbeatIntervalMs);
	}

	private stopHeartbeat(): void {
		if (this.heartbeatTimer !== null) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
	}
}
