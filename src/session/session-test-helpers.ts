/**
 * Scripted in-process OpenApiTransport. Each account gets a catalog, open
 * positions and a balance; failures are queued per operation.
 */

import type { ExecutionEvent } from "../classifier/types.js";
import type { OrderConfirmation, OrderRequest } from "../dispatch/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { LivePosition } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import { TransportError, type TradingError } from "../shared/errors.js";
import { type AccountId, type InstrumentId, positionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { InstrumentSpec, SymbolCatalog } from "../symbols/types.js";
import type { OpenApiTransport, SpotQuote, TraderInfo, TransportEvents } from "../transport/types.js";

export type TransportOperation =
	| "connect"
	| "authenticateApplication"
	| "authorizeAccount"
	| "querySymbols"
	| "queryOpenPositions"
	| "sendOrder";

interface AccountScript {
	catalog: SymbolCatalog;
	positions: LivePosition[];
	balance: Decimal;
}

export class FakeTransport implements OpenApiTransport {
	readonly events = new TypedEmitter<TransportEvents>();
	readonly calls: string[] = [];
	readonly orders: Array<{ accountId: AccountId; request: OrderRequest }> = [];
	readonly spotSubscriptions: Array<{ accountId: AccountId; instrumentIds: InstrumentId[] }> = [];
	connected = false;
	closeCount = 0;
	/** Runs while positions are queried, i.e. while the session is subscribed */
	onQueryPositions: ((accountId: AccountId) => void) | null = null;
	private readonly accounts = new Map<number, AccountScript>();
	private readonly failures = new Map<TransportOperation, TradingError[]>();
	private nextSlavePosition = 9001;

	setAccount(accountId: AccountId, script: AccountScript): void {
		this.accounts.set(accountId, script);
	}

	/** The next calls to `operation` fail with these errors, in order. */
	failNext(operation: TransportOperation, ...errors: TradingError[]): void {
		this.failures.set(operation, [...(this.failures.get(operation) ?? []), ...errors]);
	}

	// ── Test drivers ───────────────────────────────────────────────

	emitExecution(accountId: AccountId, event: ExecutionEvent): void {
		this.events.emit("execution", accountId, event);
	}

	emitSpot(accountId: AccountId, quote: SpotQuote): void {
		this.events.emit("spot", accountId, quote);
	}

	drop(reason = "reset by peer"): void {
		this.connected = false;
		this.events.emit("disconnect", reason);
	}

	// ── OpenApiTransport ───────────────────────────────────────────

	async connect(): Promise<Result<void, TradingError>> {
		this.calls.push("connect");
		const failure = this.takeFailure("connect");
		if (failure) return err(failure);
		this.connected = true;
		return ok(undefined);
	}

	async authenticateApplication(clientId: string): Promise<Result<void, TradingError>> {
		this.calls.push(`authenticateApplication:${clientId}`);
		return this.guard("authenticateApplication", undefined);
	}

	async authorizeAccount(accountId: AccountId): Promise<Result<void, TradingError>> {
		this.calls.push(`authorizeAccount:${accountId}`);
		return this.guard("authorizeAccount", undefined);
	}

	async subscribeExecutionEvents(accountId: AccountId): Promise<Result<void, TradingError>> {
		this.calls.push(`subscribeExecutionEvents:${accountId}`);
		return ok(undefined);
	}

	async subscribeSpots(
		accountId: AccountId,
		instrumentIds: readonly InstrumentId[],
	): Promise<Result<void, TradingError>> {
		this.spotSubscriptions.push({ accountId, instrumentIds: [...instrumentIds] });
		return ok(undefined);
	}

	async sendOrder(
		accountId: AccountId,
		request: OrderRequest,
	): Promise<Result<OrderConfirmation, TradingError>> {
		this.orders.push({ accountId, request });
		const failure = this.takeFailure("sendOrder");
		if (failure) return err(failure);
		const id = request.slavePositionId ?? positionId(this.nextSlavePosition++);
		return ok({ slavePositionId: id, volume: request.volume });
	}

	async queryOpenPositions(accountId: AccountId): Promise<Result<LivePosition[], TradingError>> {
		this.calls.push(`queryOpenPositions:${accountId}`);
		this.onQueryPositions?.(accountId);
		return this.guard("queryOpenPositions", [...this.script(accountId).positions]);
	}

	async queryTrader(accountId: AccountId): Promise<Result<TraderInfo, TradingError>> {
		if (!this.connected) return err(new TransportError("WebSocket is not connected"));
		const script = this.script(accountId);
		return ok({
			accountId,
			balance: script.balance,
			depositAssetId: script.catalog.depositAssetId ?? 0,
		});
	}

	async queryBalance(accountId: AccountId): Promise<Result<Decimal, TradingError>> {
		const trader = await this.queryTrader(accountId);
		return trader.ok ? ok(trader.value.balance) : trader;
	}

	async querySymbols(accountId: AccountId): Promise<Result<InstrumentSpec[], TradingError>> {
		this.calls.push(`querySymbols:${accountId}`);
		return this.guard("querySymbols", [...this.script(accountId).catalog.instruments]);
	}

	close(): void {
		this.closeCount += 1;
		this.connected = false;
	}

	// ── Internals ──────────────────────────────────────────────────

	private script(accountId: AccountId): AccountScript {
		const script = this.accounts.get(accountId);
		if (!script) throw new Error(`no script for account ${accountId}`);
		return script;
	}

	private takeFailure(operation: TransportOperation): TradingError | undefined {
		return this.failures.get(operation)?.shift();
	}

	private guard<T>(operation: TransportOperation, value: T): Result<T, TradingError> {
		const failure = this.takeFailure(operation);
		if (failure) return err(failure);
		if (!this.connected) return err(new TransportError("WebSocket is not connected"));
		return ok(value);
	}
}
