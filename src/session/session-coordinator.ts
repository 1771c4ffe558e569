/**
 * SessionCoordinator: owns the shared Open API transport.
 *
 * Drives the auth sequence, loads both symbol catalogs, rebuilds the
 * ledger from live positions and only then forwards master execution
 * events. Transport loss returns the session to disconnected and starts a
 * backoff reconnect; fatal errors (bad credentials, reconnect attempts
 * exhausted) stop it.
 *
 * Other components never see the transport. Slave writes go through the
 * SlaveGateway methods implemented here.
 */

import { unwrapCredentials } from "../auth/index.js";
import type { Credentials } from "../auth/types.js";
import type { ExecutionEvent } from "../classifier/types.js";
import type { OrderConfirmation, OrderRequest, SlaveGateway } from "../dispatch/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { TokenBucketRateLimiter } from "../lib/rate-limit/index.js";
import type { PositionLedger } from "../position/position-ledger.js";
import { type ReconcileResult, reconcile, reconcileSummary } from "../position/reconciliation.js";
import type { LivePosition } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import { SystemError, type TradingError, TransportError, classifyError } from "../shared/errors.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import { LogTag } from "../shared/log-tags.js";
import { type Result, err, ok, tryCatchAsync } from "../shared/result.js";
import { type Clock, SystemClock, sleep } from "../shared/time.js";
import type { SymbolMapper } from "../symbols/symbol-mapper.js";
import { Broker } from "../symbols/types.js";
import type { OpenApiTransport } from "../transport/types.js";
import { QuoteBook } from "./quote-book.js";
import type { ReconnectionPolicy } from "./reconnection.js";
import { SessionStateMachine } from "./state-machine.js";
import { SessionState, type SessionTransition, type TransitionRecord } from "./types.js";

export interface SessionEvents {
	state: (next: SessionState, previous: SessionState) => void;
	/** Master execution event, delivered only while running */
	execution: (event: ExecutionEvent) => void;
	/** Ledger rebuilt; emitted right after the session reaches running */
	reconciled: (result: ReconcileResult) => void;
	fatal: (error: TradingError) => void;
}

export interface SessionCoordinatorOptions {
	readonly transport: OpenApiTransport;
	readonly credentials: Credentials;
	readonly masterAccountId: AccountId;
	readonly slaveAccountId: AccountId;
	readonly mapper: SymbolMapper;
	readonly ledger: PositionLedger;
	/** Sequence expectations restart with each connection */
	readonly sequences: { resetSequences(): void };
	readonly reconnection: ReconnectionPolicy;
	readonly openTimeToleranceMs: number;
	/** Data bucket that position queries wait on */
	readonly positionQueries?: {
		readonly limiter: TokenBucketRateLimiter;
		readonly timeoutMs: number;
	};
	/** Expected slave/master volume ratio used by heuristic pairing */
	readonly expectedRatio?: (masterInstrument: InstrumentId) => Decimal | null;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly sleep?: (ms: number) => Promise<void>;
}

interface BufferedEvent {
	readonly generation: number;
	readonly event: ExecutionEvent;
}

export class SessionCoordinator implements SlaveGateway {
	readonly events = new TypedEmitter<SessionEvents>();
	readonly quotes = new QuoteBook();
	private readonly options: SessionCoordinatorOptions;
	private readonly transport: OpenApiTransport;
	private readonly machine: SessionStateMachine;
	private readonly logger: Logger;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly spotSubscriptions = new Set<InstrumentId>();
	private buffered: BufferedEvent[] = [];
	private generation = 0;
	private stopRequested = false;
	private reconnecting: Promise<Result<void, TradingError>> | null = null;
	/** Cuts a backoff wait short on stop() */
	private wake: (() => void) | null = null;

	constructor(options: SessionCoordinatorOptions) {
		this.options = options;
		this.transport = options.transport;
		this.machine = new SessionStateMachine(options.clock ?? SystemClock);
		this.logger = options.logger.child({ component: "session" });
		this.sleep = options.sleep ?? sleep;

		this.transport.events.on("execution", (account, event) => this.onExecution(account, event));
		this.transport.events.on("spot", (account, quote) => this.quotes.update(account, quote));
		this.transport.events.on("disconnect", (reason) => this.onDisconnect(reason));
		this.transport.events.on("error", (error) => this.onTransportError(error));
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): SessionState {
		return this.machine.state();
	}

	get connectionGeneration(): number {
		return this.generation;
	}

	history(): readonly TransitionRecord[] {
		return this.machine.history();
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Connect and bring the session to running, retrying with backoff.
	 * Resolves with an error once the session is stopped for good.
	 */
	start(): Promise<Result<void, TradingError>> {
		return this.runUntilConnected();
	}

	/** Stop for good. Pending reconnects give up; the transport is closed. */
	async stop(reason: string): Promise<void> {
		if (this.stopRequested) return;
		this.stopRequested = true;
		this.buffered = [];
		this.move({ type: "stop", reason });
		this.transport.close();
		this.wake?.();
		if (this.reconnecting) await this.reconnecting;
		this.logger.info({ reason }, `${LogTag.Session} stopped`);
	}

	/**
	 * Re-run ledger reconciliation on the live connection. Used when the
	 * dispatcher finds the ledger out of step with the venue.
	 */
	async rebuild(): Promise<Result<ReconcileResult, TradingError>> {
		if (this.machine.state() !== SessionState.Running) {
			return err(new TransportError("Session is not running", { state: this.machine.state() }));
		}
		const result = await this.rebuildLedger();
		if (result.ok) this.events.emit("reconciled", result.value);
		return result;
	}

	// ── Gateway ────────────────────────────────────────────────────

	sendOrder(request: OrderRequest): Promise<Result<OrderConfirmation, TradingError>> {
		if (this.machine.state() !== SessionState.Running) {
			return Promise.resolve(
				err(new TransportError("Session is not running", { state: this.machine.state() })),
			);
		}
		return this.transport.sendOrder(this.options.slaveAccountId, request);
	}

	queryBalance(): Promise<Result<Decimal, TradingError>> {
		return this.transport.queryBalance(this.options.slaveAccountId);
	}

	queryOpenPositions(broker: Broker): Promise<Result<LivePosition[], TradingError>> {
		return this.queryPositions(this.accountOf(broker));
	}

	// ── Connection ─────────────────────────────────────────────────

	private async runUntilConnected(): Promise<Result<void, TradingError>> {
		const { reconnection } = this.options;
		for (;;) {
			if (this.stopRequested) return err(new TransportError("Session stopped"));

			const attempt = await this.establish();
			if (attempt.ok) {
				reconnection.reset();
				return attempt;
			}
			this.abandonConnection(attempt.error.message);
			if (this.stopRequested) return err(attempt.error);

			if (attempt.error.isFatal) return this.fail(attempt.error);
			if (!reconnection.shouldRetry()) {
				return this.fail(
					new SystemError(
						`Giving up after ${reconnection.attemptCount} reconnect attempts: ${attempt.error.message}`,
						{ cause: attempt.error },
					),
				);
			}

			const delayMs = reconnection.nextDelay();
			this.logger.warn(
				{ attempt: reconnection.attemptCount, delayMs, err: attempt.error.message },
				`${LogTag.Session} connection attempt failed; retrying`,
			);
			await Promise.race([
				this.sleep(delayMs),
				new Promise<void>((resolve) => {
					this.wake = resolve;
				}),
			]);
			this.wake = null;
		}
	}

	private async establish(): Promise<Result<void, TradingError>> {
		const { transport } = this;
		const { masterAccountId, slaveAccountId } = this.options;
		const keys = unwrapCredentials(this.options.credentials);

		this.generation += 1;
		this.buffered = [];
		this.spotSubscriptions.clear();
		this.move({ type: "connect" });

		const connected = await transport.connect();
		if (!connected.ok) return connected;

		const app = await transport.authenticateApplication(keys.clientId, keys.clientSecret);
		if (!app.ok) return app;
		this.move({ type: "app_authenticated" });

		const master = await transport.authorizeAccount(masterAccountId, keys.masterAccessToken);
		if (!master.ok) return master;
		const slave = await transport.authorizeAccount(slaveAccountId, keys.slaveAccessToken);
		if (!slave.ok) return slave;
		this.move({ type: "accounts_authorized" });

		// Lot sizes must be known before any execution event can be decoded.
		for (const broker of [Broker.Master, Broker.Slave]) {
			const loaded = await this.loadCatalog(broker);
			if (!loaded.ok) return loaded;
		}

		const subscribed = await transport.subscribeExecutionEvents(masterAccountId);
		if (!subscribed.ok) return subscribed;
		this.move({ type: "subscribed" });

		const rebuilt = await this.rebuildLedger();
		if (!rebuilt.ok) return rebuilt;

		this.options.sequences.resetSequences();
		this.move({ type: "ledger_rebuilt" });
		this.events.emit("reconciled", rebuilt.value);
		this.flushBuffered();
		return ok(undefined);
	}

	private async loadCatalog(broker: Broker): Promise<Result<void, TradingError>> {
		const account = this.accountOf(broker);
		const trader = await this.transport.queryTrader(account);
		if (!trader.ok) return trader;
		const instruments = await this.transport.querySymbols(account);
		if (!instruments.ok) return instruments;

		this.options.mapper.loadCatalog({
			broker,
			depositAssetId: trader.value.depositAssetId,
			instruments: instruments.value,
		});
		this.logger.debug(
			{ broker, instruments: instruments.value.length },
			`${LogTag.Session} symbol catalog loaded`,
		);
		return ok(undefined);
	}

	private async queryPositions(account: AccountId): Promise<Result<LivePosition[], TradingError>> {
		const throttle = this.options.positionQueries;
		if (throttle) {
			const acquired = await tryCatchAsync(
				() => throttle.limiter.acquire(throttle.timeoutMs),
				classifyError,
			);
			if (!acquired.ok) return acquired;
		}
		return this.transport.queryOpenPositions(account);
	}

	/**
	 * Reconcile the ledger against live positions. Workers may still be
	 * dispatching, so entries they write while the queries are pending win
	 * over the reconciled view and are never reported as unpaired.
	 */
	private async rebuildLedger(): Promise<Result<ReconcileResult, TradingError>> {
		const { ledger } = this.options;
		const since = ledger.openWriteLog();
		try {
			return await this.reconcileLive(since);
		} finally {
			ledger.closeWriteLog();
		}
	}

	private async reconcileLive(since: number): Promise<Result<ReconcileResult, TradingError>> {
		const { mapper, ledger } = this.options;
		const master = await this.queryPositions(this.options.masterAccountId);
		if (!master.ok) return master;
		const slave = await this.queryPositions(this.options.slaveAccountId);
		if (!slave.ok) return slave;

		const reconciled = reconcile({
			previous: ledger.snapshot(),
			master: master.value,
			slave: slave.value,
			mapInstrument: (id) => {
				const resolved = mapper.resolve(id, Broker.Master, Broker.Slave);
				return resolved.ok ? resolved.value : null;
			},
			expectedRatio: this.options.expectedRatio ?? (() => null),
			openTimeToleranceMs: this.options.openTimeToleranceMs,
		});
		const kept = ledger.replaceAll(reconciled.positions, since);
		let result = reconciled;
		if (kept.size > 0) {
			const unpairedMaster = reconciled.unpairedMaster.filter((p) => !kept.has(p.positionId));
			result = {
				...reconciled,
				unpairedMaster,
				summary: reconcileSummary({ ...reconciled, unpairedMaster }),
			};
		}

		this.logger.info(
			{
				pairs: result.pairs.length,
				unpairedMaster: result.unpairedMaster.length,
				orphanedSlave: result.orphanedSlave.length,
				writtenDuringRebuild: kept.size,
			},
			`${LogTag.Reconcile} ${result.summary}`,
		);
		for (const position of result.unpairedMaster) {
			this.logger.warn(
				{ masterPositionId: position.positionId, instrumentId: position.instrumentId },
				`${LogTag.Reconcile} master position has no slave counterpart`,
			);
		}
		for (const position of result.orphanedSlave) {
			this.logger.warn(
				{ slavePositionId: position.positionId, instrumentId: position.instrumentId },
				`${LogTag.Reconcile} slave position is not claimed by any master position`,
			);
		}

		for (const pair of result.pairs) {
			await this.ensureSpots(pair.master.instrumentId);
		}
		for (const position of result.unpairedMaster) {
			await this.ensureSpots(position.instrumentId);
		}
		return ok(result);
	}

	/**
	 * Subscribe spots for a master instrument and its slave counterpart.
	 * Failures are logged; pip-value sizing falls back without quotes.
	 */
	async ensureSpots(masterInstrument: InstrumentId): Promise<void> {
		if (this.spotSubscriptions.has(masterInstrument)) return;
		this.spotSubscriptions.add(masterInstrument);

		const targets: Array<[AccountId, InstrumentId]> = [
			[this.options.masterAccountId, masterInstrument],
		];
		const slaveInstrument = this.options.mapper.resolve(masterInstrument, Broker.Master, Broker.Slave);
		if (slaveInstrument.ok) targets.push([this.options.slaveAccountId, slaveInstrument.value]);

		for (const [account, instrument] of targets) {
			const result = await this.transport.subscribeSpots(account, [instrument]);
			if (!result.ok) {
				this.logger.warn(
					{ accountId: account, instrumentId: instrument, err: result.error.message },
					`${LogTag.Session} spot subscription failed`,
				);
			}
		}
	}

	private abandonConnection(reason: string): void {
		this.buffered = [];
		this.transport.close();
		if (this.machine.state() !== SessionState.Disconnected && !this.machine.isStopped()) {
			this.move({ type: "connection_lost", reason });
		}
	}

	private fail(error: TradingError): Result<void, TradingError> {
		this.logger.fatal({ err: error.message, code: error.code }, `${LogTag.Session} fatal session error`);
		this.stopRequested = true;
		this.move({ type: "stop", reason: error.message });
		this.transport.close();
		this.events.emit("fatal", error);
		return err(error);
	}

	// ── Inbound ────────────────────────────────────────────────────

	private onExecution(account: AccountId, event: ExecutionEvent): void {
		if (account !== this.options.masterAccountId) return;

		switch (this.machine.state()) {
			case SessionState.Running:
				this.events.emit("execution", event);
				break;
			case SessionState.Subscribed:
				this.buffered.push({ generation: this.generation, event });
				break;
			default:
				this.logger.debug(
					{ masterPositionId: event.masterPositionId, state: this.machine.state() },
					`${LogTag.Session} execution event dropped outside a running session`,
				);
		}
	}

	private flushBuffered(): void {
		const events = this.buffered;
		this.buffered = [];
		for (const entry of events) {
			if (entry.generation !== this.generation) continue;
			this.events.emit("execution", entry.event);
		}
	}

	private onDisconnect(reason: string): void {
		if (this.stopRequested || this.machine.state() === SessionState.Disconnected) return;
		const wasRunning = this.machine.state() === SessionState.Running;
		this.logger.warn({ reason }, `${LogTag.Session} connection lost`);
		this.buffered = [];
		this.move({ type: "connection_lost", reason });

		// A drop during establish() surfaces there as a failed request.
		if (wasRunning && this.reconnecting === null) {
			this.reconnecting = this.runUntilConnected().finally(() => {
				this.reconnecting = null;
			});
		}
	}

	private onTransportError(error: TradingError): void {
		if (error.isFatal && !this.stopRequested) {
			this.fail(error);
			return;
		}
		this.logger.warn({ err: error.message, code: error.code }, `${LogTag.Error} ${error.message}`);
	}

	// ── Helpers ────────────────────────────────────────────────────

	accountOf(broker: Broker): AccountId {
		return broker === Broker.Master ? this.options.masterAccountId : this.options.slaveAccountId;
	}

	private move(transition: SessionTransition): void {
		const previous = this.machine.state();
		const result = this.machine.transition(transition);
		if (!result.ok) {
			this.logger.debug({ err: result.error.message }, `${LogTag.Session} transition ignored`);
			return;
		}
		this.logger.info(
			{ from: previous, to: result.value },
			`${LogTag.Session} ${previous} → ${result.value}`,
		);
		this.events.emit("state", result.value, previous);
	}
}
