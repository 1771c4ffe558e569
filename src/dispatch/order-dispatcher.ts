/**
 * Order dispatcher: turns a CopyDecision into a slave order and records the
 * confirmed result in the ledger.
 *
 * Every request waits for a token from the trading bucket; balance lookups
 * use the data bucket. Waiters are served FIFO, so orders leave in the order
 * their workers asked. The ledger changes only after the venue confirms.
 */

import type {
	AdjustDecision,
	CloseDecision,
	CopyDecision,
	IncreaseDecision,
	OpenDecision,
} from "../classifier/types.js";
import { DecisionAction } from "../classifier/types.js";
import type { DispatchConfig } from "../config/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { TokenBucketRateLimiter } from "../lib/rate-limit/index.js";
import { ValidationError } from "../lib/validation/index.js";
import type { PositionLedger } from "../position/position-ledger.js";
import { mirrorComment } from "../position/reconciliation.js";
import type { MirroredPosition } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	DuplicateKeyError,
	NotFoundError,
	RejectedOrderError,
	type TradingError,
	classifyError,
} from "../shared/errors.js";
import type { PositionId } from "../shared/identifiers.js";
import { LogTag } from "../shared/log-tags.js";
import { type Result, err, ok, tryCatchAsync } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import type { SymbolMapper } from "../symbols/symbol-mapper.js";
import { Broker } from "../symbols/types.js";
import { type RetryHooks, retryResult } from "./retry.js";
import type { OrderConfirmation, OrderOutcome, OrderRequest, SlaveGateway } from "./types.js";

export interface OrderDispatcherConfig {
	readonly gateway: SlaveGateway;
	readonly ledger: PositionLedger;
	readonly mapper: SymbolMapper;
	readonly trading: TokenBucketRateLimiter;
	readonly data: TokenBucketRateLimiter;
	readonly dispatch: DispatchConfig;
	readonly logger: Logger;
	readonly clock: Clock;
	/** Called when a decision references a position the ledger does not know */
	readonly onReconcileNeeded?: (masterPositionId: PositionId) => void;
	/** Wait between retries; defaults to a real timer */
	readonly sleep?: (ms: number) => Promise<void>;
}

interface SendResult {
	readonly result: Result<OrderConfirmation, TradingError>;
	readonly attempts: number;
}

export class OrderDispatcher {
	private readonly config: OrderDispatcherConfig;
	private readonly logger: Logger;

	constructor(config: OrderDispatcherConfig) {
		this.config = config;
		this.logger = config.logger.child({ component: "dispatcher" });
	}

	async dispatch(decision: CopyDecision): Promise<OrderOutcome> {
		switch (decision.action) {
			case DecisionAction.Open:
				return this.config.ledger.withLock(decision.masterPositionId, () =>
					this.dispatchOpen(decision),
				);
			case DecisionAction.Increase:
				return this.config.ledger.withLock(decision.masterPositionId, () =>
					this.dispatchIncrease(decision),
				);
			case DecisionAction.Close:
				return this.config.ledger.withLock(decision.masterPositionId, () =>
					this.dispatchClose(decision),
				);
			case DecisionAction.Adjust:
				return this.config.ledger.withLock(decision.masterPositionId, () =>
					this.dispatchAdjust(decision),
				);
			case DecisionAction.Skip:
				return {
					action: decision.action,
					masterPositionId: decision.masterPositionId,
					accepted: false,
					slavePositionId: null,
					volume: null,
					errorKind: null,
					error: null,
					attempts: 0,
				};
		}
	}

	/** Slave account balance, through the data bucket and the retry policy. */
	async fetchSlaveBalance(): Promise<Result<Decimal, TradingError>> {
		const { data, dispatch, gateway } = this.config;
		return retryResult(
			async () => {
				const acquired = await tryCatchAsync(
					() => data.acquire(dispatch.rateLimitTimeoutMs),
					classifyError,
				);
				if (!acquired.ok) return acquired;
				return gateway.queryBalance();
			},
			dispatch,
			this.retryHooks("balance"),
		);
	}

	// ── Per-action handling ─────────────────────────────────────────

	private async dispatchOpen(decision: OpenDecision): Promise<OrderOutcome> {
		const { ledger, mapper } = this.config;
		const id = decision.masterPositionId;

		if (ledger.has(id)) {
			return this.fail(
				decision,
				new DuplicateKeyError(`Position ${id} is already mirrored`, { masterPositionId: id }),
				0,
			);
		}
		const volume = decision.requestedSlaveVolume;
		if (volume === null || !volume.isPositive()) {
			return this.fail(
				decision,
				new ValidationError("Open decision has no slave volume", [
					{ path: ["requestedSlaveVolume"], message: String(volume) },
				]),
				0,
			);
		}
		const resolved = mapper.resolve(decision.instrumentId, Broker.Master, Broker.Slave);
		if (!resolved.ok) return this.fail(decision, resolved.error, 0);
		const slaveInstrumentId = resolved.value;

		const sent = await this.send((attemptNo) => ({
			kind: "market",
			instrumentId: slaveInstrumentId,
			side: decision.side,
			volume,
			comment: mirrorComment(id),
			attemptNo,
		}));
		if (!sent.result.ok) return this.fail(decision, sent.result.error, sent.attempts);

		const confirmation = sent.result.value;
		const entry: MirroredPosition = {
			instrumentId: decision.instrumentId,
			slaveInstrumentId,
			masterPositionId: id,
			slavePositionId: confirmation.slavePositionId,
			side: decision.side,
			masterVolume: decision.masterVolume,
			slaveVolume: volume,
			openMasterVolume: decision.masterVolume,
			openSlaveVolume: volume,
			openedAt: this.config.clock.now(),
			stillFilling: decision.stillFilling,
		};
		const stored = ledger.upsertOpen(entry);
		if (!stored.ok) return this.fail(decision, stored.error, sent.attempts);

		this.logger.info(
			{
				masterPositionId: id,
				instrumentId: decision.instrumentId,
				slaveInstrumentId,
				slavePositionId: confirmation.slavePositionId,
				side: decision.side,
				masterVolume: decision.masterVolume.toString(),
				slaveVolume: volume.toString(),
			},
			`${LogTag.Open} mirrored master position ${id}`,
		);
		return this.accepted(decision, confirmation.slavePositionId, volume, sent.attempts);
	}

	/** Add the next fill of the master's opening order to its slave copy. */
	private async dispatchIncrease(decision: IncreaseDecision): Promise<OrderOutcome> {
		const { ledger } = this.config;
		const id = decision.masterPositionId;
		const entry = this.trackedEntry(decision);
		if (!entry.ok) return this.fail(decision, entry.error, 0);
		const { position, slavePositionId } = entry.value;

		const added = decision.requestedSlaveVolume;
		if (added === null || added.isNegative()) {
			return this.fail(
				decision,
				new ValidationError("Increase decision has no slave volume", [
					{ path: ["requestedSlaveVolume"], message: String(added) },
				]),
				0,
			);
		}
		if (added.isZero()) {
			// Sizing already covers the new master volume.
			const recorded = ledger.increase(id, decision.newMasterVolume, added, decision.stillFilling);
			if (!recorded.ok) return this.fail(decision, recorded.error, 0);
			this.logIncrease(decision, position, added);
			return this.accepted(decision, slavePositionId, null, 0);
		}

		const sent = await this.send((attemptNo) => ({
			kind: "market",
			instrumentId: position.slaveInstrumentId,
			side: position.side,
			volume: added,
			comment: mirrorComment(id),
			attemptNo,
			slavePositionId,
		}));
		if (!sent.result.ok) return this.fail(decision, sent.result.error, sent.attempts);

		const recorded = ledger.increase(id, decision.newMasterVolume, added, decision.stillFilling);
		if (!recorded.ok) return this.fail(decision, recorded.error, sent.attempts);

		this.logIncrease(decision, position, added);
		return this.accepted(decision, slavePositionId, added, sent.attempts);
	}

	private async dispatchClose(decision: CloseDecision): Promise<OrderOutcome> {
		const entry = this.trackedEntry(decision);
		if (!entry.ok) return this.fail(decision, entry.error, 0);
		const { position, slavePositionId } = entry.value;

		const sent = await this.send((attemptNo) => ({
			kind: "close",
			instrumentId: position.slaveInstrumentId,
			slavePositionId,
			volume: position.slaveVolume,
			attemptNo,
		}));
		if (!sent.result.ok) return this.fail(decision, sent.result.error, sent.attempts);

		const removed = this.config.ledger.remove(decision.masterPositionId);
		if (!removed.ok) return this.fail(decision, removed.error, sent.attempts);

		this.logger.info(
			{
				masterPositionId: decision.masterPositionId,
				instrumentId: decision.instrumentId,
				slavePositionId,
				slaveVolume: position.slaveVolume.toString(),
				reason: decision.reason,
			},
			`${LogTag.Close} closed slave position ${slavePositionId}`,
		);
		return this.accepted(decision, slavePositionId, position.slaveVolume, sent.attempts);
	}

	private async dispatchAdjust(decision: AdjustDecision): Promise<OrderOutcome> {
		const { ledger } = this.config;
		const entry = this.trackedEntry(decision);
		if (!entry.ok) return this.fail(decision, entry.error, 0);
		const { position, slavePositionId } = entry.value;

		const target = decision.requestedSlaveVolume;
		if (target === null) {
			return this.fail(
				decision,
				new NotFoundError(`No slave volume known for position ${decision.masterPositionId}`, {
					masterPositionId: decision.masterPositionId,
				}),
				0,
			);
		}

		const delta = position.slaveVolume.sub(target);
		if (!delta.isPositive()) {
			// Nothing to close on the slave; only the master side moved.
			const kept = Decimal.min(target, position.slaveVolume);
			const adjusted = ledger.adjust(decision.masterPositionId, decision.newMasterVolume, kept);
			if (!adjusted.ok) return this.fail(decision, adjusted.error, 0);
			this.logAdjust(decision, position, kept, Decimal.zero());
			return this.accepted(decision, slavePositionId, null, 0);
		}

		const sent = await this.send((attemptNo) => ({
			kind: "close",
			instrumentId: position.slaveInstrumentId,
			slavePositionId,
			volume: delta,
			attemptNo,
		}));
		if (!sent.result.ok) return this.fail(decision, sent.result.error, sent.attempts);

		const adjusted = ledger.adjust(decision.masterPositionId, decision.newMasterVolume, target);
		if (!adjusted.ok) return this.fail(decision, adjusted.error, sent.attempts);

		this.logAdjust(decision, position, target, delta);
		return this.accepted(decision, slavePositionId, delta, sent.attempts);
	}

	// ── Helpers ─────────────────────────────────────────────────────

	private trackedEntry(
		decision: IncreaseDecision | CloseDecision | AdjustDecision,
	): Result<{ position: MirroredPosition; slavePositionId: PositionId }, NotFoundError> {
		const id = decision.masterPositionId;
		const position = this.config.ledger.get(id);
		if (!position) {
			return err(
				new NotFoundError(`Position ${id} is not in the ledger`, {
					masterPositionId: id,
					instrumentId: decision.instrumentId,
				}),
			);
		}
		if (position.slavePositionId === null) {
			return err(
				new NotFoundError(`Position ${id} has no slave position`, { masterPositionId: id }),
			);
		}
		return ok({ position, slavePositionId: position.slavePositionId });
	}

	private async send(build: (attemptNo: number) => OrderRequest): Promise<SendResult> {
		const { trading, dispatch, gateway } = this.config;
		let attempts = 0;
		const result = await retryResult(
			async () => {
				attempts++;
				const acquired = await tryCatchAsync(
					() => trading.acquire(dispatch.rateLimitTimeoutMs),
					classifyError,
				);
				if (!acquired.ok) return acquired;
				return gateway.sendOrder(build(attempts));
			},
			dispatch,
			this.retryHooks("order"),
		);
		return { result, attempts };
	}

	private retryHooks(operation: string): RetryHooks {
		return {
			...(this.config.sleep ? { sleep: this.config.sleep } : {}),
			onRetry: (attempt: number, delayMs: number, error: TradingError) => {
				this.logger.warn(
					{ operation, attempt, delayMs: Math.round(delayMs), errorKind: error.code },
					`retrying ${operation} after ${error.message}`,
				);
			},
		};
	}

	private logIncrease(decision: IncreaseDecision, before: MirroredPosition, added: Decimal): void {
		this.logger.info(
			{
				masterPositionId: decision.masterPositionId,
				instrumentId: decision.instrumentId,
				slavePositionId: before.slavePositionId,
				masterVolumeBefore: before.masterVolume.toString(),
				masterVolume: decision.newMasterVolume.toString(),
				addedSlaveVolume: added.toString(),
				stillFilling: decision.stillFilling,
			},
			`${LogTag.Open} opening order filled further; added ${added} lots to slave position ${before.slavePositionId}`,
		);
	}

	private logAdjust(
		decision: AdjustDecision,
		before: MirroredPosition,
		slaveVolume: Decimal,
		closed: Decimal,
	): void {
		this.logger.info(
			{
				masterPositionId: decision.masterPositionId,
				instrumentId: decision.instrumentId,
				masterVolumeBefore: before.masterVolume.toString(),
				masterVolume: decision.newMasterVolume.toString(),
				slaveVolumeBefore: before.slaveVolume.toString(),
				slaveVolume: slaveVolume.toString(),
				closedVolume: closed.toString(),
			},
			`${LogTag.Adjust} partially closed slave position ${before.slavePositionId}`,
		);
	}

	private accepted(
		decision: CopyDecision,
		slavePositionId: PositionId,
		volume: Decimal | null,
		attempts: number,
	): OrderOutcome {
		return {
			action: decision.action,
			masterPositionId: decision.masterPositionId,
			accepted: true,
			slavePositionId,
			volume,
			errorKind: null,
			error: null,
			attempts,
		};
	}

	private fail(decision: CopyDecision, error: TradingError, attempts: number): OrderOutcome {
		const context = {
			masterPositionId: decision.masterPositionId,
			instrumentId: decision.instrumentId,
			action: decision.action,
			errorKind: error.code,
			attempts,
		};
		if (error instanceof NotFoundError) {
			this.logger.warn(context, `${LogTag.Error} ${error.message}; decision skipped`);
			this.config.onReconcileNeeded?.(decision.masterPositionId);
		} else if (error instanceof DuplicateKeyError) {
			this.logger.warn(context, `${LogTag.Error} ${error.message}; decision skipped`);
		} else if (error instanceof RejectedOrderError) {
			this.logger.error(
				{ ...context, reason: error.reason },
				`${LogTag.Error} order rejected: ${error.message}; decision abandoned`,
			);
		} else {
			this.logger.error(context, `${LogTag.Error} ${error.message}; decision abandoned`);
		}
		return {
			action: decision.action,
			masterPositionId: decision.masterPositionId,
			accepted: false,
			slavePositionId: null,
			volume: null,
			errorKind: error.code,
			error,
			attempts,
		};
	}
}
