/**
 * CopyEngine: glue between the session and the dispatcher.
 *
 * Master execution events are queued per master instrument: one instrument's
 * events run strictly in arrival order, distinct instruments run in parallel
 * up to `workerConcurrency`. Each event is classified against the ledger,
 * opens and opening-fill top-ups are sized, and the decision goes to the
 * dispatcher.
 */

import type { EventClassifier } from "../classifier/event-classifier.js";
import {
	type CopyDecision,
	DecisionAction,
	type ExecutionEvent,
	type IncreaseDecision,
	type OpenDecision,
	type SkipDecision,
	SkipReason,
} from "../classifier/types.js";
import type { VolumeConfig } from "../config/types.js";
import type { OrderDispatcher } from "../dispatch/order-dispatcher.js";
import type { OrderOutcome } from "../dispatch/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { KeyedWorkerPool, type ShutdownReport } from "../lib/queue/index.js";
import type { RateLimiterManager } from "../lib/rate-limit/index.js";
import type { PositionLedger } from "../position/position-ledger.js";
import type { ReconcileResult } from "../position/reconciliation.js";
import type { LivePosition } from "../position/types.js";
import type { SessionCoordinator } from "../session/session-coordinator.js";
import { Decimal } from "../shared/decimal.js";
import { type TradingError, classifyError } from "../shared/errors.js";
import type { InstrumentId, PositionId } from "../shared/identifiers.js";
import { LogTag } from "../shared/log-tags.js";
import type { Result } from "../shared/result.js";
import { pipValuePerLot } from "../sizing/pip-value.js";
import type { AccountSnapshot } from "../sizing/types.js";
import {
	computeSlaveVolume,
	policyNeedsBalance,
	policyNeedsPipValues,
} from "../sizing/volume-calculator.js";
import type { SymbolMapper } from "../symbols/symbol-mapper.js";
import { Broker } from "../symbols/types.js";

export type EngineJob =
	| { readonly kind: "event"; readonly event: ExecutionEvent }
	| { readonly kind: "unpaired"; readonly position: LivePosition };

export interface EngineEvents {
	decision: (decision: CopyDecision) => void;
	outcome: (outcome: OrderOutcome) => void;
	dropped: (job: EngineJob) => void;
}

export interface CopyEngineConfig {
	readonly session: SessionCoordinator;
	readonly classifier: EventClassifier;
	readonly dispatcher: OrderDispatcher;
	readonly ledger: PositionLedger;
	readonly mapper: SymbolMapper;
	readonly limiters: RateLimiterManager;
	readonly volume: VolumeConfig;
	readonly mirrorUnpaired: boolean;
	readonly workerConcurrency: number;
	readonly shutdownGraceMs: number;
	readonly logger: Logger;
}

function jobPositionId(job: EngineJob): PositionId {
	return job.kind === "event" ? job.event.masterPositionId : job.position.positionId;
}

export class CopyEngine {
	readonly events = new TypedEmitter<EngineEvents>();
	private readonly config: CopyEngineConfig;
	private readonly logger: Logger;
	private readonly pool: KeyedWorkerPool<InstrumentId, EngineJob>;
	private accepting = true;
	private rebuilding: Promise<Result<ReconcileResult, TradingError>> | null = null;
	private stopping: Promise<ShutdownReport> | null = null;

	constructor(config: CopyEngineConfig) {
		this.config = config;
		this.logger = config.logger.child({ component: "engine" });
		this.pool = new KeyedWorkerPool({
			concurrency: config.workerConcurrency,
			worker: (job) => this.process(job),
			onError: (error, job) => {
				const failure = classifyError(error);
				this.logger.error(
					{ masterPositionId: jobPositionId(job), code: failure.code },
					`${LogTag.Error} ${failure.message}; event abandoned`,
				);
			},
			onDropped: (job) => this.logDropped(job, "shutdown"),
		});

		config.session.events.on("execution", (event) => this.submit(event));
		config.session.events.on("reconciled", (result) => this.onReconciled(result));
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	async start(): Promise<Result<void, TradingError>> {
		const result = await this.config.session.start();
		if (result.ok) {
			this.logger.info(
				{ policy: this.config.volume.policy.kind, positions: this.config.ledger.size },
				`${LogTag.Session} mirroring started`,
			);
		}
		return result;
	}

	/**
	 * Stop intake, drop queued events, give in-flight work up to
	 * `shutdownGraceMs`, then stop the session. Safe to call twice.
	 */
	stop(reason: string): Promise<ShutdownReport> {
		this.stopping ??= this.shutdown(reason);
		return this.stopping;
	}

	/** Resolves once no event is queued or running. */
	idle(): Promise<void> {
		return this.pool.idle();
	}

	/** Ask the session to rebuild the ledger; concurrent requests share one rebuild. */
	requestReconcile(masterPositionId: PositionId): void {
		if (!this.accepting || this.rebuilding) return;
		this.logger.warn({ masterPositionId }, `${LogTag.Reconcile} ledger out of step; rebuilding`);
		this.rebuilding = this.config.session.rebuild().then((result) => {
			if (!result.ok) {
				this.logger.warn(
					{ err: result.error.message },
					`${LogTag.Reconcile} rebuild failed; waiting for next reconnect`,
				);
			}
			this.rebuilding = null;
			return result;
		});
	}

	// ── Intake ─────────────────────────────────────────────────────

	private submit(event: ExecutionEvent): void {
		this.enqueue(event.instrumentId, { kind: "event", event });
	}

	private onReconciled(result: ReconcileResult): void {
		if (!this.config.mirrorUnpaired) return;
		for (const position of result.unpairedMaster) {
			this.enqueue(position.instrumentId, { kind: "unpaired", position });
		}
	}

	private enqueue(key: InstrumentId, job: EngineJob): void {
		if (!this.accepting || !this.pool.submit(key, job)) {
			this.logDropped(job, "stopping");
		}
	}

	private logDropped(job: EngineJob, reason: string): void {
		this.logger.error(
			{ masterPositionId: jobPositionId(job), job: job.kind, reason },
			`${LogTag.Error} queued event dropped during ${reason}`,
		);
		this.events.emit("dropped", job);
	}

	// ── Processing ─────────────────────────────────────────────────

	private async process(job: EngineJob): Promise<void> {
		const decision =
			job.kind === "event"
				? this.config.classifier.classify(job.event, this.config.ledger)
				: this.unpairedDecision(job.position);

		this.events.emit("decision", decision);
		if (decision.action === DecisionAction.Skip) {
			this.logSkip(decision, job);
			return;
		}

		let ready: CopyDecision | null = decision;
		if (decision.action === DecisionAction.Open) {
			ready = await this.sizeOpen(decision);
		} else if (decision.action === DecisionAction.Increase) {
			ready = await this.sizeIncrease(decision);
		}
		if (ready === null) return;

		const outcome = await this.config.dispatcher.dispatch(ready);
		this.events.emit("outcome", outcome);
	}

	private logSkip(decision: SkipDecision, job: EngineJob): void {
		const context = {
			masterPositionId: decision.masterPositionId,
			instrumentId: decision.instrumentId,
			sequenceNo: decision.sequenceNo,
			reason: decision.reason,
		};
		if (decision.reason === SkipReason.VolumeIncrease && job.kind === "event") {
			this.logger.warn(
				{ ...context, masterVolume: job.event.resultingMasterVolume.toString() },
				`${LogTag.Adjust} master scaled into position ${decision.masterPositionId}; increase not mirrored`,
			);
			return;
		}
		this.logger.debug(context, "event skipped");
	}

	private unpairedDecision(position: LivePosition): OpenDecision {
		return {
			action: DecisionAction.Open,
			instrumentId: position.instrumentId,
			masterPositionId: position.positionId,
			sequenceNo: 0,
			timestamp: position.openedAt,
			side: position.side,
			masterVolume: position.volume,
			requestedSlaveVolume: null,
			stillFilling: false,
			reason: "reconcile_unpaired",
		};
	}

	/** Attach the slave volume to an open decision; null when it cannot be sized. */
	private async sizeOpen(decision: OpenDecision): Promise<OpenDecision | null> {
		const slaveVolume = await this.slaveVolumeFor(decision, decision.masterVolume);
		return slaveVolume === null ? null : { ...decision, requestedSlaveVolume: slaveVolume };
	}

	/**
	 * Size the whole master volume as one open and send the difference to what
	 * the slave already holds, so a fill split in parts ends where a single
	 * fill would have.
	 */
	private async sizeIncrease(decision: IncreaseDecision): Promise<IncreaseDecision | null> {
		const entry = this.config.ledger.get(decision.masterPositionId);
		// The dispatcher reports the missing entry and asks for a rebuild.
		if (!entry) return decision;
		const target = await this.slaveVolumeFor(decision, decision.newMasterVolume);
		if (target === null) return null;
		const added = target.sub(entry.slaveVolume);
		return { ...decision, requestedSlaveVolume: added.isPositive() ? added : Decimal.zero() };
	}

	private async slaveVolumeFor(
		decision: OpenDecision | IncreaseDecision,
		masterVolume: Decimal,
	): Promise<Decimal | null> {
		const { mapper, session, volume } = this.config;
		const context = {
			masterPositionId: decision.masterPositionId,
			instrumentId: decision.instrumentId,
		};

		const masterSpec = mapper.spec(Broker.Master, decision.instrumentId);
		const slaveSpec = mapper.resolveSpec(decision.instrumentId, Broker.Master, Broker.Slave);
		if (!masterSpec || !slaveSpec.ok) {
			const message = slaveSpec.ok
				? `Instrument ${decision.instrumentId} is not in the master catalog`
				: slaveSpec.error.message;
			this.logger.warn(context, `${LogTag.Error} ${message}; decision skipped`);
			return null;
		}

		await session.ensureSpots(decision.instrumentId);
		const account = await this.accountSnapshot(decision.instrumentId, slaveSpec.value.id);

		const computation = computeSlaveVolume({
			instrument: slaveSpec.value,
			masterSymbol: masterSpec.name,
			masterVolume,
			policy: volume.policy,
			account,
			limits: volume.limits,
		});

		this.logger.info(
			{
				...context,
				policy: computation.policy,
				masterVolume: masterVolume.toString(),
				rawVolume: computation.rawVolume.toString(),
				slaveVolume: computation.volume.toString(),
			},
			`${LogTag.Volume} ${masterVolume} → ${computation.volume} lots`,
		);
		for (const adjustment of computation.adjustments) {
			this.logger.info(
				{ ...context, from: adjustment.from.toString(), to: adjustment.to.toString() },
				`${LogTag.Volume} ${adjustment.kind.replaceAll("_", " ")}`,
			);
		}
		if (computation.fallback) {
			this.logger.warn(
				{ ...context, ...computation.fallback },
				`${LogTag.Volume} pip values unavailable (${computation.fallback.missing.join(", ")}); using fallback multiplier ${computation.fallback.fallbackMultiplier}`,
			);
		}

		return computation.volume;
	}

	private async accountSnapshot(
		masterInstrument: InstrumentId,
		slaveInstrument: InstrumentId,
	): Promise<AccountSnapshot> {
		const { dispatcher, volume } = this.config;

		let slaveBalance: Decimal | null = null;
		if (policyNeedsBalance(volume.policy)) {
			const balance = await dispatcher.fetchSlaveBalance();
			if (balance.ok) {
				slaveBalance = balance.value;
			} else {
				this.logger.warn(
					{ err: balance.error.message },
					`${LogTag.Volume} slave balance unavailable; sizing from zero`,
				);
			}
		}

		if (!policyNeedsPipValues(volume.policy)) {
			return { slaveBalance, masterPipValue: null, slavePipValue: null };
		}
		return {
			slaveBalance,
			masterPipValue: this.pipValue(Broker.Master, masterInstrument),
			slavePipValue: this.pipValue(Broker.Slave, slaveInstrument),
		};
	}

	private pipValue(broker: Broker, instrument: InstrumentId): Decimal | null {
		const { mapper, session } = this.config;
		const spec = mapper.spec(broker, instrument);
		if (!spec) return null;
		const depositAssetId = mapper.catalog(broker)?.depositAssetId ?? null;
		return pipValuePerLot(spec, depositAssetId, session.quotes.mid(session.accountOf(broker), instrument));
	}

	// ── Shutdown ───────────────────────────────────────────────────

	private async shutdown(reason: string): Promise<ShutdownReport> {
		this.accepting = false;
		this.logger.info({ reason, queued: this.pool.queued, active: this.pool.active }, `${LogTag.Session} shutting down`);

		const report = await this.pool.shutdown(this.config.shutdownGraceMs);
		if (!report.drained) {
			this.logger.warn(
				{ graceMs: this.config.shutdownGraceMs, active: this.pool.active },
				`${LogTag.Error} in-flight work still running after the grace period`,
			);
			this.config.limiters.cancelAll("shutting down");
		}
		if (this.rebuilding) await this.rebuilding;
		await this.config.session.stop(reason);

		const buckets = Object.fromEntries(this.config.limiters.getAllStats());
		this.logger.info(
			{ dropped: report.dropped, drained: report.drained, positions: this.config.ledger.size, buckets },
			`${LogTag.Session} shutdown complete`,
		);
		return report;
	}
}
