/**
 * Composition root: builds the transport, session, ledger, dispatcher and
 * engine from a validated MirrorConfig.
 */

import { EventClassifier } from "../classifier/event-classifier.js";
import type { MirrorConfig } from "../config/types.js";
import { OrderDispatcher } from "../dispatch/order-dispatcher.js";
import type { Logger } from "../lib/logger/index.js";
import {
	DATA_BUCKET,
	DATA_LIMITS,
	TRADING_BUCKET,
	TRADING_LIMITS,
	openApiPresets,
} from "../lib/rate-limit/index.js";
import { WsClient } from "../lib/websocket/index.js";
import { PositionLedger } from "../position/position-ledger.js";
import { ReconnectionPolicy } from "../session/reconnection.js";
import { SessionCoordinator } from "../session/session-coordinator.js";
import type { Decimal } from "../shared/decimal.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { PolicyKind, type VolumePolicy } from "../sizing/types.js";
import { SymbolMapper, normalizeSymbolName } from "../symbols/symbol-mapper.js";
import { Broker } from "../symbols/types.js";
import { OpenApiConnection } from "../transport/open-api-connection.js";
import { endpointUrl } from "../transport/protocol.js";
import type { OpenApiTransport } from "../transport/types.js";
import { CopyEngine } from "./copy-engine.js";

export interface CreateMirrorOptions {
	readonly config: MirrorConfig;
	readonly logger: Logger;
	/** Replaces the WebSocket connection; tests pass an in-memory transport */
	readonly transport?: OpenApiTransport;
	readonly clock?: Clock;
	readonly sleep?: (ms: number) => Promise<void>;
}

export interface Mirror {
	readonly engine: CopyEngine;
	readonly session: SessionCoordinator;
	readonly ledger: PositionLedger;
	readonly mapper: SymbolMapper;
}

function defaultTransport(config: MirrorConfig, logger: Logger, clock: Clock): OpenApiTransport {
	const client = new WsClient({
		url: endpointUrl(config.endpoint.host, config.endpoint.port),
		pingIntervalMs: config.session.heartbeatIntervalMs,
		pongTimeoutMs: config.dispatch.requestTimeoutMs,
	});
	return new OpenApiConnection({
		client,
		requestTimeoutMs: config.dispatch.requestTimeoutMs,
		heartbeatIntervalMs: config.session.heartbeatIntervalMs,
		logger,
		clock,
	});
}

/**
 * Slave/master ratio the configured policy would produce, for heuristic
 * pairing. Balance and pip policies depend on live values, so they give none.
 */
export function expectedRatioFor(
	policy: VolumePolicy,
	mapper: SymbolMapper,
): (masterInstrument: InstrumentId) => Decimal | null {
	switch (policy.kind) {
		case PolicyKind.GlobalMultiplier:
			return () => policy.multiplier;
		case PolicyKind.InstrumentMultiplier:
			return (instrument) => {
				const spec = mapper.spec(Broker.Master, instrument);
				const configured = spec
					? policy.multipliers.get(normalizeSymbolName(spec.name))
					: undefined;
				return configured ?? policy.defaultMultiplier;
			};
		case PolicyKind.BalancePercentage:
		case PolicyKind.PipEqualization:
			return () => null;
	}
}

export function createMirror(options: CreateMirrorOptions): Mirror {
	const { config, logger } = options;
	const clock = options.clock ?? SystemClock;
	const transport = options.transport ?? defaultTransport(config, logger, clock);

	const mapper = new SymbolMapper(config.symbolAliases);
	const ledger = new PositionLedger();
	const limiters = openApiPresets(clock);
	const data = limiters.getOrCreate(DATA_BUCKET, DATA_LIMITS);
	const classifier = new EventClassifier({
		lotStepOf: (instrument) => mapper.spec(Broker.Slave, instrument)?.lotStep ?? null,
	});

	const session = new SessionCoordinator({
		transport,
		credentials: config.credentials,
		masterAccountId: config.masterAccountId,
		slaveAccountId: config.slaveAccountId,
		mapper,
		ledger,
		sequences: classifier,
		reconnection: new ReconnectionPolicy(config.session.reconnect),
		openTimeToleranceMs: config.reconciliation.openTimeToleranceMs,
		positionQueries: { limiter: data, timeoutMs: config.dispatch.rateLimitTimeoutMs },
		expectedRatio: expectedRatioFor(config.volume.policy, mapper),
		logger,
		clock,
		...(options.sleep ? { sleep: options.sleep } : {}),
	});

	const dispatcher = new OrderDispatcher({
		gateway: session,
		ledger,
		mapper,
		trading: limiters.getOrCreate(TRADING_BUCKET, TRADING_LIMITS),
		data,
		dispatch: config.dispatch,
		logger,
		clock,
		onReconcileNeeded: (id) => engine.requestReconcile(id),
		...(options.sleep ? { sleep: options.sleep } : {}),
	});

	const engine = new CopyEngine({
		session,
		classifier,
		dispatcher,
		ledger,
		mapper,
		limiters,
		volume: config.volume,
		mirrorUnpaired: config.reconciliation.mirrorUnpaired,
		workerConcurrency: config.engine.workerConcurrency,
		shutdownGraceMs: config.engine.shutdownGraceMs,
		logger,
	});

	return { engine, session, ledger, mapper };
}
