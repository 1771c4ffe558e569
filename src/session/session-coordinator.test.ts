import { describe, expect, it, vi } from "vitest";
import { createCredentials } from "../auth/index.js";
import { makeEvent } from "../classifier/classifier-test-helpers.js";
import type { ExecutionEvent } from "../classifier/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { TokenBucketRateLimiter } from "../lib/rate-limit/index.js";
import { PositionLedger } from "../position/position-ledger.js";
import { makeLive } from "../position/position-test-helpers.js";
import { PairSource, type ReconcileResult } from "../position/reconciliation.js";
import { Decimal } from "../shared/decimal.js";
import { AuthError, ErrorKind, TransportError } from "../shared/errors.js";
import { accountId, instrumentId, positionId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { TradeSide } from "../shared/trade-side.js";
import { SymbolMapper } from "../symbols/symbol-mapper.js";
import { Broker } from "../symbols/types.js";
import { GOLD_ALIASES, MASTER_CATALOG, SLAVE_CATALOG } from "../symbols/symbol-test-helpers.js";
import { ReconnectionPolicy } from "./reconnection.js";
import { SessionCoordinator } from "./session-coordinator.js";
import { FakeTransport } from "./session-test-helpers.js";
import { SessionState } from "./types.js";

const MASTER = accountId(10);
const SLAVE = accountId(20);

function setup(
	options: { maxAttempts?: number; positionQueries?: { limiter: TokenBucketRateLimiter; timeoutMs: number } } = {},
) {
	const transport = new FakeTransport();
	transport.setAccount(MASTER, {
		catalog: MASTER_CATALOG,
		positions: [makeLive(5001, 1, "0.1")],
		balance: Decimal.from(20_000),
	});
	transport.setAccount(SLAVE, {
		catalog: SLAVE_CATALOG,
		positions: [makeLive(9001, 101, "0.05", { comment: "mirror:5001" })],
		balance: Decimal.from(10_000),
	});
	const ledger = new PositionLedger();
	const sequences = { resetSequences: vi.fn() };
	const delays: number[] = [];
	const coordinator = new SessionCoordinator({
		transport,
		credentials: createCredentials({
			clientId: "test-client",
			clientSecret: "test-secret",
			masterAccessToken: "test-master-token",
			slaveAccessToken: "test-slave-token",
		}),
		masterAccountId: MASTER,
		slaveAccountId: SLAVE,
		mapper: new SymbolMapper(GOLD_ALIASES),
		ledger,
		sequences,
		reconnection: new ReconnectionPolicy({
			baseDelayMs: 100,
			maxDelayMs: 1_000,
			maxAttempts: options.maxAttempts ?? 3,
			jitterFactor: 0,
		}),
		openTimeToleranceMs: 5_000,
		...(options.positionQueries ? { positionQueries: options.positionQueries } : {}),
		logger: silentLogger(),
		clock: new FakeClock(1_000),
		sleep: async (ms) => {
			delays.push(ms);
		},
	});
	return { transport, ledger, sequences, delays, coordinator };
}

describe("SessionCoordinator", () => {
	describe("start", () => {
		it("authenticates, loads catalogs and rebuilds the ledger before running", async () => {
			const { transport, ledger, sequences, coordinator } = setup();
			const result = await coordinator.start();

			expect(result.ok).toBe(true);
			expect(coordinator.state()).toBe(SessionState.Running);
			expect(transport.calls).toEqual([
				"connect",
				"authenticateApplication:test-client",
				"authorizeAccount:10",
				"authorizeAccount:20",
				"querySymbols:10",
				"querySymbols:20",
				"subscribeExecutionEvents:10",
				"queryOpenPositions:10",
				"queryOpenPositions:20",
			]);
			expect(coordinator.history().map((h) => h.to)).toEqual([
				"connecting",
				"app_authenticated",
				"accounts_authorized",
				"subscribed",
				"running",
			]);
			expect(ledger.get(positionId(5001))?.slavePositionId).toBe(positionId(9001));
			expect(sequences.resetSequences).toHaveBeenCalledTimes(1);
		});

		it("subscribes spots for instruments in use on both accounts", async () => {
			const { transport, coordinator } = setup();
			await coordinator.start();
			expect(transport.spotSubscriptions).toEqual([
				{ accountId: MASTER, instrumentIds: [instrumentId(1)] },
				{ accountId: SLAVE, instrumentIds: [instrumentId(101)] },
			]);
		});

		it("emits the reconciliation result once running", async () => {
			const { coordinator } = setup();
			const states: SessionState[] = [];
			const sources: string[] = [];
			coordinator.events.on("reconciled", (result) => {
				states.push(coordinator.state());
				sources.push(...result.pairs.map((p) => p.source));
			});
			await coordinator.start();
			expect(states).toEqual([SessionState.Running]);
			expect(sources).toEqual([PairSource.Comment]);
		});

		it("retries transport failures with exponential backoff", async () => {
			const { transport, delays, coordinator } = setup();
			transport.failNext("connect", new TransportError("refused"), new TransportError("refused"));
			const result = await coordinator.start();
			expect(result.ok).toBe(true);
			expect(delays).toEqual([100, 200]);
			expect(transport.calls.filter((c) => c === "connect")).toHaveLength(3);
		});

		it("stops on an auth error without retrying", async () => {
			const { transport, delays, coordinator } = setup();
			const fatal = vi.fn();
			coordinator.events.on("fatal", fatal);
			transport.failNext("authenticateApplication", new AuthError("bad secret"));

			const result = await coordinator.start();
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(ErrorKind.Auth);
			expect(coordinator.state()).toBe(SessionState.Stopped);
			expect(fatal).toHaveBeenCalledTimes(1);
			expect(delays).toEqual([]);
		});

		it("gives up once reconnect attempts are exhausted", async () => {
			const { transport, coordinator } = setup({ maxAttempts: 2 });
			transport.failNext(
				"connect",
				new TransportError("refused"),
				new TransportError("refused"),
				new TransportError("refused"),
			);
			const result = await coordinator.start();
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe(ErrorKind.System);
				expect(result.error.message).toBe("Giving up after 2 reconnect attempts: refused");
			}
			expect(coordinator.state()).toBe(SessionState.Stopped);
		});
	});

	describe("event forwarding", () => {
		it("forwards master events only while running", async () => {
			const { transport, coordinator } = setup();
			const seen: ExecutionEvent[] = [];
			coordinator.events.on("execution", (event) => seen.push(event));

			transport.emitExecution(MASTER, makeEvent({ sequenceNo: 1 }));
			await coordinator.start();
			transport.emitExecution(MASTER, makeEvent({ sequenceNo: 2 }));
			transport.emitExecution(SLAVE, makeEvent({ sequenceNo: 3 }));

			expect(seen.map((e) => e.sequenceNo)).toEqual([2]);
		});

		it("buffers events that arrive during the rebuild and flushes them once running", async () => {
			const { transport, coordinator } = setup();
			transport.onQueryPositions = (account) => {
				if (account === MASTER) transport.emitExecution(MASTER, makeEvent({ sequenceNo: 7 }));
			};
			const delivered: Array<[number, SessionState]> = [];
			coordinator.events.on("execution", (event) =>
				delivered.push([event.sequenceNo, coordinator.state()]),
			);

			await coordinator.start();
			expect(delivered).toEqual([[7, SessionState.Running]]);
		});
	});

	describe("reconnect", () => {
		it("rebuilds from the previous ledger after a dropped connection", async () => {
			const { transport, sequences, coordinator } = setup();
			await coordinator.start();

			const rebuilt = new Promise<ReconcileResult>((resolve) => {
				coordinator.events.once("reconciled", resolve);
			});
			transport.drop();
			const result = await rebuilt;

			expect(coordinator.state()).toBe(SessionState.Running);
			expect(coordinator.connectionGeneration).toBe(2);
			expect(result.pairs.map((p) => p.source)).toEqual([PairSource.Previous]);
			expect(sequences.resetSequences).toHaveBeenCalledTimes(2);
			expect(coordinator.history().map((h) => h.to)).toContain(SessionState.Disconnected);
		});

		it("ignores disconnects after stop", async () => {
			const { transport, coordinator } = setup();
			await coordinator.start();
			await coordinator.stop("shutdown");
			transport.drop();

			expect(coordinator.state()).toBe(SessionState.Stopped);
			expect(transport.calls.filter((c) => c === "connect")).toHaveLength(1);
			expect(transport.closeCount).toBeGreaterThan(0);
		});

		it("stops when the transport reports a fatal error", async () => {
			const { transport, coordinator } = setup();
			await coordinator.start();
			transport.events.emit("error", new AuthError("Account access token invalidated"));
			expect(coordinator.state()).toBe(SessionState.Stopped);
		});
	});

	describe("rebuild", () => {
		it("re-reconciles on a running session", async () => {
			const { transport, ledger, coordinator } = setup();
			await coordinator.start();
			transport.setAccount(MASTER, {
				catalog: MASTER_CATALOG,
				positions: [makeLive(5001, 1, "0.1"), makeLive(5002, 1, "0.2", { openedAt: 90_000 })],
				balance: Decimal.from(20_000),
			});

			const result = await coordinator.rebuild();
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.unpairedMaster.map((p) => p.positionId)).toEqual([positionId(5002)]);
			expect(ledger.size).toBe(1);
		});

		it("refuses to rebuild before the session runs", async () => {
			const { coordinator } = setup();
			const result = await coordinator.rebuild();
			expect(result.ok).toBe(false);
		});
	});

	describe("gateway", () => {
		const order = {
			kind: "market" as const,
			instrumentId: instrumentId(101),
			side: TradeSide.Long,
			volume: Decimal.from("0.05"),
			comment: "mirror:5002",
			attemptNo: 1,
		};

		it("refuses orders while the session is not running", async () => {
			const { transport, coordinator } = setup();
			const result = await coordinator.sendOrder(order);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.message).toBe("Session is not running");
			expect(transport.orders).toEqual([]);
		});

		it("sends orders and balance queries to the slave account", async () => {
			const { transport, coordinator } = setup();
			await coordinator.start();

			const result = await coordinator.sendOrder(order);
			expect(result.ok && result.value.slavePositionId).toBe(positionId(9001));
			expect(transport.orders[0]?.accountId).toBe(SLAVE);

			const balance = await coordinator.queryBalance();
			expect(balance.ok && balance.value.toString()).toBe("10000");
		});

		it("queries open positions per broker through the data bucket", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 5, refillRate: 1, clock: new FakeClock(0) });
			const { transport, coordinator } = setup({ positionQueries: { limiter, timeoutMs: 100 } });
			await coordinator.start();

			const master = await coordinator.queryOpenPositions(Broker.Master);
			expect(master.ok && master.value.map((p) => p.positionId)).toEqual([positionId(5001)]);
			expect(transport.calls.at(-1)).toBe("queryOpenPositions:10");
			expect(limiter.getStats().hits).toBe(3);
		});

		it("fails the attempt when the data bucket stays empty", async () => {
			// One token and a frozen clock: the second position query can never run.
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 0.001, clock: new FakeClock(0) });
			const { coordinator } = setup({ maxAttempts: 1, positionQueries: { limiter, timeoutMs: 5 } });
			const result = await coordinator.start();
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe(
					"Giving up after 1 reconnect attempts: Timeout waiting for rate limit token",
				);
			}
		});

		it("keeps the latest spot quotes", async () => {
			const { transport, coordinator } = setup();
			transport.emitSpot(SLAVE, {
				instrumentId: instrumentId(101),
				bid: Decimal.from("1.1"),
				ask: Decimal.from("1.1002"),
				receivedAt: 1,
			});
			expect(coordinator.quotes.mid(SLAVE, instrumentId(101))?.toString()).toBe("1.1001");
		});
	});
});
