import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { instrumentId, positionId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { makeLive, makeMirrored } from "./position-test-helpers.js";
import {
	PairSource,
	type ReconcileInput,
	mirrorComment,
	parseMirrorComment,
	reconcile,
} from "./reconciliation.js";

function input(overrides: Partial<ReconcileInput>): ReconcileInput {
	return {
		previous: [],
		master: [],
		slave: [],
		mapInstrument: (id) => (id === instrumentId(1) ? instrumentId(101) : null),
		expectedRatio: () => Decimal.from("0.5"),
		openTimeToleranceMs: 5_000,
		...overrides,
	};
}

describe("mirror comments", () => {
	it("round-trips the master position id", () => {
		expect(mirrorComment(positionId(5001))).toBe("mirror:5001");
		expect(parseMirrorComment("mirror:5001")).toBe(5001);
	});

	it("ignores foreign comments", () => {
		expect(parseMirrorComment(null)).toBeNull();
		expect(parseMirrorComment("Copied from master")).toBeNull();
		expect(parseMirrorComment("mirror:")).toBeNull();
		expect(parseMirrorComment("mirror:12a")).toBeNull();
	});
});

describe("reconcile", () => {
	it("keeps pairs the previous ledger knew, with their open volumes", () => {
		const previous = makeMirrored({
			openMasterVolume: Decimal.from("0.2"),
			openSlaveVolume: Decimal.from("0.1"),
			openedAt: 42,
		});
		const result = reconcile(
			input({
				previous: [previous],
				master: [makeLive(5001, 1, "0.1", { openedAt: 0 })],
				slave: [makeLive(9001, 101, "0.05", { openedAt: 60_000 })],
			}),
		);

		expect(result.pairs.map((p) => p.source)).toEqual([PairSource.Previous]);
		const [position] = result.positions;
		expect(position?.slavePositionId).toBe(9001);
		expect(position?.openMasterVolume.toString()).toBe("0.2");
		expect(position?.openSlaveVolume.toString()).toBe("0.1");
		expect(position?.openedAt).toBe(42);
	});

	it("pairs by the mirror comment on the slave", () => {
		const result = reconcile(
			input({
				master: [makeLive(5002, 1, "0.1", { openedAt: 0 })],
				slave: [makeLive(9002, 101, "0.05", { openedAt: 600_000, comment: "mirror:5002" })],
			}),
		);

		expect(result.pairs).toHaveLength(1);
		expect(result.pairs[0]?.source).toBe(PairSource.Comment);
		expect(result.positions[0]?.masterVolume.toString()).toBe("0.1");
		expect(result.positions[0]?.openSlaveVolume.toString()).toBe("0.05");
	});

	it("picks the closest heuristic match and reports the rest", () => {
		const result = reconcile(
			input({
				master: [makeLive(5003, 1, "0.2", { openedAt: 10_000 })],
				slave: [
					makeLive(9004, 101, "0.3", { openedAt: 10_200 }),
					makeLive(9003, 101, "0.1", { openedAt: 10_500 }),
				],
			}),
		);

		expect(result.pairs).toHaveLength(1);
		expect(result.pairs[0]?.source).toBe(PairSource.Heuristic);
		expect(result.pairs[0]?.slave.positionId).toBe(9003);
		expect(result.orphanedSlave.map((p) => p.positionId)).toEqual([9004]);
		expect(result.summary).toBe("Reconciled 1 pairs, 0 unpaired master, 1 orphaned slave");
	});

	it("leaves masters unpaired when side, instrument or open time disagree", () => {
		const result = reconcile(
			input({
				master: [
					makeLive(1, 1, "0.1", { openedAt: 0 }),
					makeLive(2, 1, "0.1", { openedAt: 0, side: TradeSide.Short }),
					makeLive(3, 3, "0.1", { openedAt: 0 }),
				],
				slave: [makeLive(11, 101, "0.05", { openedAt: 6_000 })],
			}),
		);

		expect(result.pairs).toHaveLength(0);
		expect(result.unpairedMaster.map((p) => p.positionId)).toEqual([1, 2, 3]);
		expect(result.orphanedSlave.map((p) => p.positionId)).toEqual([11]);
	});

	it("does not hand one slave position to two masters", () => {
		const result = reconcile(
			input({
				master: [makeLive(1, 1, "0.1", { openedAt: 1_000 }), makeLive(2, 1, "0.1", { openedAt: 1_100 })],
				slave: [makeLive(11, 101, "0.05", { openedAt: 1_050, comment: "mirror:2" })],
			}),
		);

		expect(result.pairs.map((p) => [p.master.positionId, p.slave.positionId])).toEqual([[2, 11]]);
		expect(result.unpairedMaster.map((p) => p.positionId)).toEqual([1]);
	});

	it("returns an empty result for empty accounts", () => {
		const result = reconcile(input({ previous: [makeMirrored()] }));
		expect(result.positions).toEqual([]);
		expect(result.summary).toBe("Reconciled 0 pairs, 0 unpaired master, 0 orphaned slave");
	});
});
