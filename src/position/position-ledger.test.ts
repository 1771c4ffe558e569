import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { DuplicateKeyError, NotFoundError } from "../shared/errors.js";
import { positionId } from "../shared/identifiers.js";
import { PositionLedger } from "./position-ledger.js";
import { makeMirrored } from "./position-test-helpers.js";

const ID = positionId(5001);

describe("PositionLedger", () => {
	it("stores an opened pair", () => {
		const ledger = new PositionLedger();
		const result = ledger.upsertOpen(makeMirrored());
		expect(result.ok).toBe(true);
		expect(ledger.has(ID)).toBe(true);
		expect(ledger.size).toBe(1);
		expect(ledger.get(ID)?.slaveVolume.toString()).toBe("0.05");
	});

	it("rejects a second open for the same master position", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored());
		const result = ledger.upsertOpen(makeMirrored({ slaveVolume: Decimal.from("1") }));
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(DuplicateKeyError);
		expect(ledger.get(ID)?.slaveVolume.toString()).toBe("0.05");
	});

	it("adjusts volumes and keeps the open-time volumes", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored());
		const result = ledger.adjust(ID, Decimal.from("0.06"), Decimal.from("0.03"));
		expect(result.ok).toBe(true);
		const entry = ledger.get(ID);
		expect(entry?.masterVolume.toString()).toBe("0.06");
		expect(entry?.slaveVolume.toString()).toBe("0.03");
		expect(entry?.openMasterVolume.toString()).toBe("0.1");
	});

	it("adds later opening fills to the current and open-time volumes", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(
			makeMirrored({
				masterVolume: Decimal.from("0.05"),
				slaveVolume: Decimal.from("0.03"),
				openMasterVolume: Decimal.from("0.05"),
				openSlaveVolume: Decimal.from("0.03"),
				stillFilling: true,
			}),
		);
		const result = ledger.increase(ID, Decimal.from("0.1"), Decimal.from("0.02"), false);
		expect(result.ok).toBe(true);
		const entry = ledger.get(ID);
		expect(entry?.masterVolume.toString()).toBe("0.1");
		expect(entry?.slaveVolume.toString()).toBe("0.05");
		expect(entry?.openMasterVolume.toString()).toBe("0.1");
		expect(entry?.openSlaveVolume.toString()).toBe("0.05");
		expect(entry?.stillFilling).toBe(false);
	});

	it("refuses an increase below the current master volume", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored({ stillFilling: true }));
		const result = ledger.increase(ID, Decimal.from("0.05"), Decimal.zero(), true);
		expect(result.ok).toBe(false);
		expect(ledger.get(ID)?.masterVolume.toString()).toBe("0.1");
	});

	it("ends a pending opening fill on partial close", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored({ stillFilling: true }));
		ledger.adjust(ID, Decimal.from("0.06"), Decimal.from("0.03"));
		expect(ledger.get(ID)?.stillFilling).toBe(false);
	});

	it("rejects negative volumes", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored());
		const result = ledger.adjust(ID, Decimal.from("-0.01"), Decimal.zero());
		expect(result.ok).toBe(false);
		expect(ledger.get(ID)?.masterVolume.toString()).toBe("0.1");
	});

	it("reports NotFoundError for unknown ids", () => {
		const ledger = new PositionLedger();
		const adjusted = ledger.adjust(ID, Decimal.one(), Decimal.one());
		const removed = ledger.remove(ID);
		expect(adjusted.ok ? null : adjusted.error).toBeInstanceOf(NotFoundError);
		expect(removed.ok ? null : removed.error).toBeInstanceOf(NotFoundError);
	});

	it("hands out snapshots that later mutations do not touch", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored());
		const before = ledger.snapshot();
		ledger.remove(ID);
		expect(before).toHaveLength(1);
		expect(ledger.snapshot()).toHaveLength(0);
		expect(Object.isFrozen(before)).toBe(true);
	});

	it("replaces every entry on rebuild", () => {
		const ledger = new PositionLedger();
		ledger.upsertOpen(makeMirrored());
		ledger.replaceAll([makeMirrored({ masterPositionId: positionId(7) })]);
		expect(ledger.has(ID)).toBe(false);
		expect(ledger.has(positionId(7))).toBe(true);
	});

	describe("write log", () => {
		it("keeps entries written after the mark and reports them", () => {
			const ledger = new PositionLedger();
			ledger.upsertOpen(makeMirrored({ masterPositionId: positionId(1) }));
			const since = ledger.openWriteLog();

			ledger.upsertOpen(makeMirrored());
			const kept = ledger.replaceAll([makeMirrored({ masterPositionId: positionId(7) })], since);
			ledger.closeWriteLog();

			expect([...kept]).toEqual([ID]);
			expect(ledger.get(ID)?.slavePositionId).toBe(positionId(9001));
			expect(ledger.has(positionId(7))).toBe(true);
			expect(ledger.has(positionId(1))).toBe(false);
		});

		it("keeps a removal made after the mark", () => {
			const ledger = new PositionLedger();
			ledger.upsertOpen(makeMirrored());
			const since = ledger.openWriteLog();

			ledger.remove(ID);
			const kept = ledger.replaceAll([makeMirrored()], since);
			ledger.closeWriteLog();

			expect([...kept]).toEqual([ID]);
			expect(ledger.has(ID)).toBe(false);
		});

		it("prefers the reconciled entry for ids written before the mark", () => {
			const ledger = new PositionLedger();
			ledger.upsertOpen(makeMirrored());
			const since = ledger.openWriteLog();

			const kept = ledger.replaceAll([makeMirrored({ slaveVolume: Decimal.from("0.04") })], since);
			ledger.closeWriteLog();

			expect(kept.size).toBe(0);
			expect(ledger.get(ID)?.slaveVolume.toString()).toBe("0.04");
		});

		it("records nothing once every log is closed", () => {
			const ledger = new PositionLedger();
			const since = ledger.openWriteLog();
			ledger.closeWriteLog();

			ledger.upsertOpen(makeMirrored());
			const kept = ledger.replaceAll([], since);
			expect(kept.size).toBe(0);
			expect(ledger.size).toBe(0);
		});
	});

	describe("withLock", () => {
		it("serializes work on the same id", async () => {
			const ledger = new PositionLedger();
			const order: string[] = [];
			let releaseFirst: () => void = () => {};
			const gate = new Promise<void>((resolve) => {
				releaseFirst = resolve;
			});

			const first = ledger.withLock(ID, async () => {
				order.push("first:start");
				await gate;
				order.push("first:end");
			});
			const second = ledger.withLock(ID, () => {
				order.push("second");
			});

			for (let i = 0; i < 5; i++) await Promise.resolve();
			expect(order).toEqual(["first:start"]);
			releaseFirst();
			await Promise.all([first, second]);
			expect(order).toEqual(["first:start", "first:end", "second"]);
		});

		it("does not block other ids", async () => {
			const ledger = new PositionLedger();
			const never = new Promise<void>(() => {});
			void ledger.withLock(ID, () => never);
			await expect(ledger.withLock(positionId(2), () => "free")).resolves.toBe("free");
		});

		it("releases the lock when the callback throws", async () => {
			const ledger = new PositionLedger();
			await expect(
				ledger.withLock(ID, () => {
					throw new Error("boom");
				}),
			).rejects.toThrow("boom");
			await expect(ledger.withLock(ID, () => 1)).resolves.toBe(1);
		});
	});

	it("tracks an open, any number of partial closes, then a close", () => {
		// Each step keeps between 1 and 99 percent of the previous master volume.
		const steps = fc.array(fc.integer({ min: 1, max: 99 }), { maxLength: 8 });
		fc.assert(
			fc.property(steps, (keeps) => {
				const ledger = new PositionLedger();
				ledger.upsertOpen(makeMirrored({ masterVolume: Decimal.from(100), slaveVolume: Decimal.from(50) }));
				expect(ledger.has(ID)).toBe(true);

				let previous = Decimal.from(100);
				for (const keep of keeps) {
					const next = previous.mul(Decimal.from(keep)).div(Decimal.from(100));
					const result = ledger.adjust(ID, next, next.div(Decimal.from(2)));
					expect(result.ok).toBe(true);
					const current = ledger.get(ID)?.masterVolume;
					expect(current?.lt(previous)).toBe(true);
					previous = next;
				}

				expect(ledger.remove(ID).ok).toBe(true);
				expect(ledger.has(ID)).toBe(false);
			}),
		);
	});
});
