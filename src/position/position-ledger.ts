/**
 * PositionLedger: open master↔slave pairs keyed by master position id.
 *
 * Every method is synchronous, so a single call is atomic on the event loop.
 * Sequences that span an await (check, send order, mutate) run inside
 * `withLock` for the key.
 *
 * A rebuild reads the venue over several awaits while workers keep writing.
 * It opens a write log first and hands the returned revision to
 * `replaceAll`, which keeps the current state of every id written since.
 */

import { ValidationError } from "../lib/validation/index.js";
import type { Decimal } from "../shared/decimal.js";
import { DuplicateKeyError, NotFoundError } from "../shared/errors.js";
import type { PositionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { MirroredPosition } from "./types.js";

export class PositionLedger {
	private readonly positions = new Map<PositionId, MirroredPosition>();
	private readonly locks = new Map<PositionId, Promise<void>>();
	/** Revision of the last write per id, kept while a write log is open */
	private readonly writes = new Map<PositionId, number>();
	private revision = 0;
	private openLogs = 0;

	get size(): number {
		return this.positions.size;
	}

	has(id: PositionId): boolean {
		return this.positions.has(id);
	}

	get(id: PositionId): MirroredPosition | null {
		return this.positions.get(id) ?? null;
	}

	/** Insert a newly opened pair. Fails if the master position is already tracked. */
	upsertOpen(position: MirroredPosition): Result<MirroredPosition, DuplicateKeyError> {
		if (this.positions.has(position.masterPositionId)) {
			return err(
				new DuplicateKeyError(`Position ${position.masterPositionId} is already in the ledger`, {
					masterPositionId: position.masterPositionId,
				}),
			);
		}
		const entry = Object.freeze({ ...position });
		this.positions.set(position.masterPositionId, entry);
		this.touch(position.masterPositionId);
		return ok(entry);
	}

	/**
	 * Record further fills of the opening order. The added volumes count as
	 * open-time volume, so later partial closes scale from the full fill.
	 */
	increase(
		id: PositionId,
		newMasterVolume: Decimal,
		addedSlaveVolume: Decimal,
		stillFilling: boolean,
	): Result<MirroredPosition, NotFoundError | ValidationError> {
		const current = this.positions.get(id);
		if (!current) {
			return err(new NotFoundError(`Position ${id} is not in the ledger`, { masterPositionId: id }));
		}
		const addedMaster = newMasterVolume.sub(current.masterVolume);
		if (addedMaster.isNegative() || addedSlaveVolume.isNegative()) {
			return err(
				new ValidationError("A fill cannot reduce ledger volumes", [
					{ path: ["masterVolume"], message: newMasterVolume.toString() },
					{ path: ["slaveVolume"], message: addedSlaveVolume.toString() },
				]),
			);
		}
		const next = Object.freeze({
			...current,
			masterVolume: newMasterVolume,
			slaveVolume: current.slaveVolume.add(addedSlaveVolume),
			openMasterVolume: current.openMasterVolume.add(addedMaster),
			openSlaveVolume: current.openSlaveVolume.add(addedSlaveVolume),
			stillFilling,
		});
		this.positions.set(id, next);
		this.touch(id);
		return ok(next);
	}

	/** Record a partial close on both sides. Ends any pending opening fill. */
	adjust(
		id: PositionId,
		newMasterVolume: Decimal,
		newSlaveVolume: Decimal,
	): Result<MirroredPosition, NotFoundError | ValidationError> {
		const current = this.positions.get(id);
		if (!current) {
			return err(new NotFoundError(`Position ${id} is not in the ledger`, { masterPositionId: id }));
		}
		if (newMasterVolume.isNegative() || newSlaveVolume.isNegative()) {
			return err(
				new ValidationError("Ledger volumes must be non-negative", [
					{ path: ["masterVolume"], message: newMasterVolume.toString() },
					{ path: ["slaveVolume"], message: newSlaveVolume.toString() },
				]),
			);
		}
		const next = Object.freeze({
			...current,
			masterVolume: newMasterVolume,
			slaveVolume: newSlaveVolume,
			stillFilling: false,
		});
		this.positions.set(id, next);
		this.touch(id);
		return ok(next);
	}

	remove(id: PositionId): Result<MirroredPosition, NotFoundError> {
		const current = this.positions.get(id);
		if (!current) {
			return err(new NotFoundError(`Position ${id} is not in the ledger`, { masterPositionId: id }));
		}
		this.positions.delete(id);
		this.touch(id);
		return ok(current);
	}

	/** Frozen copy of every entry, in insertion order. */
	snapshot(): readonly MirroredPosition[] {
		return Object.freeze([...this.positions.values()]);
	}

	/** Start recording writes. Returns the revision to pass to `replaceAll`. */
	openWriteLog(): number {
		this.openLogs += 1;
		return this.revision;
	}

	closeWriteLog(): void {
		this.openLogs = Math.max(0, this.openLogs - 1);
		if (this.openLogs === 0) this.writes.clear();
	}

	/**
	 * Swap the whole table for a reconciled one. With `since`, ids written
	 * after that revision keep their current entry (or stay absent) and are
	 * returned.
	 */
	replaceAll(positions: readonly MirroredPosition[], since?: number): ReadonlySet<PositionId> {
		const kept = new Map<PositionId, MirroredPosition | null>();
		if (since !== undefined) {
			for (const [id, revision] of this.writes) {
				if (revision > since) kept.set(id, this.positions.get(id) ?? null);
			}
		}

		this.positions.clear();
		for (const position of positions) {
			if (kept.has(position.masterPositionId)) continue;
			this.positions.set(position.masterPositionId, Object.freeze({ ...position }));
		}
		for (const [id, entry] of kept) {
			if (entry) this.positions.set(id, entry);
		}
		return new Set(kept.keys());
	}

	private touch(id: PositionId): void {
		this.revision += 1;
		if (this.openLogs > 0) this.writes.set(id, this.revision);
	}

	/**
	 * Run `fn` after every earlier `withLock` call for the same id has
	 * settled. Calls for different ids do not wait on each other.
	 */
	async withLock<T>(id: PositionId, fn: () => Promise<T> | T): Promise<T> {
		const previous = this.locks.get(id) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.locks.set(id, tail);

		await previous;
		try {
			return await fn();
		} finally {
			release();
			if (this.locks.get(id) === tail) this.locks.delete(id);
		}
	}
}
