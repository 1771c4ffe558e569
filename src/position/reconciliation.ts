import { Decimal } from "../shared/decimal.js";
import type { InstrumentId, PositionId } from "../shared/identifiers.js";
import type { LivePosition, MirroredPosition } from "./types.js";

const COMMENT_PREFIX = "mirror:";

/** Order comment attached to every slave order, used to find the pair again later. */
export function mirrorComment(masterPositionId: PositionId): string {
	return `${COMMENT_PREFIX}${masterPositionId}`;
}

/** Master position id carried by a slave comment, or null. */
export function parseMirrorComment(comment: string | null): number | null {
	if (comment === null || !comment.startsWith(COMMENT_PREFIX)) return null;
	const raw = comment.slice(COMMENT_PREFIX.length);
	if (!/^\d+$/.test(raw)) return null;
	const value = Number(raw);
	return Number.isSafeInteger(value) ? value : null;
}

export const PairSource = {
	Previous: "previous",
	Comment: "comment",
	Heuristic: "heuristic",
} as const;

export type PairSource = (typeof PairSource)[keyof typeof PairSource];

export interface ReconcilePair {
	readonly master: LivePosition;
	readonly slave: LivePosition;
	readonly source: PairSource;
}

export interface ReconcileInput {
	/** Ledger contents before the connection gap */
	readonly previous: readonly MirroredPosition[];
	readonly master: readonly LivePosition[];
	readonly slave: readonly LivePosition[];
	/** Slave instrument for a master instrument, or null when unmapped */
	readonly mapInstrument: (masterInstrument: InstrumentId) => InstrumentId | null;
	/** Expected slave/master volume ratio for an instrument, or null when unknown */
	readonly expectedRatio: (masterInstrument: InstrumentId) => Decimal | null;
	readonly openTimeToleranceMs: number;
}

export interface ReconcileResult {
	readonly positions: readonly MirroredPosition[];
	readonly pairs: readonly ReconcilePair[];
	/** Live master positions with no slave counterpart */
	readonly unpairedMaster: readonly LivePosition[];
	/** Live slave positions no master position claims */
	readonly orphanedSlave: readonly LivePosition[];
	readonly summary: string;
}

interface Candidate {
	readonly master: LivePosition;
	readonly slave: LivePosition;
	readonly score: number;
}

function heuristicScore(
	master: LivePosition,
	slave: LivePosition,
	input: ReconcileInput,
): number | null {
	if (slave.side !== master.side) return null;
	if (input.mapInstrument(master.instrumentId) !== slave.instrumentId) return null;
	const gap = Math.abs(slave.openedAt - master.openedAt);
	if (gap > input.openTimeToleranceMs) return null;

	const timeScore = input.openTimeToleranceMs === 0 ? 0 : gap / input.openTimeToleranceMs;
	const expected = input.expectedRatio(master.instrumentId);
	if (expected === null || !expected.isPositive() || !master.volume.isPositive()) {
		return timeScore;
	}
	const ratio = slave.volume.div(master.volume);
	const deviation = ratio.div(expected).sub(Decimal.one()).abs().toNumber();
	return timeScore + deviation;
}

function toMirrored(pair: ReconcilePair, previous: MirroredPosition | undefined): MirroredPosition {
	return {
		instrumentId: pair.master.instrumentId,
		slaveInstrumentId: pair.slave.instrumentId,
		masterPositionId: pair.master.positionId,
		slavePositionId: pair.slave.positionId,
		side: pair.master.side,
		masterVolume: pair.master.volume,
		slaveVolume: pair.slave.volume,
		openMasterVolume: previous?.openMasterVolume ?? pair.master.volume,
		openSlaveVolume: previous?.openSlaveVolume ?? pair.slave.volume,
		openedAt: previous?.openedAt ?? pair.master.openedAt,
		stillFilling: false,
	};
}

export function reconcileSummary(
	result: Pick<ReconcileResult, "pairs" | "unpairedMaster" | "orphanedSlave">,
): string {
	return `Reconciled ${result.pairs.length} pairs, ${result.unpairedMaster.length} unpaired master, ${result.orphanedSlave.length} orphaned slave`;
}

/**
 * Rebuild the master↔slave pairing from live positions.
 *
 * Pairs are taken in order of confidence: a pair the previous ledger already
 * knew, then a slave whose comment names the master position, then the best
 * heuristic match on instrument, side, open time and volume ratio. Nothing
 * here fails; leftovers on either side are reported.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
	const masterById = new Map(input.master.map((p) => [p.positionId, p]));
	const slaveById = new Map(input.slave.map((p) => [p.positionId, p]));
	const previousByMaster = new Map(input.previous.map((p) => [p.masterPositionId, p]));
	const usedMaster = new Set<PositionId>();
	const usedSlave = new Set<PositionId>();
	const pairs: ReconcilePair[] = [];

	const take = (master: LivePosition, slave: LivePosition, source: PairSource): void => {
		usedMaster.add(master.positionId);
		usedSlave.add(slave.positionId);
		pairs.push({ master, slave, source });
	};

	for (const prev of input.previous) {
		if (prev.slavePositionId === null) continue;
		const master = masterById.get(prev.masterPositionId);
		const slave = slaveById.get(prev.slavePositionId);
		if (master && slave && !usedSlave.has(slave.positionId)) {
			take(master, slave, PairSource.Previous);
		}
	}

	for (const slave of input.slave) {
		if (usedSlave.has(slave.positionId)) continue;
		const claimed = parseMirrorComment(slave.comment);
		if (claimed === null) continue;
		const master = input.master.find((m) => m.positionId === claimed);
		if (master && !usedMaster.has(master.positionId)) {
			take(master, slave, PairSource.Comment);
		}
	}

	const candidates: Candidate[] = [];
	for (const master of input.master) {
		if (usedMaster.has(master.positionId)) continue;
		for (const slave of input.slave) {
			if (usedSlave.has(slave.positionId)) continue;
			const score = heuristicScore(master, slave, input);
			if (score !== null) candidates.push({ master, slave, score });
		}
	}
	candidates.sort(
		(a, b) =>
			a.score - b.score ||
			a.master.positionId - b.master.positionId ||
			a.slave.positionId - b.slave.positionId,
	);
	for (const candidate of candidates) {
		if (usedMaster.has(candidate.master.positionId) || usedSlave.has(candidate.slave.positionId)) {
			continue;
		}
		take(candidate.master, candidate.slave, PairSource.Heuristic);
	}

	const unpairedMaster = input.master.filter((p) => !usedMaster.has(p.positionId));
	const orphanedSlave = input.slave.filter((p) => !usedSlave.has(p.positionId));
	const positions = pairs.map((pair) =>
		toMirrored(pair, previousByMaster.get(pair.master.positionId)),
	);

	return {
		positions,
		pairs,
		unpairedMaster,
		orphanedSlave,
		summary: reconcileSummary({ pairs, unpairedMaster, orphanedSlave }),
	};
}
