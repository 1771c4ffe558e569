export { PositionLedger } from "./position-ledger.js";
export {
	PairSource,
	mirrorComment,
	parseMirrorComment,
	reconcile,
} from "./reconciliation.js";
export type { ReconcileInput, ReconcilePair, ReconcileResult } from "./reconciliation.js";
export type { LivePosition, MirroredPosition } from "./types.js";
