export { EventClassifier } from "./event-classifier.js";
export type { EventClassifierConfig } from "./event-classifier.js";
export { SequenceTracker } from "./sequence-tracker.js";
export type { SequenceCheck } from "./sequence-tracker.js";
export {
	DecisionAction,
	ExecutionKind,
	POSITION_IMPACTING_KINDS,
	SkipReason,
} from "./types.js";
export type {
	AdjustDecision,
	CloseDecision,
	CopyDecision,
	ExecutionEvent,
	IncreaseDecision,
	LedgerReader,
	OpenDecision,
	SkipDecision,
} from "./types.js";
