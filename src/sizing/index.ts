export type {
	AccountSnapshot,
	BalancePercentagePolicy,
	GlobalMultiplierPolicy,
	InstrumentMultiplierPolicy,
	PipEqualizationPolicy,
	SizingLimits,
	VolumeAdjustment,
	VolumeComputation,
	VolumeInput,
	VolumePolicy,
} from "./types.js";
export { PolicyKind } from "./types.js";
export { pipSize, pipValuePerLot, unitsPerLot } from "./pip-value.js";
export {
	MICRO_LOTS_PER_LOT,
	computeSlaveVolume,
	policyNeedsBalance,
	policyNeedsPipValues,
	postProcess,
	selectPolicy,
} from "./volume-calculator.js";
