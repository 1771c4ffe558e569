/**
 * Volume sizing types.
 *
 * A VolumePolicy is a closed set of tagged variants; the calculator has one
 * evaluation function per variant and never inspects runtime types.
 */

import type { Decimal } from "../shared/decimal.js";
import type { PolicyFallbackWarning } from "../shared/errors.js";
import type { InstrumentSpec } from "../symbols/types.js";

export const PolicyKind = {
	GlobalMultiplier: "global_multiplier",
	InstrumentMultiplier: "instrument_multiplier",
	BalancePercentage: "balance_percentage",
	PipEqualization: "pip_equalization",
} as const;

export type PolicyKind = (typeof PolicyKind)[keyof typeof PolicyKind];

export interface GlobalMultiplierPolicy {
	readonly kind: typeof PolicyKind.GlobalMultiplier;
	readonly multiplier: Decimal;
}

/**
 * Multipliers keyed by upper-cased symbol name. The master name is tried
 * first, then the slave name.
 */
export interface InstrumentMultiplierPolicy {
	readonly kind: typeof PolicyKind.InstrumentMultiplier;
	readonly multipliers: ReadonlyMap<string, Decimal>;
	readonly defaultMultiplier: Decimal;
}

export interface BalancePercentagePolicy {
	readonly kind: typeof PolicyKind.BalancePercentage;
	/** Fraction of slave balance put at risk per trade, e.g. 0.02 */
	readonly lotPercentage: Decimal;
	readonly microLotsPerDollar: ReadonlyMap<string, Decimal>;
	readonly defaultMicroLotsPerDollar: Decimal;
}

export interface PipEqualizationPolicy {
	readonly kind: typeof PolicyKind.PipEqualization;
	/** 1 = equal monetary risk per pip, 0.5 = half the master's risk */
	readonly riskRatio: Decimal;
	/** Global multiplier used when pip values are unavailable */
	readonly fallbackMultiplier: Decimal;
}

export type VolumePolicy =
	| GlobalMultiplierPolicy
	| InstrumentMultiplierPolicy
	| BalancePercentagePolicy
	| PipEqualizationPolicy;

/** Post-processing bounds applied to every computed volume. */
export interface SizingLimits {
	readonly minLotSize: Decimal;
	readonly maxLotMultiplier: Decimal;
}

/** Account context the policies may read. Unused fields may be null. */
export interface AccountSnapshot {
	readonly slaveBalance: Decimal | null;
	readonly masterPipValue: Decimal | null;
	readonly slavePipValue: Decimal | null;
}

export interface VolumeInput {
	/** Slave-side instrument; its lot step drives rounding */
	readonly instrument: InstrumentSpec;
	/** Master-side symbol name, the preferred key for per-instrument tables */
	readonly masterSymbol: string;
	readonly masterVolume: Decimal;
	readonly policy: VolumePolicy;
	readonly account: AccountSnapshot;
	readonly limits: SizingLimits;
}

export type VolumeAdjustment =
	| { readonly kind: "raised_to_min"; readonly from: Decimal; readonly to: Decimal }
	| { readonly kind: "capped"; readonly from: Decimal; readonly to: Decimal }
	| { readonly kind: "rounded"; readonly from: Decimal; readonly to: Decimal };

export interface VolumeComputation {
	readonly volume: Decimal;
	/** Volume produced by the policy before post-processing */
	readonly rawVolume: Decimal;
	readonly policy: PolicyKind;
	readonly adjustments: readonly VolumeAdjustment[];
	readonly fallback: PolicyFallbackWarning | null;
}
