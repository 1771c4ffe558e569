/**
 * Volume calculator: maps a master volume to the slave volume under a policy.
 *
 * Pure and deterministic: no I/O, no clock, no logging. Clamp and fallback
 * notes are returned to the caller, which logs them under [VOLUME].
 */

import { Decimal } from "../shared/decimal.js";
import type { PolicyFallbackWarning } from "../shared/errors.js";
import { idToNumber } from "../shared/identifiers.js";
import { normalizeSymbolName } from "../symbols/symbol-mapper.js";
import {
	type AccountSnapshot,
	type BalancePercentagePolicy,
	type GlobalMultiplierPolicy,
	type InstrumentMultiplierPolicy,
	type PipEqualizationPolicy,
	PolicyKind,
	type SizingLimits,
	type VolumeAdjustment,
	type VolumeComputation,
	type VolumeInput,
	type VolumePolicy,
} from "./types.js";

/** 1 lot = 100 micro-lots. */
export const MICRO_LOTS_PER_LOT = Decimal.from(100);

const PRECEDENCE: readonly PolicyKind[] = [
	PolicyKind.GlobalMultiplier,
	PolicyKind.InstrumentMultiplier,
	PolicyKind.BalancePercentage,
	PolicyKind.PipEqualization,
];

/**
 * Pick the policy to run when several are configured:
 * global > per-instrument > balance-percentage > pip-equalization.
 * @returns null when the list is empty
 */
export function selectPolicy(configured: readonly VolumePolicy[]): VolumePolicy | null {
	for (const kind of PRECEDENCE) {
		const match = configured.find((p) => p.kind === kind);
		if (match) return match;
	}
	return null;
}

/** Whether the policy needs a live slave balance in the account snapshot. */
export function policyNeedsBalance(policy: VolumePolicy): boolean {
	return policy.kind === PolicyKind.BalancePercentage;
}

/** Whether the policy reads pip values from the account snapshot. */
export function policyNeedsPipValues(policy: VolumePolicy): boolean {
	return policy.kind === PolicyKind.PipEqualization;
}

// ── Policy evaluation ────────────────────────────────────────────────

function lookup(
	table: ReadonlyMap<string, Decimal>,
	input: VolumeInput,
	fallback: Decimal,
): Decimal {
	return (
		table.get(normalizeSymbolName(input.masterSymbol)) ??
		table.get(normalizeSymbolName(input.instrument.name)) ??
		fallback
	);
}

interface PolicyVolume {
	readonly volume: Decimal;
	readonly fallback: PolicyFallbackWarning | null;
}

function evalGlobal(policy: GlobalMultiplierPolicy, masterVolume: Decimal): PolicyVolume {
	return { volume: masterVolume.mul(policy.multiplier), fallback: null };
}

function evalInstrument(policy: InstrumentMultiplierPolicy, input: VolumeInput): PolicyVolume {
	const multiplier = lookup(policy.multipliers, input, policy.defaultMultiplier);
	return { volume: input.masterVolume.mul(multiplier), fallback: null };
}

function evalBalance(
	policy: BalancePercentagePolicy,
	input: VolumeInput,
	account: AccountSnapshot,
): PolicyVolume {
	const balance = account.slaveBalance ?? Decimal.zero();
	const riskAmount = balance.mul(policy.lotPercentage);
	const perDollar = lookup(policy.microLotsPerDollar, input, policy.defaultMicroLotsPerDollar);
	const microLots = riskAmount.mul(perDollar);
	return { volume: microLots.div(MICRO_LOTS_PER_LOT), fallback: null };
}

function evalPip(
	policy: PipEqualizationPolicy,
	input: VolumeInput,
	account: AccountSnapshot,
): PolicyVolume {
	const { masterVolume, instrument } = input;
	const { masterPipValue, slavePipValue } = account;
	if (
		masterPipValue !== null &&
		slavePipValue !== null &&
		masterPipValue.isPositive() &&
		slavePipValue.isPositive()
	) {
		const ratio = masterPipValue.div(slavePipValue).mul(policy.riskRatio);
		return { volume: masterVolume.mul(ratio), fallback: null };
	}

	const missing: ("master" | "slave")[] = [];
	if (masterPipValue === null || !masterPipValue.isPositive()) missing.push("master");
	if (slavePipValue === null || !slavePipValue.isPositive()) missing.push("slave");
	return {
		volume: masterVolume.mul(policy.fallbackMultiplier),
		fallback: {
			kind: "policy_fallback",
			instrumentId: idToNumber(instrument.id),
			missing,
			fallbackMultiplier: policy.fallbackMultiplier.toString(),
		},
	};
}

function evaluatePolicy(input: VolumeInput): PolicyVolume {
	const { policy, account } = input;
	switch (policy.kind) {
		case PolicyKind.GlobalMultiplier:
			return evalGlobal(policy, input.masterVolume);
		case PolicyKind.InstrumentMultiplier:
			return evalInstrument(policy, input);
		case PolicyKind.BalancePercentage:
			return evalBalance(policy, input, account);
		case PolicyKind.PipEqualization:
			return evalPip(policy, input, account);
	}
}

// ── Post-processing ─────────────────────────────────────────────────

/**
 * Raise to the minimum lot, cap at maxLotMultiplier × master volume, round to
 * the lot step. Rounding goes half-up unless that would land above the cap,
 * in which case it goes down. Idempotent: postProcess(postProcess(v)) equals
 * postProcess(v).
 */
export function postProcess(
	volume: Decimal,
	masterVolume: Decimal,
	limits: SizingLimits,
	lotStep: Decimal,
): { readonly volume: Decimal; readonly adjustments: readonly VolumeAdjustment[] } {
	const adjustments: VolumeAdjustment[] = [];
	let current = volume;

	if (current.lt(limits.minLotSize)) {
		adjustments.push({ kind: "raised_to_min", from: current, to: limits.minLotSize });
		current = limits.minLotSize;
	}

	const cap = masterVolume.mul(limits.maxLotMultiplier);
	if (current.gt(cap)) {
		adjustments.push({ kind: "capped", from: current, to: cap });
		current = cap;
	}

	let rounded = current.roundToStep(lotStep);
	if (rounded.gt(cap)) rounded = current.roundToStep(lotStep, "down");
	if (!rounded.eq(current)) {
		adjustments.push({ kind: "rounded", from: current, to: rounded });
		current = rounded;
	}

	return { volume: current, adjustments };
}

/** Compute the slave volume for one master volume under the given policy. */
export function computeSlaveVolume(input: VolumeInput): VolumeComputation {
	const evaluated = evaluatePolicy(input);
	const processed = postProcess(
		evaluated.volume,
		input.masterVolume,
		input.limits,
		input.instrument.lotStep,
	);
	return {
		volume: processed.volume,
		rawVolume: evaluated.volume,
		policy: input.policy.kind,
		adjustments: processed.adjustments,
		fallback: evaluated.fallback,
	};
}
