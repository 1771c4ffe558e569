/**
 * Decimal: exact fixed-point math for volumes, balances and multipliers.
 *
 * Immutable, BigInt-backed with 18 fractional digits. Lot volumes, pip values
 * and balances all go through Decimal; raw `number` is only used at the
 * transport boundary where the venue speaks integers.
 */

const PRECISION = 18;
const SCALE = 10n ** BigInt(PRECISION);

/** How `roundToStep` resolves values between two multiples of the step. */
export type StepRounding = "half_up" | "down";

export class Decimal {
	/** Internal representation: value * 10^18 as BigInt */
	private readonly raw: bigint;

	private constructor(raw: bigint) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return Decimal.fromString(value.toString());
		}
		return Decimal.fromString(value);
	}

	static zero(): Decimal {
		return new Decimal(0n);
	}

	static one(): Decimal {
		return new Decimal(SCALE);
	}

	private static fromString(s: string): Decimal {
		const trimmed = s.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		if (/e/i.test(trimmed)) {
			// Number#toString switches to exponent form below 1e-6
			const fixed = Number(trimmed).toFixed(PRECISION);
			if (/e/i.test(fixed) || fixed === "NaN") {
				throw new Error(`Decimal.from: out of range "${trimmed}"`);
			}
			return Decimal.fromString(fixed);
		}
		if (!/^-?\d*\.?\d*$/.test(trimmed) || trimmed === "." || trimmed === "-") {
			throw new Error(`Decimal.from: invalid decimal string "${trimmed}"`);
		}

		const negative = trimmed.startsWith("-");
		const abs = negative ? trimmed.slice(1) : trimmed;
		const dotIdx = abs.indexOf(".");

		let raw: bigint;
		if (dotIdx === -1) {
			raw = BigInt(abs) * SCALE;
		} else {
			const intPart = abs.slice(0, dotIdx) || "0";
			const fracPart = abs.slice(dotIdx + 1);
			const paddedFrac = fracPart.padEnd(PRECISION, "0").slice(0, PRECISION);
			raw = BigInt(intPart) * SCALE + BigInt(paddedFrac);
		}

		return new Decimal(negative ? -raw : raw);
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw + other.raw);
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw - other.raw);
	}

	mul(other: Decimal): Decimal {
		return new Decimal((this.raw * other.raw) / SCALE);
	}

	div(other: Decimal): Decimal {
		if (other.raw === 0n) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal((this.raw * SCALE) / other.raw);
	}

	neg(): Decimal {
		return new Decimal(-this.raw);
	}

	abs(): Decimal {
		return new Decimal(this.raw < 0n ? -this.raw : this.raw);
	}

	/**
	 * Round to a multiple of `step` (e.g. the instrument's lot step).
	 * Non-positive steps leave the value unchanged.
	 */
	roundToStep(step: Decimal, mode: StepRounding = "half_up"): Decimal {
		if (step.raw <= 0n) return this;
		const negative = this.raw < 0n;
		const absRaw = negative ? -this.raw : this.raw;
		let units = absRaw / step.raw;
		const remainder = absRaw % step.raw;
		if (mode === "half_up" && remainder * 2n >= step.raw) {
			units += 1n;
		}
		const rounded = units * step.raw;
		return new Decimal(negative ? -rounded : rounded);
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw === other.raw;
	}

	gt(other: Decimal): boolean {
		return this.raw > other.raw;
	}

	gte(other: Decimal): boolean {
		return this.raw >= other.raw;
	}

	lt(other: Decimal): boolean {
		return this.raw < other.raw;
	}

	lte(other: Decimal): boolean {
		return this.raw <= other.raw;
	}

	isZero(): boolean {
		return this.raw === 0n;
	}

	isPositive(): boolean {
		return this.raw > 0n;
	}

	isNegative(): boolean {
		return this.raw < 0n;
	}

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toNumber(): number {
		return Number(this.toString());
	}

	toString(): string {
		const negative = this.raw < 0n;
		const absRaw = negative ? -this.raw : this.raw;
		const intPart = absRaw / SCALE;
		const fracPart = absRaw % SCALE;
		const fracStr = fracPart.toString().padStart(PRECISION, "0").replace(/0+$/, "");
		const prefix = negative ? "-" : "";
		return fracStr.length > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
	}

	/** Serialized as a string so structured log records keep exact values. */
	toJSON(): string {
		return this.toString();
	}

	toFixed(places: number): string {
		const negative = this.raw < 0n;
		const absRaw = negative ? -this.raw : this.raw;
		const intPart = absRaw / SCALE;
		const fracPart = absRaw % SCALE;
		const fracStr = fracPart.toString().padStart(PRECISION, "0").slice(0, places);
		const prefix = negative ? "-" : "";
		return places > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
	}
}
