/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Arbitrary-precision decimals for converting between human prices and
 * price coordinates. Domain code uses this wrapper, never decimal.js-light
 * directly.
 */
import { Decimal as DecimalLight } from "decimal.js-light";

const PRECISION = 40;

const Dec = DecimalLight.clone({ precision: PRECISION, rounding: DecimalLight.ROUND_HALF_EVEN });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or not numeric (for strings)
	 * @example LibDecimal.from("1.0001")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new Dec(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		try {
			return new LibDecimal(new Dec(trimmed));
		} catch (e) {
			throw new Error(`LibDecimal.from: not a number "${trimmed}"`, { cause: e });
		}
	}

	static one(): LibDecimal {
		return new LibDecimal(new Dec(1));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** @throws Error if dividing by zero */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	/**
	 * Integer power, computed at full precision (negative exponents allowed).
	 * @example LibDecimal.from("1.0001").powInt(-3)
	 */
	powInt(exponent: number): LibDecimal {
		if (!Number.isSafeInteger(exponent)) {
			throw new Error(`LibDecimal.powInt: exponent must be an integer, got ${exponent}`);
		}
		return new LibDecimal(this.raw.pow(exponent));
	}

	/**
	 * Natural logarithm at full precision.
	 * @throws Error if value is zero or negative
	 */
	ln(): LibDecimal {
		if (!this.raw.greaterThan(0)) {
			throw new Error("LibDecimal.ln: ln of non-positive");
		}
		return new LibDecimal(this.raw.ln());
	}

	// ── Comparison ─────────────────────────────────────────────────

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/** Largest integer not above this value, as a JS number. */
	floorToNumber(): number {
		return this.raw.toDecimalPlaces(0, DecimalLight.ROUND_FLOOR).toNumber();
	}

	/**
	 * Converts to a string, removing unnecessary trailing zeros and decimal point.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/**
	 * Fixed-point string with the given number of decimal places (half-even rounding).
	 * @example LibDecimal.from("1.23456").toFixed(2) // "1.23"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toSignificant(digits: number): string {
		return this.raw.toSignificantDigits(digits).toString();
	}
}
