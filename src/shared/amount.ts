/**
 * Amount — integer token quantities as bigint.
 *
 * Every balance, share and pending amount in the engine is a non-negative
 * integer in the asset's smallest unit. Division always floors, so rounding
 * dust stays with the ledger rather than being paid out.
 */

/** A token quantity in base units. */
export type Amount = bigint;

const DECIMAL_INTEGER = /^(0|[1-9][0-9]*)$/;

/** `floor(a * b / denominator)` for non-negative operands. Throws on a zero denominator. */
export function mulDivDown(a: Amount, b: Amount, denominator: Amount): Amount {
	if (denominator === 0n) {
		throw new Error("mulDivDown: division by zero");
	}
	if (a < 0n || b < 0n || denominator < 0n) {
		throw new Error("mulDivDown: operands must be non-negative");
	}
	return (a * b) / denominator;
}

export function isPositiveAmount(value: Amount): boolean {
	return value > 0n;
}

/** Decimal string form, used for logs and JSON. */
export function formatAmount(value: Amount): string {
	return value.toString(10);
}

/**
 * Parse a non-negative decimal integer string into an Amount.
 * Rejects signs, fractions, exponents, leading zeros and whitespace.
 */
export function parseAmount(raw: string): Amount {
	if (!DECIMAL_INTEGER.test(raw)) {
		throw new Error(`parseAmount: not a non-negative integer: "${raw}"`);
	}
	return BigInt(raw);
}
