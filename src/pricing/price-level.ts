/**
 * PriceLevel — discretized price coordinates.
 *
 * A market quotes its price as a signed integer coordinate. Orders live on
 * levels that are multiples of the market's spacing; any raw coordinate is
 * mapped onto a level by flooring toward negative infinity.
 */

import { InvalidOrderError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

/** Lowest coordinate an order may target. */
export const MIN_LEVEL = -887_272;
/** Highest coordinate an order may target. */
export const MAX_LEVEL = 887_272;

/** Floor `raw` to a multiple of `spacing` (toward negative infinity). resolveLevel(-100, 60) === -120. */
export function resolveLevel(raw: number, spacing: number): number {
	const remainder = raw % spacing;
	// JS % keeps the dividend's sign; shift negatives down one step
	const floored = remainder < 0 ? raw - remainder - spacing : raw - remainder;
	return floored === 0 ? 0 : floored;
}

/** Smallest multiple of `spacing` that is ≥ `raw`. */
export function ceilLevel(raw: number, spacing: number): number {
	const floored = resolveLevel(raw, spacing);
	return floored === raw ? floored : floored + spacing;
}

export function isAligned(level: number, spacing: number): boolean {
	return resolveLevel(level, spacing) === level;
}

export function isValidSpacing(spacing: number): boolean {
	return Number.isSafeInteger(spacing) && spacing > 0;
}

/**
 * resolveLevel with argument checks: integer coordinate, positive integer spacing,
 * and a result inside [MIN_LEVEL, MAX_LEVEL].
 */
export function resolveLevelChecked(raw: number, spacing: number): Result<number, InvalidOrderError> {
	if (!Number.isSafeInteger(raw)) {
		return err(new InvalidOrderError("Price coordinate must be an integer", { raw }));
	}
	if (!isValidSpacing(spacing)) {
		return err(new InvalidOrderError("Spacing must be a positive integer", { spacing }));
	}
	const level = resolveLevel(raw, spacing);
	if (level < MIN_LEVEL || level > MAX_LEVEL) {
		return err(
			new InvalidOrderError("Price level out of range", {
				level,
				min: MIN_LEVEL,
				max: MAX_LEVEL,
			}),
		);
	}
	return ok(level);
}

/**
 * Aligned levels a move from `previous` to `current` crosses, in walk order.
 * Upward: from ceilLevel(previous) while < current. Downward: from
 * resolveLevel(previous) while > current. Equal: none.
 */
export function* levelsBetween(previous: number, current: number, spacing: number): Generator<number> {
	if (current > previous) {
		for (let level = ceilLevel(previous, spacing); level < current; level += spacing) {
			yield level;
		}
	} else if (current < previous) {
		for (let level = resolveLevel(previous, spacing); level > current; level -= spacing) {
			yield level;
		}
	}
}
