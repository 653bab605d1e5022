/**
 * Tick math — conversion between human prices and price coordinates.
 *
 * Coordinate t corresponds to the price 1.0001^t (asset1 per asset0), so one
 * coordinate step is a one-basis-point price move.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import { InvalidOrderError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { MAX_LEVEL, MIN_LEVEL } from "./price-level.js";

const BASE = LibDecimal.from("1.0001");
const LN_BASE = BASE.ln();

/** 1.0001^level as an exact-to-40-digits decimal. */
export function priceAtLevel(level: number): LibDecimal {
	return BASE.powInt(level);
}

/**
 * The largest coordinate t with 1.0001^t ≤ price.
 * The logarithm gives a candidate; the neighbours are then checked with exact powers.
 */
export function levelAtPrice(price: string): Result<number, InvalidOrderError> {
	let value: LibDecimal;
	try {
		value = LibDecimal.from(price);
	} catch (e) {
		return err(new InvalidOrderError(`Invalid price "${price}"`, { cause: e }));
	}
	if (!value.isPositive()) {
		return err(new InvalidOrderError("Price must be positive", { price }));
	}

	let level = value.ln().div(LN_BASE).floorToNumber();
	while (priceAtLevel(level + 1).lte(value)) level++;
	while (priceAtLevel(level).gt(value)) level--;

	if (level < MIN_LEVEL || level > MAX_LEVEL) {
		return err(new InvalidOrderError("Price outside the coordinate range", { price, level }));
	}
	return ok(level);
}
