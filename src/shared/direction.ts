/**
 * Direction — which of a market's two assets an order sells.
 *
 * `zero_for_one` sells asset0 for asset1 and pushes the price coordinate down;
 * `one_for_zero` sells asset1 for asset0 and pushes it up.
 */

import type { AssetId } from "./identifiers.js";

/** Order direction within a two-asset market. */
export const Direction = {
	ZeroForOne: "zero_for_one",
	OneForZero: "one_for_zero",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** The two assets of a market, in coordinate order. */
export interface AssetPair {
	readonly asset0: AssetId;
	readonly asset1: AssetId;
}

/** Return the opposite direction. */
export function oppositeDirection(direction: Direction): Direction {
	return direction === Direction.ZeroForOne ? Direction.OneForZero : Direction.ZeroForOne;
}

/** Asset a depositor hands over when placing an order in this direction. */
export function inputAsset(pair: AssetPair, direction: Direction): AssetId {
	return direction === Direction.ZeroForOne ? pair.asset0 : pair.asset1;
}

/** Asset a filled order in this direction yields. */
export function outputAsset(pair: AssetPair, direction: Direction): AssetId {
	return direction === Direction.ZeroForOne ? pair.asset1 : pair.asset0;
}

/** Runtime check for untrusted input (snapshots, config). */
export function isDirection(value: unknown): value is Direction {
	return value === Direction.ZeroForOne || value === Direction.OneForZero;
}
