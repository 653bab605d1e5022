/**
 * CrossingScanner — finds the first pending key a price move crossed.
 *
 * An upward move (asset0 got dearer) walks up from ceilLevel(previous) and
 * only looks at zero_for_one orders; a downward move walks down from
 * resolveLevel(previous) and only looks at one_for_zero orders. The walk
 * stops at the first nonzero aggregate.
 */

import type { OrderLookup } from "../order/types.js";
import { levelsBetween } from "../pricing/price-level.js";
import { Direction } from "../shared/direction.js";
import type { MarketId } from "../shared/identifiers.js";
import type { Crossing } from "./types.js";

export interface ScanWindow {
	readonly marketId: MarketId;
	readonly spacing: number;
	readonly previous: number;
	readonly current: number;
}

/** The direction a move from `previous` to `current` can fill, or null for no move. */
export function crossedDirection(previous: number, current: number): Direction | null {
	if (current > previous) return Direction.ZeroForOne;
	if (current < previous) return Direction.OneForZero;
	return null;
}

export function scanForCrossing(book: OrderLookup, window: ScanWindow): Crossing | null {
	const direction = crossedDirection(window.previous, window.current);
	if (direction === null) return null;

	for (const level of levelsBetween(window.previous, window.current, window.spacing)) {
		const amount = book.amountAt({ marketId: window.marketId, level, direction });
		if (amount > 0n) {
			return { level, direction, amount };
		}
	}
	return null;
}
