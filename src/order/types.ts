import type { PositionKey } from "../position/position-identity.js";
import type { Amount } from "../shared/amount.js";
import type { Direction } from "../shared/direction.js";

/** Orders are keyed exactly like the position they pool into. */
export type OrderKey = PositionKey;

/** Aggregate pending input at one (level, direction) of a market. */
export interface PendingEntry {
	readonly level: number;
	readonly direction: Direction;
	readonly amount: Amount;
}

/** Read side of the book the crossing scanner needs. */
export interface OrderLookup {
	amountAt(key: OrderKey): Amount;
}
