/**
 * OrderBook — aggregate pending input per (market, level, direction).
 *
 * A single flat map under a composite string key. A zero aggregate is
 * stored as absence, so every entry present holds a positive amount.
 */

import { encodePositionKey } from "../position/position-identity.js";
import { type Amount, formatAmount, isPositiveAmount } from "../shared/amount.js";
import type { Checkpointable, Restore } from "../shared/checkpoint.js";
import { InvalidOrderError } from "../shared/errors.js";
import { type MarketId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { OrderKey, OrderLookup, PendingEntry } from "./types.js";

interface BookEntry {
	readonly key: OrderKey;
	readonly amount: Amount;
}

export class OrderBook implements OrderLookup, Checkpointable {
	private entries: Map<string, BookEntry>;

	private constructor(entries: Map<string, BookEntry>) {
		this.entries = entries;
	}

	/** Creates an empty book. */
	static create(): OrderBook {
		return new OrderBook(new Map<string, BookEntry>());
	}

	/**
	 * Rebuilds a book from persisted aggregates. Zero amounts are dropped.
	 * @param entries - At most one aggregate per key
	 * @throws Error on a negative amount or a repeated key
	 */
	static fromEntries(entries: Iterable<{ key: OrderKey; amount: Amount }>): OrderBook {
		const book = OrderBook.create();
		const seen = new Set<string>();
		for (const { key, amount } of entries) {
			if (amount < 0n) {
				throw new Error(`Negative pending amount at level ${key.level}`);
			}
			const encoded = encodePositionKey(key);
			if (seen.has(encoded)) {
				throw new Error(`Pending aggregate at level ${key.level} (${key.direction}) appears twice`);
			}
			seen.add(encoded);
			if (amount === 0n) continue;
			book.entries.set(encoded, { key, amount });
		}
		return book;
	}

	/**
	 * Increments the aggregate at `key`.
	 * @param key - Aligned market, level and direction
	 * @param amount - Input added
	 * @returns The new aggregate, or InvalidOrder for a non-positive amount
	 */
	add(key: OrderKey, amount: Amount): Result<Amount, InvalidOrderError> {
		if (!isPositiveAmount(amount)) {
			return err(new InvalidOrderError("Order amount must be positive", { amount: formatAmount(amount) }));
		}
		const next = this.amountAt(key) + amount;
		this.entries.set(encodePositionKey(key), { key, amount: next });
		return ok(next);
	}

	/**
	 * Decrements the aggregate at `key`, deleting it at zero.
	 * @param key - Aligned market, level and direction
	 * @param amount - Input removed by a cancel or a fill
	 * @returns The new aggregate, or InvalidOrder when it would go negative
	 */
	remove(key: OrderKey, amount: Amount): Result<Amount, InvalidOrderError> {
		if (!isPositiveAmount(amount)) {
			return err(new InvalidOrderError("Removed amount must be positive", { amount: formatAmount(amount) }));
		}
		const current = this.amountAt(key);
		if (current < amount) {
			return err(
				new InvalidOrderError("Pending amount would go negative", {
					marketId: idToString(key.marketId),
					level: key.level,
					direction: key.direction,
					pending: formatAmount(current),
					requested: formatAmount(amount),
				}),
			);
		}
		const next = current - amount;
		const encoded = encodePositionKey(key);
		if (next === 0n) {
			this.entries.delete(encoded);
		} else {
			this.entries.set(encoded, { key, amount: next });
		}
		return ok(next);
	}

	/** @returns The pending aggregate at `key`, 0 when absent */
	amountAt(key: OrderKey): Amount {
		return this.entries.get(encodePositionKey(key))?.amount ?? 0n;
	}

	/**
	 * Lists one market's pending aggregates.
	 * @param marketId - Market to list
	 * @returns Nonzero aggregates sorted by level, then direction
	 */
	entriesFor(marketId: MarketId): readonly PendingEntry[] {
		const found: PendingEntry[] = [];
		for (const { key, amount } of this.entries.values()) {
			if (key.marketId === marketId) {
				found.push({ level: key.level, direction: key.direction, amount });
			}
		}
		return found.sort((a, b) => a.level - b.level || a.direction.localeCompare(b.direction));
	}

	/** Every nonzero aggregate across markets, unsorted. */
	all(): readonly { key: OrderKey; amount: Amount }[] {
		return [...this.entries.values()];
	}

	get size(): number {
		return this.entries.size;
	}

	/** @returns A function that puts every aggregate back as it is now */
	checkpoint(): Restore {
		const saved = new Map(this.entries);
		return () => {
			this.entries = saved;
		};
	}
}
