import { describe, expect, it } from "vitest";
import { OrderBook } from "../order/order-book.js";
import { Direction } from "../shared/direction.js";
import { marketId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { crossedDirection, scanForCrossing } from "./crossing-scanner.js";

const ETH = marketId("eth-usd");

function bookWith(orders: Array<[number, Direction, bigint]>): OrderBook {
	const book = OrderBook.create();
	for (const [level, direction, amount] of orders) {
		unwrap(book.add({ marketId: ETH, level, direction }, amount));
	}
	return book;
}

const window = (previous: number, current: number, spacing = 10) => ({
	marketId: ETH,
	spacing,
	previous,
	current,
});

describe("crossedDirection", () => {
	it("maps moves to the direction they fill", () => {
		expect(crossedDirection(0, 30)).toBe(Direction.ZeroForOne);
		expect(crossedDirection(30, 0)).toBe(Direction.OneForZero);
		expect(crossedDirection(5, 5)).toBeNull();
	});
});

describe("scanForCrossing", () => {
	it("finds the order a rising price crossed", () => {
		const book = bookWith([[20, Direction.ZeroForOne, 5n]]);
		expect(scanForCrossing(book, window(0, 30))).toEqual({
			level: 20,
			direction: Direction.ZeroForOne,
			amount: 5n,
		});
	});

	it("returns the first match on the way up", () => {
		const book = bookWith([
			[20, Direction.ZeroForOne, 5n],
			[10, Direction.ZeroForOne, 1n],
		]);
		expect(scanForCrossing(book, window(0, 30))?.level).toBe(10);
	});

	it("returns the first match on the way down", () => {
		const book = bookWith([
			[10, Direction.OneForZero, 5n],
			[20, Direction.OneForZero, 1n],
		]);
		expect(scanForCrossing(book, window(30, 0))?.level).toBe(20);
	});

	it("ignores orders of the other direction", () => {
		const book = bookWith([[20, Direction.OneForZero, 5n]]);
		expect(scanForCrossing(book, window(0, 30))).toBeNull();
	});

	it("excludes the level the price arrived at", () => {
		const book = bookWith([[30, Direction.ZeroForOne, 5n]]);
		expect(scanForCrossing(book, window(0, 30))).toBeNull();
		expect(scanForCrossing(book, window(0, 31))?.level).toBe(30);
	});

	it("starts upward walks at the first aligned level at or above previous", () => {
		const book = bookWith([[0, Direction.ZeroForOne, 5n]]);
		expect(scanForCrossing(book, window(-5, 25))?.level).toBe(0);
		expect(scanForCrossing(book, window(1, 25))).toBeNull();
	});

	it("starts downward walks at the floored previous level", () => {
		const book = bookWith([[-120, Direction.OneForZero, 5n]]);
		expect(scanForCrossing(book, window(-100, -200, 60))?.level).toBe(-120);
	});

	it("finds nothing without a move", () => {
		const book = bookWith([[20, Direction.ZeroForOne, 5n]]);
		expect(scanForCrossing(book, window(20, 20))).toBeNull();
	});

	it("does not look at other markets", () => {
		const book = OrderBook.create();
		unwrap(book.add({ marketId: marketId("btc-usd"), level: 20, direction: Direction.ZeroForOne }, 5n));
		expect(scanForCrossing(book, window(0, 30))).toBeNull();
	});
});
