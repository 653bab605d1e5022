import { bench, describe } from "vitest";
import { scanForCrossing } from "../src/execution/crossing-scanner.js";
import { OrderBook } from "../src/order/order-book.js";
import { Direction } from "../src/shared/direction.js";
import { marketId } from "../src/shared/identifiers.js";

const ETH = marketId("eth-usd");
const SPACING = 10;

function buildBook(orders: number): OrderBook {
	const book = OrderBook.create();
	for (let i = 1; i <= orders; i++) {
		book.add({ marketId: ETH, level: i * SPACING * 5, direction: Direction.ZeroForOne }, 100n);
		book.add({ marketId: ETH, level: -i * SPACING * 5, direction: Direction.OneForZero }, 100n);
	}
	return book;
}

const sparse = buildBook(10);
const dense = buildBook(1_000);

describe("crossing scan", () => {
	bench("up-move across 1000 empty levels", () => {
		scanForCrossing(OrderBook.create(), { marketId: ETH, spacing: SPACING, previous: 0, current: 10_000 });
	});

	bench("up-move hitting the first order of a sparse book", () => {
		scanForCrossing(sparse, { marketId: ETH, spacing: SPACING, previous: 0, current: 10_000 });
	});

	bench("down-move hitting the first order of a dense book", () => {
		scanForCrossing(dense, { marketId: ETH, spacing: SPACING, previous: 0, current: -10_000 });
	});
});

describe("order book", () => {
	bench("entriesFor on 2000 keys", () => {
		dense.entriesFor(ETH);
	});
});
