import { describe, expect, it, vi } from "vitest";
import { MovingAverageFee } from "../accounting/moving-average-fee.js";
import { Direction } from "../shared/direction.js";
import { InvalidOrderError, MarketFailureError } from "../shared/errors.js";
import { accountId, assetId, marketId } from "../shared/identifiers.js";
import { err, ok, unwrap } from "../shared/result.js";
import { InMemoryAssetTransfer } from "../transfer/in-memory-asset-transfer.js";
import { linearImpact } from "./impact-model.js";
import { SimulatedMarket, isTransactionalNotifier } from "./simulated-market.js";

const ETH = marketId("eth-usd");
const WETH = assetId("weth");
const USDC = assetId("usdc");
const TRADER = accountId("trader");
const LIQUIDITY = accountId("market-liquidity");

function setup(options: { fee?: MovingAverageFee } = {}) {
	const settlement = new InMemoryAssetTransfer(accountId("tickfill-engine"));
	settlement.mint(WETH, TRADER, 1_000n);
	settlement.mint(USDC, LIQUIDITY, 10_000n);
	settlement.mint(WETH, LIQUIDITY, 10_000n);
	const market = new SimulatedMarket({
		settlement,
		impact: linearImpact({ ticksPerUnit: 1, payoutBps: 20_000 }),
		...(options.fee && { fee: options.fee }),
	});
	market.listMarket({ marketId: ETH, asset0: WETH, asset1: USDC, price: 30 });
	return { settlement, market };
}

const sell = (amountIn: bigint, feeSample?: bigint) => ({
	marketId: ETH,
	direction: Direction.ZeroForOne,
	amountIn,
	initiator: TRADER,
	...(feeSample !== undefined && { feeSample }),
});

describe("SimulatedMarket", () => {
	it("executes, settles and moves the price", () => {
		const { settlement, market } = setup();
		expect(market.executeTrade(sell(5n))).toEqual({ ok: true, value: { amountOut: 10n, newPrice: 25 } });
		expect(unwrap(market.currentPrice(ETH))).toBe(25);
		expect(settlement.balanceOf(WETH, TRADER)).toBe(995n);
		expect(settlement.balanceOf(USDC, TRADER)).toBe(10n);
	});

	it("notifies listeners with the trade", () => {
		const { market } = setup();
		const listener = vi.fn(() => ok(undefined));
		market.onTrade(listener);
		unwrap(market.executeTrade(sell(5n)));
		expect(listener).toHaveBeenCalledWith({
			marketId: ETH,
			initiator: TRADER,
			direction: Direction.ZeroForOne,
			amountIn: 5n,
			amountOut: 10n,
			newPrice: 25,
		});
	});

	it("stops notifying after unsubscribe", () => {
		const { market } = setup();
		const listener = vi.fn(() => ok(undefined));
		const unsubscribe = market.onTrade(listener);
		unsubscribe();
		unwrap(market.executeTrade(sell(5n)));
		expect(listener).not.toHaveBeenCalled();
	});

	it("rolls the trade back when a listener vetoes it", () => {
		const { settlement, market } = setup();
		market.onTrade(() => err(new InvalidOrderError("no")));
		const result = market.executeTrade(sell(5n));
		expect(!result.ok && result.error.message).toBe("Trade rejected by listener");
		expect(unwrap(market.currentPrice(ETH))).toBe(30);
		expect(settlement.balanceOf(WETH, TRADER)).toBe(1_000n);
	});

	it("rolls enlisted stores back with a vetoed trade", () => {
		const { market } = setup();
		let value = 1;
		market.enlist({
			checkpoint: () => {
				const saved = value;
				return () => {
					value = saved;
				};
			},
		});
		market.onTrade(() => {
			value = 2;
			return err(new InvalidOrderError("no"));
		});
		market.executeTrade(sell(5n));
		expect(value).toBe(1);
	});

	it("fails with MarketFailure when liquidity runs out", () => {
		const { settlement, market } = setup();
		settlement.mint(WETH, TRADER, 10_000n);
		const result = market.executeTrade(sell(6_000n));
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(MarketFailureError);
			expect(result.error.message).toBe("Insufficient liquidity");
			expect(result.error.isRetryable).toBe(true);
		}
		expect(settlement.balanceOf(WETH, TRADER)).toBe(11_000n);
	});

	it("wraps an initiator's missing balance as MarketFailure", () => {
		const { market } = setup();
		const result = market.executeTrade(sell(2_000n));
		expect(!result.ok && result.error.message).toBe("Settlement failed: Insufficient balance");
	});

	it("fails while halted and recovers on resume", () => {
		const { market } = setup();
		market.halt(ETH, "circuit open");
		const result = market.executeTrade(sell(1n));
		expect(!result.ok && result.error.message).toBe("circuit open");
		market.resume(ETH);
		expect(market.executeTrade(sell(1n)).ok).toBe(true);
	});

	it("reports unknown markets", () => {
		const { market } = setup();
		const result = market.currentPrice(marketId("nope"));
		expect(!result.ok && result.error.message).toBe("Unknown market");
	});

	it("rejects zero-amount trades", () => {
		const { market } = setup();
		expect(market.executeTrade(sell(0n)).ok).toBe(false);
	});

	it("setPrice moves the price without notifying", () => {
		const { market } = setup();
		const listener = vi.fn(() => ok(undefined));
		market.onTrade(listener);
		market.setPrice(ETH, -40);
		expect(unwrap(market.currentPrice(ETH))).toBe(-40);
		expect(listener).not.toHaveBeenCalled();
		expect(() => market.setPrice(ETH, 1.5)).toThrow("out of range");
	});

	it("charges the dynamic fee when a sample is supplied", () => {
		const fee = new MovingAverageFee({ average: 100n, count: 1n });
		const { market } = setup({ fee });
		// 500 weth → 1000 usdc gross, fee 0.5% → 5
		expect(unwrap(market.executeTrade(sell(500n, 100n))).amountOut).toBe(995n);
		expect(fee.sampleCount).toBe(2n);
		// no sample, no fee
		expect(unwrap(market.executeTrade(sell(100n))).amountOut).toBe(200n);
	});

	it("is a transactional notifier", () => {
		expect(isTransactionalNotifier(setup().market)).toBe(true);
		expect(isTransactionalNotifier({ onTrade: () => () => undefined })).toBe(false);
	});
});
