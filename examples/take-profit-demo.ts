/**
 * Take-profit demo — two depositors, one outside trade, one fill, two redemptions.
 *
 * Everything runs in process against the SimulatedMarket.
 * Run: npx tsx examples/take-profit-demo.ts
 */

import {
	Direction,
	InMemoryAssetTransfer,
	SimulatedMarket,
	accountId,
	assetId,
	createLogger,
	createTakeProfitEngine,
	formatAmount,
	linearImpact,
	marketId,
	unwrap,
} from "../src/index.js";

const ETH = marketId("eth-usd");
const WETH = assetId("weth");
const USDC = assetId("usdc");
const alice = accountId("alice");
const bob = accountId("bob");
const trader = accountId("trader");

// ── Venue ────────────────────────────────────────────────────────────

const transfer = new InMemoryAssetTransfer(accountId("tickfill-engine"));
const market = new SimulatedMarket({
	settlement: transfer,
	impact: linearImpact({ ticksPerUnit: 1, payoutBps: 20_000 }),
});
market.listMarket({ marketId: ETH, asset0: WETH, asset1: USDC, price: 0 });
transfer.mint(WETH, market.liquidityAccount, 10_000n);
transfer.mint(USDC, market.liquidityAccount, 10_000n);
transfer.mint(WETH, alice, 50n);
transfer.mint(WETH, bob, 50n);
transfer.mint(USDC, trader, 500n);

// ── Engine ───────────────────────────────────────────────────────────

const logger = createLogger({ level: "info" });
const engine = createTakeProfitEngine({ market, transfer, logger, config: { name: "demo" } });
engine.events.on("order_filled", (e) => {
	logger.info({ level: e.level, in: formatAmount(e.amountIn), out: formatAmount(e.amountOut) }, "fill event");
});
engine.listen(market);

unwrap(engine.initializeMarket({ marketId: ETH, asset0: WETH, asset1: USDC, spacing: 10 }));
const level = unwrap(engine.placeOrder(alice, ETH, 100, Direction.ZeroForOne, 30n));
unwrap(engine.placeOrder(bob, ETH, 100, Direction.ZeroForOne, 10n));

// ── Trade through the level ──────────────────────────────────────────

unwrap(market.executeTrade({ marketId: ETH, direction: Direction.OneForZero, amountIn: 150n, initiator: trader }));

for (const owner of [alice, bob]) {
	const shares = engine.shareOf(owner, ETH, level, Direction.ZeroForOne);
	const paid = unwrap(engine.redeem(owner, ETH, level, Direction.ZeroForOne, shares));
	logger.info({ owner, shares: formatAmount(shares), paid: formatAmount(paid) }, "redeemed");
}
