/**
 * SimulatedMarket — in-process trading venue for tests and paper runs.
 *
 * Prices come from an ImpactModel, balances settle through an
 * InMemoryAssetTransfer between the initiator and the venue's liquidity
 * account, and listeners hear about every trade before it returns. A
 * listener error rolls the whole trade back, together with any store
 * enlisted in the venue's transactions.
 */

import { type MovingAverageFee, feeAmount } from "../accounting/moving-average-fee.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { MAX_LEVEL, MIN_LEVEL } from "../pricing/price-level.js";
import { formatAmount } from "../shared/amount.js";
import { type Checkpointable, type Restore, atomically } from "../shared/checkpoint.js";
import { type AssetPair, inputAsset, outputAsset } from "../shared/direction.js";
import { MarketFailureError, TransferFailureError, type TradingError } from "../shared/errors.js";
import { type AccountId, type MarketId, accountId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { InMemoryAssetTransfer } from "../transfer/in-memory-asset-transfer.js";
import { type ImpactModel, linearImpact } from "./impact-model.js";
import type {
	Market,
	TradeListener,
	TradeNotice,
	TradeNotifier,
	TradeReceipt,
	TradeRequest,
} from "./types.js";

export interface SimulatedMarketConfig {
	readonly settlement: InMemoryAssetTransfer;
	/** Counterparty of every trade. Default: "market-liquidity" */
	readonly liquidityAccount?: AccountId;
	/** Default: linearImpact() */
	readonly impact?: ImpactModel;
	/** Charged on output when a request carries a fee sample */
	readonly fee?: MovingAverageFee;
	readonly logger?: Logger;
}

export interface ListedMarket extends AssetPair {
	readonly marketId: MarketId;
	readonly price: number;
}

interface Pool extends ListedMarket {
	readonly haltedReason: string | null;
}

/** A notifier that can roll other stores back together with a vetoed trade. */
export interface TransactionalNotifier extends TradeNotifier {
	enlist(store: Checkpointable): () => void;
}

export function isTransactionalNotifier(notifier: TradeNotifier): notifier is TransactionalNotifier {
	return "enlist" in notifier && typeof notifier.enlist === "function";
}

export class SimulatedMarket implements Market, TransactionalNotifier, Checkpointable {
	readonly liquidityAccount: AccountId;
	private readonly settlement: InMemoryAssetTransfer;
	private readonly impact: ImpactModel;
	private readonly fee: MovingAverageFee | null;
	private readonly logger: Logger;
	private pools = new Map<MarketId, Pool>();
	private readonly listeners: TradeListener[] = [];
	private readonly enlisted: Checkpointable[] = [];

	constructor(config: SimulatedMarketConfig) {
		this.settlement = config.settlement;
		this.liquidityAccount = config.liquidityAccount ?? accountId("market-liquidity");
		this.impact = config.impact ?? linearImpact();
		this.fee = config.fee ?? null;
		this.logger = config.logger ?? silentLogger();
	}

	// ── Setup ──────────────────────────────────────────────────────

	/** @throws Error on a duplicate id or a price outside the coordinate range */
	listMarket(market: ListedMarket): void {
		if (this.pools.has(market.marketId)) {
			throw new Error(`Market ${idToString(market.marketId)} already listed`);
		}
		assertPrice(market.price);
		this.pools.set(market.marketId, { ...market, haltedReason: null });
	}

	/** Move the price without a trade. No listener is notified. */
	setPrice(marketId: MarketId, price: number): void {
		assertPrice(price);
		this.pools.set(marketId, { ...this.pool(marketId), price });
	}

	/** Make every trade on the market fail with `reason` until resumed. */
	halt(marketId: MarketId, reason: string): void {
		this.pools.set(marketId, { ...this.pool(marketId), haltedReason: reason });
	}

	resume(marketId: MarketId): void {
		this.pools.set(marketId, { ...this.pool(marketId), haltedReason: null });
	}

	// ── Market ─────────────────────────────────────────────────────

	currentPrice(marketId: MarketId): Result<number, MarketFailureError> {
		const pool = this.pools.get(marketId);
		if (!pool) return err(unknownMarket(marketId));
		return ok(pool.price);
	}

	executeTrade(request: TradeRequest): Result<TradeReceipt, MarketFailureError> {
		const pool = this.pools.get(request.marketId);
		if (!pool) return err(unknownMarket(request.marketId));
		if (pool.haltedReason !== null) {
			return err(
				new MarketFailureError(pool.haltedReason, { marketId: idToString(request.marketId) }),
			);
		}
		if (request.amountIn <= 0n) {
			return err(
				new MarketFailureError("Trade amount must be positive", {
					amountIn: formatAmount(request.amountIn),
				}),
			);
		}

		const participants: Checkpointable[] = [this, this.settlement, ...this.enlisted];
		if (this.fee) participants.push(this.fee);

		const result = atomically(participants, () => this.trade(pool, request));
		if (!result.ok) {
			this.logger.debug(
				{ marketId: idToString(request.marketId), code: result.error.code },
				"Trade rolled back",
			);
			return err(asMarketFailure(result.error));
		}
		return result;
	}

	// ── TradeNotifier ──────────────────────────────────────────────

	onTrade(listener: TradeListener): () => void {
		this.listeners.push(listener);
		return () => {
			const idx = this.listeners.indexOf(listener);
			if (idx !== -1) this.listeners.splice(idx, 1);
		};
	}

	enlist(store: Checkpointable): () => void {
		this.enlisted.push(store);
		return () => {
			const idx = this.enlisted.indexOf(store);
			if (idx !== -1) this.enlisted.splice(idx, 1);
		};
	}

	checkpoint(): Restore {
		const saved = new Map(this.pools);
		return () => {
			this.pools = saved;
		};
	}

	// ── Internal ───────────────────────────────────────────────────

	private trade(pool: Pool, request: TradeRequest): Result<TradeReceipt, TradingError> {
		const quote = this.impact.quote({
			price: pool.price,
			direction: request.direction,
			amountIn: request.amountIn,
		});

		let amountOut = quote.amountOut;
		if (this.fee && request.feeSample !== undefined) {
			amountOut -= feeAmount(amountOut, this.fee.feeFor(request.feeSample));
			this.fee.observe(request.feeSample);
		}

		const paid = this.settlement.transfer(
			inputAsset(pool, request.direction),
			request.initiator,
			this.liquidityAccount,
			request.amountIn,
		);
		if (!paid.ok) return paid;

		const received = this.settlement.transfer(
			outputAsset(pool, request.direction),
			this.liquidityAccount,
			request.initiator,
			amountOut,
		);
		if (!received.ok) {
			return err(
				new MarketFailureError("Insufficient liquidity", {
					marketId: idToString(pool.marketId),
					requested: formatAmount(amountOut),
					cause: received.error,
				}),
			);
		}

		this.pools.set(pool.marketId, { ...pool, price: quote.newPrice });
		this.logger.debug(
			{
				marketId: idToString(pool.marketId),
				initiator: idToString(request.initiator),
				amountIn: request.amountIn,
				amountOut,
				newPrice: quote.newPrice,
			},
			"Trade executed",
		);

		const notice: TradeNotice = {
			marketId: pool.marketId,
			initiator: request.initiator,
			direction: request.direction,
			amountIn: request.amountIn,
			amountOut,
			newPrice: quote.newPrice,
		};
		for (const listener of [...this.listeners]) {
			const heard = listener(notice);
			if (!heard.ok) {
				return err(
					new MarketFailureError("Trade rejected by listener", {
						marketId: idToString(pool.marketId),
						cause: heard.error,
					}),
				);
			}
		}
		return ok({ amountOut, newPrice: quote.newPrice });
	}

	private pool(marketId: MarketId): Pool {
		const pool = this.pools.get(marketId);
		if (!pool) throw new Error(`Market ${idToString(marketId)} is not listed`);
		return pool;
	}
}

function assertPrice(price: number): void {
	if (!Number.isSafeInteger(price) || price < MIN_LEVEL || price > MAX_LEVEL) {
		throw new Error(`Price coordinate out of range: ${price}`);
	}
}

function unknownMarket(marketId: MarketId): MarketFailureError {
	return new MarketFailureError("Unknown market", { marketId: idToString(marketId) });
}

function asMarketFailure(error: TradingError): MarketFailureError {
	if (error instanceof MarketFailureError) return error;
	if (error instanceof TransferFailureError) {
		return new MarketFailureError(`Settlement failed: ${error.message}`, { ...error.context, cause: error });
	}
	return new MarketFailureError(error.message, { cause: error });
}
