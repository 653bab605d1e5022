/**
 * TakeProfitEngine — client surface of the take-profit order engine.
 *
 * Wires the order book, claim ledger and market registry to the Market and
 * AssetTransfer collaborators. Every mutation is atomic and its events are
 * emitted only after it commits.
 *
 * @example
 * ```ts
 * const engine = createTakeProfitEngine({ market, transfer });
 * engine.initializeMarket({ marketId: ETH, asset0: WETH, asset1: USDC, spacing: 60 });
 * const level = engine.placeOrder(alice, ETH, 1_000, Direction.ZeroForOne, 5n);
 * engine.listen(market);
 * ```
 */

import type { PointsIssuer } from "../accounting/points-issuer.js";
import type { EngineEventMap } from "../events/engine-events.js";
import { ExecutionEngine } from "../execution/execution-engine.js";
import type { CycleReport, EngineState } from "../execution/types.js";
import { ClaimLedger } from "../ledger/claim-ledger.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { MarketRegistry } from "../market/market-registry.js";
import { isTransactionalNotifier } from "../market/simulated-market.js";
import type { Market, TrackedMarket, TradeNotice, TradeNotifier } from "../market/types.js";
import { OrderBook } from "../order/order-book.js";
import { OrderService } from "../order/order-service.js";
import type { PendingEntry } from "../order/types.js";
import { type EngineSnapshot, decodeSnapshot, encodeSnapshot } from "../persistence/engine-snapshot.js";
import { type PositionKey, positionId } from "../position/position-identity.js";
import { levelAtPrice } from "../pricing/tick-math.js";
import { type Amount, formatAmount } from "../shared/amount.js";
import { type Checkpointable, type Restore, atomically, isCheckpointable } from "../shared/checkpoint.js";
import { type EngineConfig, resolveConfig } from "../shared/config.js";
import { type Direction, outputAsset } from "../shared/direction.js";
import { InsufficientShareError, InvalidOrderError, type TradingError } from "../shared/errors.js";
import {
	type AccountId,
	type AssetId,
	type MarketId,
	type PositionId,
	accountId,
	assetId,
	idToString,
	marketId,
} from "../shared/identifiers.js";
import { type Result, err, ok, tryCatch, unwrap } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { AssetTransfer } from "../transfer/types.js";

export interface TakeProfitEngineDeps {
	readonly market: Market;
	readonly transfer: AssetTransfer;
	readonly config?: Partial<EngineConfig>;
	/** Default: a pino logger at `config.logLevel` */
	readonly logger?: Logger;
	readonly clock?: Clock;
	/** Loyalty points minted on placements that name a recipient */
	readonly points?: PointsIssuer;
}

export interface MarketParams {
	readonly marketId: MarketId;
	readonly asset0: AssetId;
	readonly asset1: AssetId;
	readonly spacing: number;
}

const marketParamsSchema = z.object({
	marketId: z.string().trim().min(1),
	asset0: z.string().trim().min(1),
	asset1: z.string().trim().min(1),
	spacing: z.number().int().positive(),
});

interface EngineStores {
	readonly book: OrderBook;
	readonly ledger: ClaimLedger;
	readonly markets: MarketRegistry;
}

export class TakeProfitEngine implements Checkpointable {
	readonly config: EngineConfig;
	readonly events = new TypedEmitter<EngineEventMap>();
	private readonly market: Market;
	private readonly transfer: AssetTransfer;
	private readonly points: PointsIssuer | null;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly stores: EngineStores;
	private readonly orders: OrderService;
	private readonly execution: ExecutionEngine;

	/** @internal use createTakeProfitEngine or restoreEngine */
	constructor(deps: TakeProfitEngineDeps, config: EngineConfig, stores: EngineStores) {
		this.config = config;
		this.market = deps.market;
		this.transfer = deps.transfer;
		this.points = deps.points ?? null;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? createLogger({ level: config.logLevel })).child({ engine: config.name });
		this.stores = stores;

		this.orders = new OrderService({
			book: stores.book,
			ledger: stores.ledger,
			markets: stores.markets,
			transfer: deps.transfer,
			logger: this.logger.child({ component: "orders" }),
		});

		const participants: Checkpointable[] = [];
		if (isCheckpointable(deps.transfer)) participants.push(deps.transfer);
		if (isCheckpointable(deps.market)) participants.push(deps.market);
		if (this.points) participants.push(this.points);

		this.execution = new ExecutionEngine({
			book: stores.book,
			ledger: stores.ledger,
			markets: stores.markets,
			market: deps.market,
			participants,
			engineAccount: accountId(config.engineAccount),
			maxFillsPerCycle: config.maxFillsPerCycle,
			events: this.events,
			clock: this.clock,
			logger: this.logger.child({ component: "execution" }),
		});
	}

	// ── Markets ────────────────────────────────────────────────────

	/** Start tracking a market; its current price becomes the LastObservedPrice. */
	initializeMarket(params: MarketParams): Result<TrackedMarket, TradingError> {
		const checked = validate(marketParamsSchema, params);
		if (!checked.ok) {
			return err(
				new InvalidOrderError(`Invalid market parameters: ${formatIssues(checked.error.issues)}`, {
					cause: checked.error,
				}),
			);
		}
		const descriptor: MarketParams = {
			marketId: marketId(checked.value.marketId),
			asset0: assetId(checked.value.asset0),
			asset1: assetId(checked.value.asset1),
			spacing: checked.value.spacing,
		};

		const price = this.market.currentPrice(descriptor.marketId);
		if (!price.ok) return price;
		const registered = this.stores.markets.register(descriptor, price.value);
		if (!registered.ok) return registered;

		this.logger.info(
			{ marketId: idToString(descriptor.marketId), spacing: descriptor.spacing, price: price.value },
			"Market initialized",
		);
		this.events.emit("market_initialized", {
			type: "market_initialized",
			timestamp: this.clock.now(),
			...descriptor,
			initialPrice: price.value,
		});
		return registered;
	}

	// ── Orders ─────────────────────────────────────────────────────

	/**
	 * Deposit `inputAmount` to be sold once the price crosses `targetPrice`.
	 * @returns the spacing-aligned level the order was placed at
	 */
	placeOrder(
		owner: AccountId,
		marketId: MarketId,
		targetPrice: number,
		direction: Direction,
		inputAmount: Amount,
		pointsRecipient?: AccountId,
	): Result<number, TradingError> {
		const placed = this.orders.place(owner, marketId, targetPrice, direction, inputAmount);
		if (!placed.ok) return placed;

		this.points?.issue(pointsRecipient, inputAmount);
		this.events.emit("order_placed", {
			type: "order_placed",
			timestamp: this.clock.now(),
			owner,
			marketId,
			level: placed.value.key.level,
			direction,
			amount: inputAmount,
			positionId: placed.value.positionId,
		});
		return ok(placed.value.key.level);
	}

	/** placeOrder with a human price (asset1 per asset0) instead of a coordinate. */
	placeOrderAtPrice(
		owner: AccountId,
		marketId: MarketId,
		price: string,
		direction: Direction,
		inputAmount: Amount,
		pointsRecipient?: AccountId,
	): Result<number, TradingError> {
		const level = levelAtPrice(price);
		if (!level.ok) return level;
		return this.placeOrder(owner, marketId, level.value, direction, inputAmount, pointsRecipient);
	}

	cancelOrder(
		owner: AccountId,
		marketId: MarketId,
		level: number,
		direction: Direction,
		amountToCancel: Amount,
	): Result<void, TradingError> {
		const cancelled = this.orders.cancel(owner, marketId, level, direction, amountToCancel);
		if (!cancelled.ok) return cancelled;

		this.events.emit("order_cancelled", {
			type: "order_cancelled",
			timestamp: this.clock.now(),
			owner,
			marketId,
			level,
			direction,
			amount: amountToCancel,
		});
		return ok(undefined);
	}

	/** Burn claim shares for their part of the position's output, paid in the output asset. */
	redeem(
		owner: AccountId,
		marketId: MarketId,
		level: number,
		direction: Direction,
		shareAmount: Amount,
	): Result<Amount, TradingError> {
		const tracked = this.stores.markets.require(marketId);
		if (!tracked.ok) return tracked;
		const market = tracked.value;
		const key = { marketId, level, direction };
		const id = positionId(key);

		const participants: Checkpointable[] = [this.stores.ledger];
		if (isCheckpointable(this.transfer)) participants.push(this.transfer);

		const result = atomically<Amount>(participants, () => {
			const out = this.stores.ledger.redeem(id, owner, shareAmount);
			if (!out.ok) return out;
			const pending = this.stores.book.amountAt(key);
			if (this.stores.ledger.supplyOf(id) < pending) {
				return err(
					new InsufficientShareError("Claim shares back input that has not filled", {
						positionId: idToString(id),
						shareAmount: formatAmount(shareAmount),
						pending: formatAmount(pending),
					}),
				);
			}
			const paid = this.transfer.transferOut(outputAsset(market, direction), owner, out.value);
			if (!paid.ok) return paid;
			return out;
		});
		if (!result.ok) return result;

		this.logger.info(
			{ owner: idToString(owner), positionId: idToString(id), shareAmount, outputAmount: result.value },
			"Redeemed",
		);
		this.events.emit("redeemed", {
			type: "redeemed",
			timestamp: this.clock.now(),
			owner,
			positionId: id,
			shareAmount,
			outputAmount: result.value,
		});
		return result;
	}

	// ── Execution ──────────────────────────────────────────────────

	onTradeCompleted(notice: TradeNotice): Result<CycleReport, TradingError> {
		return this.execution.onTradeCompleted(notice);
	}

	sweep(marketId: MarketId): Result<CycleReport, TradingError> {
		return this.execution.sweep(marketId);
	}

	/**
	 * Run a cycle on every trade the notifier reports. A notifier that supports
	 * enlisting also rolls the engine back when it undoes a trade.
	 * @returns unsubscribe
	 */
	listen(notifier: TradeNotifier): () => void {
		const unsubscribe = notifier.onTrade((notice) => this.onTradeCompleted(notice));
		const delist = isTransactionalNotifier(notifier) ? notifier.enlist(this) : null;
		return () => {
			unsubscribe();
			delist?.();
		};
	}

	state(): EngineState {
		return this.execution.state();
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Deterministic id of a position; pure. */
	positionId(marketId: MarketId, level: number, direction: Direction): PositionId {
		return positionId({ marketId, level, direction });
	}

	/** Key of a position the ledger knows, or null. */
	describePosition(id: PositionId): PositionKey | null {
		return this.stores.ledger.keyOf(id);
	}

	pendingAmount(marketId: MarketId, level: number, direction: Direction): Amount {
		return this.stores.book.amountAt({ marketId, level, direction });
	}

	pendingOrders(marketId: MarketId): readonly PendingEntry[] {
		return this.stores.book.entriesFor(marketId);
	}

	shareOf(owner: AccountId, marketId: MarketId, level: number, direction: Direction): Amount {
		return this.stores.ledger.shareOf(this.positionId(marketId, level, direction), owner);
	}

	claimableOf(marketId: MarketId, level: number, direction: Direction): Amount {
		return this.stores.ledger.claimableOf(this.positionId(marketId, level, direction));
	}

	claimSupplyOf(marketId: MarketId, level: number, direction: Direction): Amount {
		return this.stores.ledger.supplyOf(this.positionId(marketId, level, direction));
	}

	/** Output `shareAmount` shares would redeem for right now. */
	quoteRedeem(marketId: MarketId, level: number, direction: Direction, shareAmount: Amount): Amount {
		return this.stores.ledger.quoteRedeem(this.positionId(marketId, level, direction), shareAmount);
	}

	lastObservedPrice(marketId: MarketId): number | null {
		return this.stores.markets.get(marketId)?.lastObservedPrice ?? null;
	}

	markets(): readonly TrackedMarket[] {
		return this.stores.markets.all();
	}

	// ── Persistence ────────────────────────────────────────────────

	snapshot(): EngineSnapshot {
		return encodeSnapshot({
			markets: this.stores.markets.all(),
			orders: this.stores.book.all(),
			positions: this.stores.ledger.all(),
		});
	}

	checkpoint(): Restore {
		const restores = [this.stores.book, this.stores.ledger, this.stores.markets].map((s) => s.checkpoint());
		const points = this.points?.checkpoint();
		return () => {
			points?.();
			for (let i = restores.length - 1; i >= 0; i--) restores[i]?.();
		};
	}
}

function emptyStores(): EngineStores {
	return { book: OrderBook.create(), ledger: ClaimLedger.create(), markets: MarketRegistry.create() };
}

/**
 * Build an engine with empty state.
 * @throws ConfigError when the merged configuration is invalid
 */
export function createTakeProfitEngine(deps: TakeProfitEngineDeps): TakeProfitEngine {
	const config = unwrap(resolveConfig(deps.config));
	return new TakeProfitEngine(deps, config, emptyStores());
}

/** Build an engine from a snapshot. Invalid snapshots and configs come back as errors. */
export function restoreEngine(
	snapshot: EngineSnapshot,
	deps: TakeProfitEngineDeps,
): Result<TakeProfitEngine, TradingError> {
	const config = resolveConfig(deps.config);
	if (!config.ok) return config;
	const parts = decodeSnapshot(snapshot);
	if (!parts.ok) return parts;

	const ledger = tryCatch(() => ClaimLedger.fromAccounts(parts.value.positions));
	if (!ledger.ok) {
		return err(new InvalidOrderError("Snapshot ledger is inconsistent", { cause: ledger.error }));
	}
	const stores: EngineStores = {
		book: OrderBook.fromEntries(parts.value.orders),
		ledger: ledger.value,
		markets: MarketRegistry.fromMarkets(parts.value.markets),
	};
	return ok(new TakeProfitEngine(deps, config.value, stores));
}
