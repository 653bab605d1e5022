/**
 * OrderService — placement and cancellation of take-profit orders.
 *
 * Each call touches the book, the claim ledger and the asset transfer
 * together, inside one atomic unit.
 */

import type { ClaimLedger } from "../ledger/claim-ledger.js";
import type { Logger } from "../lib/logger/index.js";
import type { MarketRegistry } from "../market/market-registry.js";
import { positionId } from "../position/position-identity.js";
import { resolveLevelChecked } from "../pricing/price-level.js";
import { type Amount, formatAmount, isPositiveAmount } from "../shared/amount.js";
import { type Checkpointable, atomically, isCheckpointable } from "../shared/checkpoint.js";
import { type Direction, inputAsset } from "../shared/direction.js";
import { InvalidOrderError, type TradingError } from "../shared/errors.js";
import { type AccountId, type MarketId, type PositionId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { AssetTransfer } from "../transfer/types.js";
import type { OrderBook } from "./order-book.js";
import type { OrderKey } from "./types.js";

export interface OrderServiceDeps {
	readonly book: OrderBook;
	readonly ledger: ClaimLedger;
	readonly markets: MarketRegistry;
	readonly transfer: AssetTransfer;
	readonly logger: Logger;
}

/** Outcome of a successful placement. */
export interface Placement {
	readonly key: OrderKey;
	readonly positionId: PositionId;
	readonly amount: Amount;
}

export class OrderService {
	private readonly deps: OrderServiceDeps;
	private readonly participants: readonly Checkpointable[];

	constructor(deps: OrderServiceDeps) {
		this.deps = deps;
		const stores: Checkpointable[] = [deps.book, deps.ledger];
		if (isCheckpointable(deps.transfer)) stores.push(deps.transfer);
		this.participants = stores;
	}

	/**
	 * Deposit `amount` of the direction's input asset at `targetLevel`, floored to the
	 * market's spacing. Returns the resolved key.
	 */
	place(
		owner: AccountId,
		marketId: MarketId,
		targetLevel: number,
		direction: Direction,
		amount: Amount,
	): Result<Placement, TradingError> {
		if (!isPositiveAmount(amount)) {
			return err(new InvalidOrderError("Order amount must be positive", { amount: formatAmount(amount) }));
		}
		const market = this.deps.markets.require(marketId);
		if (!market.ok) return market;
		const tracked = market.value;
		const level = resolveLevelChecked(targetLevel, tracked.spacing);
		if (!level.ok) return level;

		const key: OrderKey = { marketId, level: level.value, direction };
		const result = atomically<Placement>(this.participants, () => {
			const added = this.deps.book.add(key, amount);
			if (!added.ok) return added;
			const deposited = this.deps.ledger.deposit(key, owner, amount);
			if (!deposited.ok) return deposited;
			const moved = this.deps.transfer.transferIn(inputAsset(tracked, direction), owner, amount);
			if (!moved.ok) return moved;
			return ok({ key, positionId: deposited.value, amount });
		});

		if (result.ok) {
			this.deps.logger.info(
				{
					owner: idToString(owner),
					marketId: idToString(marketId),
					level: key.level,
					direction,
					amount,
				},
				"Order placed",
			);
		}
		return result;
	}

	/** Withdraw `amount` of the caller's pending input at an exact key. */
	cancel(
		owner: AccountId,
		marketId: MarketId,
		level: number,
		direction: Direction,
		amount: Amount,
	): Result<OrderKey, TradingError> {
		if (!isPositiveAmount(amount)) {
			return err(new InvalidOrderError("Cancelled amount must be positive", { amount: formatAmount(amount) }));
		}
		const market = this.deps.markets.require(marketId);
		if (!market.ok) return market;
		const tracked = market.value;

		const key: OrderKey = { marketId, level, direction };
		const id = positionId(key);
		const result = atomically<OrderKey>(this.participants, () => {
			// share first: a caller without share gets InsufficientShare, not a book error
			const withdrawn = this.deps.ledger.withdraw(id, owner, amount);
			if (!withdrawn.ok) return withdrawn;
			const removed = this.deps.book.remove(key, amount);
			if (!removed.ok) return removed;
			const moved = this.deps.transfer.transferOut(inputAsset(tracked, direction), owner, amount);
			if (!moved.ok) return moved;
			return ok(key);
		});

		if (result.ok) {
			this.deps.logger.info(
				{ owner: idToString(owner), marketId: idToString(marketId), level, direction, amount },
				"Order cancelled",
			);
		}
		return result;
	}
}
