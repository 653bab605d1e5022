import type { Amount } from "../shared/amount.js";
import type { Direction } from "../shared/direction.js";
import type { MarketFailureError, TradingError } from "../shared/errors.js";
import type { AccountId, AssetId, MarketId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

// ── Market collaborator ──────────────────────────────────────────────

/** An exact-input trade. */
export interface TradeRequest {
	readonly marketId: MarketId;
	readonly direction: Direction;
	readonly amountIn: Amount;
	readonly initiator: AccountId;
	/** External cost sample fed to a dynamic fee, when the venue charges one */
	readonly feeSample?: bigint;
}

export interface TradeReceipt {
	readonly amountOut: Amount;
	readonly newPrice: number;
}

/** The venue the engine reads prices from and fills orders against. */
export interface Market {
	currentPrice(marketId: MarketId): Result<number, MarketFailureError>;
	executeTrade(request: TradeRequest): Result<TradeReceipt, MarketFailureError>;
}

// ── Trade notifications ──────────────────────────────────────────────

/** Delivered after every completed trade, including the engine's own. */
export interface TradeNotice {
	readonly marketId: MarketId;
	readonly initiator: AccountId;
	readonly direction: Direction;
	readonly amountIn: Amount;
	readonly amountOut: Amount;
	readonly newPrice: number;
}

/** A listener returning `err` vetoes the trade it was notified of. */
export type TradeListener = (notice: TradeNotice) => Result<unknown, TradingError>;

export interface TradeNotifier {
	/** Returns an unsubscribe function. */
	onTrade(listener: TradeListener): () => void;
}

// ── Engine-side market record ────────────────────────────────────────

export interface MarketDescriptor {
	readonly marketId: MarketId;
	readonly asset0: AssetId;
	readonly asset1: AssetId;
	readonly spacing: number;
}

/** A market the engine tracks, with the price its last completed scan ended at. */
export interface TrackedMarket extends MarketDescriptor {
	readonly lastObservedPrice: number;
}
