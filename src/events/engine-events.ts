/**
 * Engine events — what the engine committed, stamped by its Clock.
 *
 * Raised only after the operation that produced them commits. A rolled-back
 * trade-triggered cycle produces `cycle_aborted` and nothing else.
 */

import type { Fill } from "../execution/types.js";
import type { Amount } from "../shared/amount.js";
import type { Direction } from "../shared/direction.js";
import type { AccountId, AssetId, MarketId, PositionId } from "../shared/identifiers.js";

export interface MarketInitialized {
	readonly type: "market_initialized";
	readonly timestamp: number;
	readonly marketId: MarketId;
	readonly asset0: AssetId;
	readonly asset1: AssetId;
	readonly spacing: number;
	readonly initialPrice: number;
}

export interface OrderPlaced {
	readonly type: "order_placed";
	readonly timestamp: number;
	readonly owner: AccountId;
	readonly marketId: MarketId;
	readonly level: number;
	readonly direction: Direction;
	readonly amount: Amount;
	readonly positionId: PositionId;
}

export interface OrderCancelled {
	readonly type: "order_cancelled";
	readonly timestamp: number;
	readonly owner: AccountId;
	readonly marketId: MarketId;
	readonly level: number;
	readonly direction: Direction;
	readonly amount: Amount;
}

export interface OrderFilled extends Fill {
	readonly type: "order_filled";
	readonly timestamp: number;
}

export interface Redeemed {
	readonly type: "redeemed";
	readonly timestamp: number;
	readonly owner: AccountId;
	readonly positionId: PositionId;
	readonly shareAmount: Amount;
	readonly outputAmount: Amount;
}

export interface CycleCompleted {
	readonly type: "cycle_completed";
	readonly timestamp: number;
	readonly marketId: MarketId;
	readonly fillCount: number;
	readonly finalPrice: number;
	readonly deferred: boolean;
}

export interface CycleAborted {
	readonly type: "cycle_aborted";
	readonly timestamp: number;
	readonly marketId: MarketId;
	readonly code: string;
	readonly reason: string;
}

export type EngineEvent =
	| MarketInitialized
	| OrderPlaced
	| OrderCancelled
	| OrderFilled
	| Redeemed
	| CycleCompleted
	| CycleAborted;

export type EngineEventType = EngineEvent["type"];

/** Event name → payload, for TypedEmitter. */
export type EngineEventMap = {
	market_initialized: MarketInitialized;
	order_placed: OrderPlaced;
	order_cancelled: OrderCancelled;
	order_filled: OrderFilled;
	redeemed: Redeemed;
	cycle_completed: CycleCompleted;
	cycle_aborted: CycleAborted;
};
