/**
 * Execution bounded context — cycle states, crossings and reports.
 */

import type { Amount } from "../shared/amount.js";
import type { Direction } from "../shared/direction.js";
import type { MarketId, PositionId } from "../shared/identifiers.js";

/** Phase of the scan-and-execute cycle. */
export const EngineState = {
	Idle: "idle",
	Scanning: "scanning",
	Executing: "executing",
} as const;

export type EngineState = (typeof EngineState)[keyof typeof EngineState];

/** The first nonempty key a price move crossed. */
export interface Crossing {
	readonly level: number;
	readonly direction: Direction;
	readonly amount: Amount;
}

/** One pooled position filled against the market. */
export interface Fill {
	readonly marketId: MarketId;
	readonly level: number;
	readonly direction: Direction;
	readonly positionId: PositionId;
	readonly amountIn: Amount;
	readonly amountOut: Amount;
	/** Market price right after this fill */
	readonly priceAfter: number;
}

/** Outcome of one trigger (trade notice or sweep). */
export interface CycleReport {
	readonly marketId: MarketId;
	/** True when the trigger was ignored: the engine's own trade, or a market it does not track */
	readonly skipped: boolean;
	readonly fills: readonly Fill[];
	/** Market price the cycle ended at; null when skipped */
	readonly finalPrice: number | null;
	/** True when the fill bound stopped the cycle with crossed orders still pending */
	readonly deferred: boolean;
}
