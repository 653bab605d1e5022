/**
 * Price-impact models for the simulated market.
 *
 * A model quotes what an exact-input trade pays out and where it leaves the
 * price coordinate. Selling asset0 (zero_for_one) pushes the coordinate down,
 * selling asset1 pushes it up.
 */

import { MAX_LEVEL, MIN_LEVEL } from "../pricing/price-level.js";
import type { Amount } from "../shared/amount.js";
import { Direction } from "../shared/direction.js";

export interface ImpactInput {
	readonly price: number;
	readonly direction: Direction;
	readonly amountIn: Amount;
}

export interface ImpactQuote {
	readonly amountOut: Amount;
	readonly newPrice: number;
}

export interface ImpactModel {
	quote(input: ImpactInput): ImpactQuote;
}

export interface LinearImpactConfig {
	/** Coordinate steps moved per base unit traded */
	readonly ticksPerUnit: number;
	/** Output per input in basis points (10_000 = one for one) */
	readonly payoutBps: number;
}

export const DEFAULT_LINEAR_IMPACT: LinearImpactConfig = {
	ticksPerUnit: 1,
	payoutBps: 10_000,
};

/**
 * Output is `amountIn * payoutBps / 10_000`, floored; the price moves
 * `amountIn * ticksPerUnit` steps, clamped to the coordinate range.
 *
 * @example
 * ```ts
 * linearImpact({ ticksPerUnit: 1, payoutBps: 20_000 })
 *   .quote({ price: 30, direction: Direction.ZeroForOne, amountIn: 5n });
 * // { amountOut: 10n, newPrice: 25 }
 * ```
 */
export function linearImpact(config: LinearImpactConfig = DEFAULT_LINEAR_IMPACT): ImpactModel {
	if (!Number.isSafeInteger(config.ticksPerUnit) || config.ticksPerUnit < 0) {
		throw new Error(`ticksPerUnit must be a non-negative integer, got ${config.ticksPerUnit}`);
	}
	if (!Number.isSafeInteger(config.payoutBps) || config.payoutBps < 0) {
		throw new Error(`payoutBps must be a non-negative integer, got ${config.payoutBps}`);
	}
	const ticksPerUnit = BigInt(config.ticksPerUnit);
	const payoutBps = BigInt(config.payoutBps);
	const span = BigInt(MAX_LEVEL - MIN_LEVEL);

	return {
		quote({ price, direction, amountIn }: ImpactInput): ImpactQuote {
			const raw = amountIn * ticksPerUnit;
			const shift = Number(raw > span ? span : raw);
			const moved = direction === Direction.ZeroForOne ? price - shift : price + shift;
			return {
				amountOut: (amountIn * payoutBps) / 10_000n,
				newPrice: Math.min(MAX_LEVEL, Math.max(MIN_LEVEL, moved)),
			};
		},
	};
}
