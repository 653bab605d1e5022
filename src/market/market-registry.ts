/**
 * MarketRegistry — markets the engine has initialized and their
 * LastObservedPrice. Records are replaced on write.
 */

import { isValidSpacing } from "../pricing/price-level.js";
import type { Checkpointable, Restore } from "../shared/checkpoint.js";
import { InvalidOrderError } from "../shared/errors.js";
import { type MarketId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { MarketDescriptor, TrackedMarket } from "./types.js";

export class MarketRegistry implements Checkpointable {
	private markets: Map<MarketId, TrackedMarket>;

	private constructor(markets: Map<MarketId, TrackedMarket>) {
		this.markets = markets;
	}

	static create(): MarketRegistry {
		return new MarketRegistry(new Map<MarketId, TrackedMarket>());
	}

	static fromMarkets(markets: Iterable<TrackedMarket>): MarketRegistry {
		const registry = MarketRegistry.create();
		for (const market of markets) {
			registry.markets.set(market.marketId, market);
		}
		return registry;
	}

	register(descriptor: MarketDescriptor, initialPrice: number): Result<TrackedMarket, InvalidOrderError> {
		if (this.markets.has(descriptor.marketId)) {
			return err(
				new InvalidOrderError("Market already initialized", {
					marketId: idToString(descriptor.marketId),
				}),
			);
		}
		if (!isValidSpacing(descriptor.spacing)) {
			return err(new InvalidOrderError("Spacing must be a positive integer", { spacing: descriptor.spacing }));
		}
		if (descriptor.asset0 === descriptor.asset1) {
			return err(
				new InvalidOrderError("A market needs two distinct assets", {
					asset: idToString(descriptor.asset0),
				}),
			);
		}
		const tracked: TrackedMarket = { ...descriptor, lastObservedPrice: initialPrice };
		this.markets.set(descriptor.marketId, tracked);
		return ok(tracked);
	}

	get(marketId: MarketId): TrackedMarket | null {
		return this.markets.get(marketId) ?? null;
	}

	/** Like `get`, but an unknown market is an InvalidOrderError. */
	require(marketId: MarketId): Result<TrackedMarket, InvalidOrderError> {
		const market = this.markets.get(marketId);
		if (!market) {
			return err(new InvalidOrderError("Market not initialized", { marketId: idToString(marketId) }));
		}
		return ok(market);
	}

	/** Record the price a completed scan ended at. */
	observe(marketId: MarketId, price: number): void {
		const market = this.markets.get(marketId);
		if (!market) {
			throw new Error(`observe: unknown market ${idToString(marketId)}`);
		}
		this.markets.set(marketId, { ...market, lastObservedPrice: price });
	}

	all(): readonly TrackedMarket[] {
		return [...this.markets.values()];
	}

	checkpoint(): Restore {
		const saved = new Map(this.markets);
		return () => {
			this.markets = saved;
		};
	}
}
