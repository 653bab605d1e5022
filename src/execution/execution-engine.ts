/**
 * ExecutionEngine — the scan-and-execute cycle run on every trade notice.
 *
 * A cycle scans from the market's LastObservedPrice to its current price,
 * fills the first crossed position as one trade, then rescans from scratch
 * against the post-trade price. `previous` stays fixed for the whole cycle.
 * The cycle is all-or-nothing: any failure restores every participant and
 * drops the fill events it raised.
 */

import type { EngineEventMap } from "../events/engine-events.js";
import type { ClaimLedger } from "../ledger/claim-ledger.js";
import { EventBuffer, type TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { MarketRegistry } from "../market/market-registry.js";
import type { Market, TrackedMarket, TradeNotice } from "../market/types.js";
import type { OrderBook } from "../order/order-book.js";
import type { OrderKey } from "../order/types.js";
import { positionId } from "../position/position-identity.js";
import { type Checkpointable, atomically } from "../shared/checkpoint.js";
import { SystemError, type TradingError } from "../shared/errors.js";
import { type AccountId, type MarketId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { scanForCrossing } from "./crossing-scanner.js";
import { tryTransition } from "./cycle-state.js";
import { type Crossing, type CycleReport, EngineState, type Fill } from "./types.js";

export interface ExecutionEngineDeps {
	readonly book: OrderBook;
	readonly ledger: ClaimLedger;
	readonly markets: MarketRegistry;
	readonly market: Market;
	/** Further stores rolled back with a failed cycle (transfer, market, points) */
	readonly participants: readonly Checkpointable[];
	readonly engineAccount: AccountId;
	readonly maxFillsPerCycle: number;
	readonly events: TypedEmitter<EngineEventMap>;
	readonly clock: Clock;
	readonly logger: Logger;
}

export class ExecutionEngine {
	private readonly deps: ExecutionEngineDeps;
	private readonly participants: readonly Checkpointable[];
	private current: EngineState = EngineState.Idle;

	constructor(deps: ExecutionEngineDeps) {
		if (!Number.isSafeInteger(deps.maxFillsPerCycle) || deps.maxFillsPerCycle <= 0) {
			throw new Error(`maxFillsPerCycle must be a positive integer, got ${deps.maxFillsPerCycle}`);
		}
		this.deps = deps;
		this.participants = [deps.book, deps.ledger, deps.markets, ...deps.participants];
	}

	state(): EngineState {
		return this.current;
	}

	/**
	 * Entry point for the market's trade notifications.
	 * The engine's own trades and untracked markets are skipped without touching state.
	 */
	onTradeCompleted(notice: TradeNotice): Result<CycleReport, TradingError> {
		if (notice.initiator === this.deps.engineAccount) {
			this.deps.logger.debug({ marketId: idToString(notice.marketId) }, "Own trade ignored");
			return ok(skippedReport(notice.marketId));
		}
		const tracked = this.deps.markets.get(notice.marketId);
		if (!tracked) return ok(skippedReport(notice.marketId));
		return this.run(tracked);
	}

	/** Run a cycle without a triggering trade, e.g. to drain work a fill bound deferred. */
	sweep(marketId: MarketId): Result<CycleReport, TradingError> {
		const tracked = this.deps.markets.require(marketId);
		if (!tracked.ok) return tracked;
		return this.run(tracked.value);
	}

	// ── Cycle ──────────────────────────────────────────────────────

	private run(tracked: TrackedMarket): Result<CycleReport, TradingError> {
		if (this.current !== EngineState.Idle) {
			return err(
				new SystemError("Cycle already in progress", {
					marketId: idToString(tracked.marketId),
					state: this.current,
				}),
			);
		}

		const buffer = new EventBuffer<EngineEventMap>();
		const result = atomically(this.participants, () => this.cycle(tracked, buffer));
		this.current = EngineState.Idle;

		if (!result.ok) {
			buffer.discard();
			this.deps.logger.error(
				{ marketId: idToString(tracked.marketId), code: result.error.code, err: result.error.message },
				"Cycle rolled back",
			);
			this.deps.events.emit("cycle_aborted", {
				type: "cycle_aborted",
				timestamp: this.deps.clock.now(),
				marketId: tracked.marketId,
				code: result.error.code,
				reason: result.error.message,
			});
			return result;
		}

		const report = result.value;
		buffer.flush(this.deps.events);
		this.deps.events.emit("cycle_completed", {
			type: "cycle_completed",
			timestamp: this.deps.clock.now(),
			marketId: report.marketId,
			fillCount: report.fills.length,
			finalPrice: report.finalPrice ?? tracked.lastObservedPrice,
			deferred: report.deferred,
		});
		return ok(report);
	}

	private cycle(
		tracked: TrackedMarket,
		buffer: EventBuffer<EngineEventMap>,
	): Result<CycleReport, TradingError> {
		const { marketId, spacing } = tracked;
		const previous = tracked.lastObservedPrice;
		const fills: Fill[] = [];

		const started = this.transition(EngineState.Scanning);
		if (!started.ok) return started;

		for (;;) {
			const price = this.deps.market.currentPrice(marketId);
			if (!price.ok) return price;
			const current = price.value;

			const crossing = scanForCrossing(this.deps.book, { marketId, spacing, previous, current });
			this.deps.logger.debug(
				{ marketId: idToString(marketId), previous, current, match: crossing?.level ?? null },
				"Scanned",
			);

			if (crossing === null) {
				this.deps.markets.observe(marketId, current);
				const done = this.transition(EngineState.Idle);
				if (!done.ok) return done;
				return ok({ marketId, skipped: false, fills, finalPrice: current, deferred: false });
			}

			if (fills.length >= this.deps.maxFillsPerCycle) {
				this.deps.logger.warn(
					{ marketId: idToString(marketId), fills: fills.length, nextLevel: crossing.level },
					"Fill bound reached, deferring remaining crossings",
				);
				const done = this.transition(EngineState.Idle);
				if (!done.ok) return done;
				return ok({ marketId, skipped: false, fills, finalPrice: current, deferred: true });
			}

			const executing = this.transition(EngineState.Executing);
			if (!executing.ok) return executing;

			const fill = this.execute(marketId, crossing);
			if (!fill.ok) return fill;
			fills.push(fill.value);
			buffer.push("order_filled", {
				type: "order_filled",
				timestamp: this.deps.clock.now(),
				...fill.value,
			});

			const rescanning = this.transition(EngineState.Scanning);
			if (!rescanning.ok) return rescanning;
		}
	}

	/** Fill the whole aggregate at the crossed key as one trade and credit the proceeds. */
	private execute(marketId: MarketId, crossing: Crossing): Result<Fill, TradingError> {
		const key: OrderKey = { marketId, level: crossing.level, direction: crossing.direction };
		const receipt = this.deps.market.executeTrade({
			marketId,
			direction: crossing.direction,
			amountIn: crossing.amount,
			initiator: this.deps.engineAccount,
		});
		if (!receipt.ok) return receipt;

		const removed = this.deps.book.remove(key, crossing.amount);
		if (!removed.ok) return removed;

		const id = positionId(key);
		const credited = this.deps.ledger.credit(id, receipt.value.amountOut);
		if (!credited.ok) return credited;

		const fill: Fill = {
			marketId,
			level: crossing.level,
			direction: crossing.direction,
			positionId: id,
			amountIn: crossing.amount,
			amountOut: receipt.value.amountOut,
			priceAfter: receipt.value.newPrice,
		};
		this.deps.logger.info(
			{
				marketId: idToString(marketId),
				level: fill.level,
				direction: fill.direction,
				amountIn: fill.amountIn,
				amountOut: fill.amountOut,
				priceAfter: fill.priceAfter,
			},
			"Order filled",
		);
		return ok(fill);
	}

	private transition(to: EngineState): Result<void, SystemError> {
		const next = tryTransition(this.current, to);
		if (!next.ok) {
			return err(new SystemError(next.error, { from: this.current, to }));
		}
		this.current = next.value;
		return ok(undefined);
	}
}

function skippedReport(marketId: MarketId): CycleReport {
	return { marketId, skipped: true, fills: [], finalPrice: null, deferred: false };
}
