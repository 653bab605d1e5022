/**
 * EngineSnapshot — the JSON-safe form of the engine's state.
 *
 * Version 1 carries the tracked markets, the pending aggregates and the
 * claim ledger positions. Amounts travel as decimal strings; position ids are
 * not stored but derived again from each position's key.
 */

import type { PositionAccount } from "../ledger/claim-ledger.js";
import { amountString, priceCoordinate, validate, z } from "../lib/validation/index.js";
import type { TrackedMarket } from "../market/types.js";
import type { OrderKey } from "../order/types.js";
import { encodePositionKey, positionId } from "../position/position-identity.js";
import { isAligned } from "../pricing/price-level.js";
import { type Amount, formatAmount, parseAmount } from "../shared/amount.js";
import { Direction } from "../shared/direction.js";
import { InvalidOrderError, type TradingError, classifyError } from "../shared/errors.js";
import { type AccountId, accountId, assetId, idToString, marketId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export const SNAPSHOT_VERSION = 1;

const idText = z.string().trim().min(1);
const direction = z.enum([Direction.ZeroForOne, Direction.OneForZero]);

export const engineSnapshotSchema = z.object({
	version: z.literal(SNAPSHOT_VERSION),
	markets: z.array(
		z.object({
			marketId: idText,
			asset0: idText,
			asset1: idText,
			spacing: z.number().int().positive(),
			lastObservedPrice: priceCoordinate,
		}),
	),
	orders: z.array(
		z.object({
			marketId: idText,
			level: priceCoordinate,
			direction,
			amount: amountString,
		}),
	),
	positions: z.array(
		z.object({
			marketId: idText,
			level: priceCoordinate,
			direction,
			supply: amountString,
			claimable: amountString,
			holders: z.array(z.object({ owner: idText, share: amountString })),
		}),
	),
});

export type EngineSnapshot = z.infer<typeof engineSnapshotSchema>;

/** Engine state in domain types, as captured from or restored into the stores. */
export interface EngineStateParts {
	readonly markets: readonly TrackedMarket[];
	readonly orders: readonly { readonly key: OrderKey; readonly amount: Amount }[];
	readonly positions: readonly PositionAccount[];
}

function compareKeys(a: OrderKey, b: OrderKey): number {
	if (a.marketId !== b.marketId) return a.marketId < b.marketId ? -1 : 1;
	if (a.level !== b.level) return a.level - b.level;
	return a.direction < b.direction ? -1 : a.direction > b.direction ? 1 : 0;
}

/** Serialize state; output order is deterministic. */
export function encodeSnapshot(parts: EngineStateParts): EngineSnapshot {
	return {
		version: SNAPSHOT_VERSION,
		markets: [...parts.markets]
			.sort((a, b) => (a.marketId < b.marketId ? -1 : a.marketId > b.marketId ? 1 : 0))
			.map((m) => ({
				marketId: idToString(m.marketId),
				asset0: idToString(m.asset0),
				asset1: idToString(m.asset1),
				spacing: m.spacing,
				lastObservedPrice: m.lastObservedPrice,
			})),
		orders: [...parts.orders]
			.sort((a, b) => compareKeys(a.key, b.key))
			.map(({ key, amount }) => ({
				marketId: idToString(key.marketId),
				level: key.level,
				direction: key.direction,
				amount: formatAmount(amount),
			})),
		positions: [...parts.positions]
			.sort((a, b) => compareKeys(a.key, b.key))
			.map((p) => ({
				marketId: idToString(p.key.marketId),
				level: p.key.level,
				direction: p.key.direction,
				supply: formatAmount(p.supply),
				claimable: formatAmount(p.claimable),
				holders: [...p.holders]
					.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
					.map(([owner, share]) => ({ owner: idToString(owner), share: formatAmount(share) })),
			})),
	};
}

type SnapshotEntry = EngineSnapshot["orders"][number] | EngineSnapshot["positions"][number];

function entryKey(entry: SnapshotEntry): string {
	return encodePositionKey({ marketId: marketId(entry.marketId), level: entry.level, direction: entry.direction });
}

function describeEntry(entry: SnapshotEntry): Record<string, unknown> {
	return { marketId: entry.marketId, level: entry.level, direction: entry.direction };
}

/**
 * Cross-checks the sections against each other.
 * Each nonzero pending aggregate must be covered by its position's supply.
 */
function checkStructure(snapshot: EngineSnapshot): InvalidOrderError | null {
	const spacing = new Map<string, number>();
	for (const m of snapshot.markets) {
		if (spacing.has(m.marketId)) {
			return new InvalidOrderError("Snapshot repeats a market", { marketId: m.marketId });
		}
		spacing.set(m.marketId, m.spacing);
	}

	for (const entry of [...snapshot.orders, ...snapshot.positions]) {
		const marketSpacing = spacing.get(entry.marketId);
		if (marketSpacing === undefined) {
			return new InvalidOrderError("Snapshot references an unknown market", { marketId: entry.marketId });
		}
		if (!isAligned(entry.level, marketSpacing)) {
			return new InvalidOrderError("Snapshot level is not aligned to the market spacing", {
				...describeEntry(entry),
				spacing: marketSpacing,
			});
		}
	}

	const supplies = new Map<string, Amount>();
	for (const p of snapshot.positions) {
		const key = entryKey(p);
		if (supplies.has(key)) {
			return new InvalidOrderError("Snapshot repeats a position key", describeEntry(p));
		}
		supplies.set(key, parseAmount(p.supply));
	}

	const orderKeys = new Set<string>();
	for (const o of snapshot.orders) {
		const key = entryKey(o);
		if (orderKeys.has(key)) {
			return new InvalidOrderError("Snapshot repeats an order key", describeEntry(o));
		}
		orderKeys.add(key);
		const amount = parseAmount(o.amount);
		if (amount === 0n) continue;
		const supply = supplies.get(key);
		if (supply === undefined) {
			return new InvalidOrderError("Snapshot order has no claim position", describeEntry(o));
		}
		if (amount > supply) {
			return new InvalidOrderError("Snapshot pending amount exceeds claim supply", {
				...describeEntry(o),
				amount: o.amount,
				supply: formatAmount(supply),
			});
		}
	}
	return null;
}

/**
 * Validate untrusted input and convert it to domain state.
 * @returns ValidationError for a malformed document, InvalidOrder when its sections disagree
 */
export function decodeSnapshot(raw: unknown): Result<EngineStateParts, TradingError> {
	const checked = validate(engineSnapshotSchema, raw);
	if (!checked.ok) return checked;
	const snapshot = checked.value;

	try {
		const broken = checkStructure(snapshot);
		if (broken) return err(broken);

		const markets: TrackedMarket[] = snapshot.markets.map((m) => ({
			marketId: marketId(m.marketId),
			asset0: assetId(m.asset0),
			asset1: assetId(m.asset1),
			spacing: m.spacing,
			lastObservedPrice: m.lastObservedPrice,
		}));
		const orders = snapshot.orders.map((o) => ({
			key: { marketId: marketId(o.marketId), level: o.level, direction: o.direction },
			amount: parseAmount(o.amount),
		}));
		const positions: PositionAccount[] = snapshot.positions.map((p) => {
			const key: OrderKey = { marketId: marketId(p.marketId), level: p.level, direction: p.direction };
			const holders = new Map<AccountId, Amount>();
			for (const h of p.holders) {
				const share = parseAmount(h.share);
				if (share > 0n) holders.set(accountId(h.owner), share);
			}
			return {
				id: positionId(key),
				key,
				supply: parseAmount(p.supply),
				claimable: parseAmount(p.claimable),
				holders,
			};
		});
		return ok({ markets, orders, positions });
	} catch (e) {
		return err(classifyError(e));
	}
}
