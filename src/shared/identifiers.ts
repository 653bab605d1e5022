/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing an AccountId where a MarketId is expected).
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Identifier of a two-asset market tracked by the engine. */
export type MarketId = Brand<string, "MarketId">;
/** Identifier of a depositor, the engine's custody account, or a market's liquidity account. */
export type AccountId = Brand<string, "AccountId">;
/** Identifier of a transferable asset. */
export type AssetId = Brand<string, "AssetId">;
/** Deterministic identifier of a (market, price level, direction) position. */
export type PositionId = Brand<string, "PositionId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated MarketId from a raw string. Throws if empty. */
export function marketId(value: string): MarketId {
	return createBrandedId(value, "MarketId");
}

/** Create a validated AccountId from a raw string. Throws if empty. */
export function accountId(value: string): AccountId {
	return createBrandedId(value, "AccountId");
}

/** Create a validated AssetId from a raw string. Throws if empty. */
export function assetId(value: string): AssetId {
	return createBrandedId(value, "AssetId");
}

const POSITION_ID_PATTERN = /^0x[0-9a-f]{64}$/;

/** Create a PositionId from its hex form. Throws unless it is `0x` followed by 64 lowercase hex digits. */
export function positionIdFromHex(value: string): PositionId {
	const trimmed = value.trim();
	if (!POSITION_ID_PATTERN.test(trimmed)) {
		throw new Error(`PositionId must be 0x-prefixed 32-byte hex, got: ${trimmed}`);
	}
	return trimmed as PositionId;
}

// ── Utility: extract raw string ──────────────────────────────────────

/** Extract the raw string from any branded identifier type. */
export function idToString(id: MarketId | AccountId | AssetId | PositionId): string {
	return id as string;
}
