/**
 * PositionIdentity — deterministic ids for (market, level, direction) positions.
 *
 * The id is the SHA-256 of a canonical encoding of the key, so anyone can
 * derive it and distinct keys never share an id in practice. The id is the
 * unit of account for claim shares.
 */

import { createHash } from "node:crypto";
import type { Direction } from "../shared/direction.js";
import { type MarketId, type PositionId, idToString, positionIdFromHex } from "../shared/identifiers.js";

/** The key a position aggregates orders under. */
export interface PositionKey {
	readonly marketId: MarketId;
	readonly level: number;
	readonly direction: Direction;
}

/** Canonical, unambiguous encoding: JSON array of the three parts. */
export function encodePositionKey(key: PositionKey): string {
	return JSON.stringify([idToString(key.marketId), key.level, key.direction]);
}

/** Derive the PositionId for a key. Pure. */
export function positionId(key: PositionKey): PositionId {
	const digest = createHash("sha256").update(encodePositionKey(key)).digest("hex");
	return positionIdFromHex(`0x${digest}`);
}
