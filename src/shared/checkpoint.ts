/**
 * Checkpoint — all-or-nothing execution across several stateful stores.
 *
 * Each participant hands out a Restore closure capturing its current state.
 * atomically() runs the body and, if it fails or throws, restores every
 * participant in reverse order so no partial change survives.
 */

import { type TradingError, classifyError } from "./errors.js";
import { type Result, err } from "./result.js";

/** Puts a store back into the state captured when the closure was created. */
export type Restore = () => void;

/** A store whose state can be captured and rolled back. */
export interface Checkpointable {
	checkpoint(): Restore;
}

/** Type guard for collaborators that opt into rollback. */
export function isCheckpointable(value: unknown): value is Checkpointable {
	return (
		typeof value === "object" &&
		value !== null &&
		"checkpoint" in value &&
		typeof value.checkpoint === "function"
	);
}

/**
 * Run `body` against `participants` atomically.
 * A thrown value is classified into a TradingError and returned as `err`.
 */
export function atomically<T>(
	participants: readonly Checkpointable[],
	body: () => Result<T, TradingError>,
): Result<T, TradingError> {
	const restores = participants.map((p) => p.checkpoint());
	let result: Result<T, TradingError>;
	try {
		result = body();
	} catch (e) {
		result = err(classifyError(e));
	}
	if (!result.ok) {
		for (let i = restores.length - 1; i >= 0; i--) {
			restores[i]?.();
		}
	}
	return result;
}
