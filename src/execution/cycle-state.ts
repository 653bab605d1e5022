/**
 * Cycle state machine: Idle → Scanning → Executing → Scanning → … → Idle.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { EngineState } from "./types.js";

const VALID_TRANSITIONS: ReadonlyMap<EngineState, readonly EngineState[]> = new Map([
	[EngineState.Idle, [EngineState.Scanning]],
	[EngineState.Scanning, [EngineState.Executing, EngineState.Idle]],
	[EngineState.Executing, [EngineState.Scanning]],
]);

export function canTransitionTo(from: EngineState, to: EngineState): boolean {
	return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/**
 * @returns Ok(to) if the transition is allowed, Err with a message otherwise
 *
 * @example
 * ```ts
 * tryTransition(EngineState.Idle, EngineState.Executing); // err("Invalid transition: idle → executing")
 * ```
 */
export function tryTransition(from: EngineState, to: EngineState): Result<EngineState, string> {
	if (canTransitionTo(from, to)) {
		return ok(to);
	}
	return err(`Invalid transition: ${from} → ${to}`);
}
