/**
 * MemoryStateStore — keeps the last saved snapshot in memory.
 * Stored as JSON text so callers never share references with the store.
 */

import { validate } from "../lib/validation/index.js";
import { type TradingError, classifyError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type EngineSnapshot, engineSnapshotSchema } from "./engine-snapshot.js";
import type { StateStore } from "./state-store.js";

export class MemoryStateStore implements StateStore {
	private stored: string | null = null;
	private saves = 0;

	async save(snapshot: EngineSnapshot): Promise<void> {
		this.stored = JSON.stringify(snapshot);
		this.saves++;
	}

	async load(): Promise<Result<EngineSnapshot | null, TradingError>> {
		if (this.stored === null) return ok(null);
		let raw: unknown;
		try {
			raw = JSON.parse(this.stored);
		} catch (e) {
			return err(classifyError(e));
		}
		return validate(engineSnapshotSchema, raw);
	}

	/** Number of saves so far. */
	get saveCount(): number {
		return this.saves;
	}
}
