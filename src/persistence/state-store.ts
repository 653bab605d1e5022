import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { EngineSnapshot } from "./engine-snapshot.js";

/** Durable home for engine snapshots. `load` yields null when nothing was saved yet. */
export interface StateStore {
	save(snapshot: EngineSnapshot): Promise<void>;
	load(): Promise<Result<EngineSnapshot | null, TradingError>>;
}
