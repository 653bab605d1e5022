export {
	SNAPSHOT_VERSION,
	decodeSnapshot,
	encodeSnapshot,
	engineSnapshotSchema,
} from "./engine-snapshot.js";
export type { EngineSnapshot, EngineStateParts } from "./engine-snapshot.js";
export { FileStateStore } from "./file-state-store.js";
export type { FileStateStoreConfig } from "./file-state-store.js";
export { MemoryStateStore } from "./memory-state-store.js";
export type { StateStore } from "./state-store.js";
