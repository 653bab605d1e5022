export { InMemoryAssetTransfer } from "./in-memory-asset-transfer.js";
export type { AssetTransfer } from "./types.js";
