import type { Amount } from "../shared/amount.js";
import type { TransferFailureError } from "../shared/errors.js";
import type { AccountId, AssetId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/**
 * Moves assets between depositors and the engine's custody.
 * The custody account is the implementation's concern.
 */
export interface AssetTransfer {
	transferIn(asset: AssetId, from: AccountId, amount: Amount): Result<void, TransferFailureError>;
	transferOut(asset: AssetId, to: AccountId, amount: Amount): Result<void, TransferFailureError>;
}
