/**
 * InMemoryAssetTransfer — balances per (asset, account) held in process.
 *
 * `transferIn` moves into the custody account and `transferOut` moves out of
 * it. The SimulatedMarket settles trades through the same instance, so one
 * checkpoint covers every balance the engine can touch.
 */

import { type Amount, formatAmount } from "../shared/amount.js";
import type { Checkpointable, Restore } from "../shared/checkpoint.js";
import { TransferFailureError } from "../shared/errors.js";
import { type AccountId, type AssetId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { AssetTransfer } from "./types.js";

function balanceKey(asset: AssetId, account: AccountId): string {
	return JSON.stringify([idToString(asset), idToString(account)]);
}

export class InMemoryAssetTransfer implements AssetTransfer, Checkpointable {
	readonly custody: AccountId;
	private balances = new Map<string, Amount>();

	constructor(custody: AccountId) {
		this.custody = custody;
	}

	/** Create `amount` of `asset` out of thin air (test and paper setup). */
	mint(asset: AssetId, account: AccountId, amount: Amount): void {
		if (amount < 0n) {
			throw new Error(`mint: negative amount ${formatAmount(amount)}`);
		}
		const key = balanceKey(asset, account);
		this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
	}

	balanceOf(asset: AssetId, account: AccountId): Amount {
		return this.balances.get(balanceKey(asset, account)) ?? 0n;
	}

	transfer(
		asset: AssetId,
		from: AccountId,
		to: AccountId,
		amount: Amount,
	): Result<void, TransferFailureError> {
		if (amount < 0n) {
			return err(
				new TransferFailureError("Transfer amount must be non-negative", {
					amount: formatAmount(amount),
				}),
			);
		}
		const available = this.balanceOf(asset, from);
		if (available < amount) {
			return err(
				new TransferFailureError("Insufficient balance", {
					asset: idToString(asset),
					account: idToString(from),
					available: formatAmount(available),
					requested: formatAmount(amount),
				}),
			);
		}
		if (amount === 0n || from === to) return ok(undefined);

		this.balances.set(balanceKey(asset, from), available - amount);
		const toKey = balanceKey(asset, to);
		this.balances.set(toKey, (this.balances.get(toKey) ?? 0n) + amount);
		return ok(undefined);
	}

	transferIn(asset: AssetId, from: AccountId, amount: Amount): Result<void, TransferFailureError> {
		return this.transfer(asset, from, this.custody, amount);
	}

	transferOut(asset: AssetId, to: AccountId, amount: Amount): Result<void, TransferFailureError> {
		return this.transfer(asset, this.custody, to, amount);
	}

	checkpoint(): Restore {
		const saved = new Map(this.balances);
		return () => {
			this.balances = saved;
		};
	}
}
