/**
 * ClaimLedger — pooled claim accounting per position.
 *
 * Each position is a small fungible sub-ledger: depositors hold shares, the
 * position tracks the total share supply and the output claimable by those
 * shares. Minting and burning stay private so the conservation invariant
 * (sum of holder shares === supply) is enforced in this file only.
 *
 * Position records are replaced on every write, never mutated, so a
 * checkpoint is a shallow copy of the outer map.
 */

import { type PositionKey, positionId } from "../position/position-identity.js";
import { type Amount, formatAmount, isPositiveAmount, mulDivDown } from "../shared/amount.js";
import type { Checkpointable, Restore } from "../shared/checkpoint.js";
import {
	InsufficientShareError,
	InvalidOrderError,
	NothingToClaimError,
} from "../shared/errors.js";
import { type AccountId, type PositionId, idToString } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

/** Immutable state of one position. */
export interface PositionAccount {
	readonly id: PositionId;
	readonly key: PositionKey;
	readonly supply: Amount;
	readonly claimable: Amount;
	readonly holders: ReadonlyMap<AccountId, Amount>;
}

export type RedeemError = NothingToClaimError | InsufficientShareError | InvalidOrderError;

export class ClaimLedger implements Checkpointable {
	private accounts: Map<PositionId, PositionAccount>;

	private constructor(accounts: Map<PositionId, PositionAccount>) {
		this.accounts = accounts;
	}

	/** Creates an empty ledger. */
	static create(): ClaimLedger {
		return new ClaimLedger(new Map());
	}

	/**
	 * Rebuilds a ledger from persisted accounts.
	 * @param accounts - Position records, at most one per position id
	 * @throws Error on a repeated position id, or if an account's holders do not sum to its supply
	 */
	static fromAccounts(accounts: Iterable<PositionAccount>): ClaimLedger {
		const map = new Map<PositionId, PositionAccount>();
		for (const account of accounts) {
			if (map.has(account.id)) {
				throw new Error(`Position ${idToString(account.id)} appears twice`);
			}
			let sum = 0n;
			for (const share of account.holders.values()) sum += share;
			if (sum !== account.supply) {
				throw new Error(
					`Position ${idToString(account.id)}: holder shares ${sum} do not match supply ${account.supply}`,
				);
			}
			map.set(account.id, account);
		}
		return new ClaimLedger(map);
	}

	// ── Mutations ──────────────────────────────────────────────────

	/**
	 * Mints shares of the key's position to `owner`, creating the position on first use.
	 * @param key - Market, level and direction of the position
	 * @param owner - Account receiving the shares
	 * @param amount - Shares to mint; equal to the input deposited
	 * @returns The position id, or InvalidOrder for a non-positive amount
	 */
	deposit(key: PositionKey, owner: AccountId, amount: Amount): Result<PositionId, InvalidOrderError> {
		if (!isPositiveAmount(amount)) {
			return err(new InvalidOrderError("Deposit must be positive", { amount: formatAmount(amount) }));
		}
		const id = positionId(key);
		const account = this.accounts.get(id) ?? emptyAccount(id, key);
		this.accounts.set(id, mint(account, owner, amount));
		return ok(id);
	}

	/**
	 * Burns `owner`'s shares without paying anything out (cancellation).
	 * @param id - Position to withdraw from
	 * @param owner - Share holder
	 * @param amount - Shares to burn
	 * @returns InsufficientShare when the owner holds fewer than `amount`
	 */
	withdraw(
		id: PositionId,
		owner: AccountId,
		amount: Amount,
	): Result<void, InsufficientShareError | InvalidOrderError> {
		if (!isPositiveAmount(amount)) {
			return err(new InvalidOrderError("Withdrawal must be positive", { amount: formatAmount(amount) }));
		}
		const account = this.accounts.get(id);
		const share = account?.holders.get(owner) ?? 0n;
		if (!account || share < amount) {
			return err(insufficientShare(id, owner, share, amount));
		}
		this.accounts.set(id, burn(account, owner, amount));
		return ok(undefined);
	}

	/**
	 * Adds realized output to a position. Only the execution engine calls this.
	 * @param id - Position that was filled
	 * @param outputAmount - Output received for the fill
	 * @returns InvalidOrder for an unknown position or a negative amount
	 */
	credit(id: PositionId, outputAmount: Amount): Result<void, InvalidOrderError> {
		if (outputAmount < 0n) {
			return err(
				new InvalidOrderError("Credit must be non-negative", { amount: formatAmount(outputAmount) }),
			);
		}
		const account = this.accounts.get(id);
		if (!account) {
			return err(new InvalidOrderError("Unknown position", { positionId: idToString(id) }));
		}
		this.accounts.set(id, { ...account, claimable: account.claimable + outputAmount });
		return ok(undefined);
	}

	/**
	 * Burns shares for `floor(shareAmount * claimable / supply)` output.
	 * Rounding dust stays in the position.
	 * @param id - Position to redeem from
	 * @param owner - Share holder
	 * @param shareAmount - Shares to burn
	 * @returns The output owed, or InvalidOrder, NothingToClaim or InsufficientShare in that order of checks
	 */
	redeem(id: PositionId, owner: AccountId, shareAmount: Amount): Result<Amount, RedeemError> {
		if (!isPositiveAmount(shareAmount)) {
			return err(
				new InvalidOrderError("Redeemed share amount must be positive", {
					amount: formatAmount(shareAmount),
				}),
			);
		}
		const account = this.accounts.get(id);
		if (!account || account.claimable === 0n) {
			return err(new NothingToClaimError("Nothing to claim", { positionId: idToString(id) }));
		}
		const share = account.holders.get(owner) ?? 0n;
		if (share < shareAmount) {
			return err(insufficientShare(id, owner, share, shareAmount));
		}

		const output = mulDivDown(shareAmount, account.claimable, account.supply);
		const burned = burn(account, owner, shareAmount);
		this.accounts.set(id, { ...burned, claimable: account.claimable - output });
		return ok(output);
	}

	// ── Queries ────────────────────────────────────────────────────

	/**
	 * Previews a redemption without changing state.
	 * @returns Output `shareAmount` shares would receive now; 0 for unknown or empty positions
	 */
	quoteRedeem(id: PositionId, shareAmount: Amount): Amount {
		const account = this.accounts.get(id);
		if (!account || account.supply === 0n || !isPositiveAmount(shareAmount)) return 0n;
		return mulDivDown(shareAmount, account.claimable, account.supply);
	}

	/**
	 * @param id - Position to look up
	 * @param owner - Share holder
	 * @returns The owner's share, 0 when they hold none
	 */
	shareOf(id: PositionId, owner: AccountId): Amount {
		return this.accounts.get(id)?.holders.get(owner) ?? 0n;
	}

	/** @returns Total shares outstanding for the position, 0 when unknown */
	supplyOf(id: PositionId): Amount {
		return this.accounts.get(id)?.supply ?? 0n;
	}

	/** @returns Output credited and not yet redeemed, 0 when unknown */
	claimableOf(id: PositionId): Amount {
		return this.accounts.get(id)?.claimable ?? 0n;
	}

	/** Holders with a nonzero share. */
	holdersOf(id: PositionId): ReadonlyMap<AccountId, Amount> {
		return this.accounts.get(id)?.holders ?? new Map<AccountId, Amount>();
	}

	/** @returns The key the position was created for, or null if the ledger never saw it */
	keyOf(id: PositionId): PositionKey | null {
		return this.accounts.get(id)?.key ?? null;
	}

	/** @returns The full position record, or null if unknown */
	get(id: PositionId): PositionAccount | null {
		return this.accounts.get(id) ?? null;
	}

	/** Every position the ledger holds, in insertion order. */
	all(): readonly PositionAccount[] {
		return [...this.accounts.values()];
	}

	// ── Checkpoint ─────────────────────────────────────────────────

	/** @returns A function that puts every position back as it is now */
	checkpoint(): Restore {
		const saved = new Map(this.accounts);
		return () => {
			this.accounts = saved;
		};
	}
}

// ── Internal mint / burn ─────────────────────────────────────────────

function emptyAccount(id: PositionId, key: PositionKey): PositionAccount {
	return { id, key, supply: 0n, claimable: 0n, holders: new Map<AccountId, Amount>() };
}

function mint(account: PositionAccount, owner: AccountId, amount: Amount): PositionAccount {
	const holders = new Map(account.holders);
	holders.set(owner, (holders.get(owner) ?? 0n) + amount);
	return { ...account, supply: account.supply + amount, holders };
}

function burn(account: PositionAccount, owner: AccountId, amount: Amount): PositionAccount {
	const holders = new Map(account.holders);
	const remaining = (holders.get(owner) ?? 0n) - amount;
	if (remaining === 0n) {
		holders.delete(owner);
	} else {
		holders.set(owner, remaining);
	}
	return { ...account, supply: account.supply - amount, holders };
}

function insufficientShare(
	id: PositionId,
	owner: AccountId,
	share: Amount,
	requested: Amount,
): InsufficientShareError {
	return new InsufficientShareError("Insufficient claim share", {
		positionId: idToString(id),
		owner: idToString(owner),
		share: formatAmount(share),
		requested: formatAmount(requested),
	});
}
