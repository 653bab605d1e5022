/**
 * PointsIssuer — loyalty points minted as a fixed fraction of an amount spent.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type Amount, formatAmount } from "../shared/amount.js";
import type { Checkpointable, Restore } from "../shared/checkpoint.js";
import { type AccountId, idToString } from "../shared/identifiers.js";

/** Points per 100 units spent. */
export const POINTS_PERCENT = 20n;

export class PointsIssuer implements Checkpointable {
	private balances = new Map<AccountId, Amount>();
	private supply: Amount = 0n;
	private readonly logger: Logger;

	constructor(logger: Logger = silentLogger()) {
		this.logger = logger;
	}

	/** Mint `spent * 20 / 100` points to `recipient`. Without a recipient nothing happens. */
	issue(recipient: AccountId | undefined, spent: Amount): Amount {
		if (recipient === undefined || spent <= 0n) return 0n;
		const points = (spent * POINTS_PERCENT) / 100n;
		if (points === 0n) return 0n;
		this.balances.set(recipient, (this.balances.get(recipient) ?? 0n) + points);
		this.supply += points;
		this.logger.debug({ recipient: idToString(recipient), points: formatAmount(points) }, "Points issued");
		return points;
	}

	balanceOf(account: AccountId): Amount {
		return this.balances.get(account) ?? 0n;
	}

	get totalSupply(): Amount {
		return this.supply;
	}

	checkpoint(): Restore {
		const balances = new Map(this.balances);
		const supply = this.supply;
		return () => {
			this.balances = balances;
			this.supply = supply;
		};
	}
}
