import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { positionId } from "../position/position-identity.js";
import { Direction } from "../shared/direction.js";
import { accountId, marketId } from "../shared/identifiers.js";
import { ClaimLedger } from "./claim-ledger.js";

const KEY = { marketId: marketId("eth-usd"), level: 0, direction: Direction.OneForZero };
const ID = positionId(KEY);
const OWNERS = ["alice", "bob", "carol"].map((o) => accountId(o));

type Op =
	| { readonly kind: "deposit"; readonly owner: number; readonly amount: bigint }
	| { readonly kind: "withdraw"; readonly owner: number; readonly amount: bigint }
	| { readonly kind: "credit"; readonly amount: bigint }
	| { readonly kind: "redeem"; readonly owner: number; readonly amount: bigint };

const owner = fc.integer({ min: 0, max: OWNERS.length - 1 });
const amount = fc.bigInt({ min: 1n, max: 10_000n });

const op: fc.Arbitrary<Op> = fc.oneof(
	fc.record({ kind: fc.constant("deposit" as const), owner, amount }),
	fc.record({ kind: fc.constant("withdraw" as const), owner, amount }),
	fc.record({ kind: fc.constant("credit" as const), amount }),
	fc.record({ kind: fc.constant("redeem" as const), owner, amount }),
);

function ownerAt(index: number) {
	const found = OWNERS[index];
	if (!found) throw new Error(`no owner ${index}`);
	return found;
}

describe("ClaimLedger (property-based)", () => {
	it("holder shares always sum to supply, and payouts never exceed credits", () => {
		fc.assert(
			fc.property(fc.array(op, { maxLength: 60 }), (ops) => {
				const ledger = ClaimLedger.create();
				let credited = 0n;
				let paid = 0n;

				for (const o of ops) {
					switch (o.kind) {
						case "deposit":
							ledger.deposit(KEY, ownerAt(o.owner), o.amount);
							break;
						case "withdraw":
							ledger.withdraw(ID, ownerAt(o.owner), o.amount);
							break;
						case "credit":
							if (ledger.credit(ID, o.amount).ok) credited += o.amount;
							break;
						case "redeem": {
							const r = ledger.redeem(ID, ownerAt(o.owner), o.amount);
							if (r.ok) paid += r.value;
							break;
						}
					}

					let sum = 0n;
					for (const share of ledger.holdersOf(ID).values()) sum += share;
					expect(sum).toBe(ledger.supplyOf(ID));
					expect(paid <= credited).toBe(true);
					expect(ledger.claimableOf(ID)).toBe(credited - paid);
				}
			}),
			{ numRuns: 500 },
		);
	});
});
