export { ClaimLedger } from "./claim-ledger.js";
export type { PositionAccount, RedeemError } from "./claim-ledger.js";
