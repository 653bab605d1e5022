export { BASE_FEE, FEE_DENOMINATOR, MovingAverageFee, feeAmount } from "./moving-average-fee.js";
export { POINTS_PERCENT, PointsIssuer } from "./points-issuer.js";
