export {
	type MarketId,
	type AccountId,
	type AssetId,
	type PositionId,
	marketId,
	accountId,
	assetId,
	positionIdFromHex,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	InvalidOrderError,
	NothingToClaimError,
	InsufficientShareError,
	MarketFailureError,
	TransferFailureError,
	ConfigError,
	SystemError,
	classifyError,
	isInvalidOrder,
	isNothingToClaim,
	isInsufficientShare,
	isMarketFailure,
	isTransferFailure,
	isConfigError,
	isSystemError,
} from "./errors.js";

export {
	type Amount,
	mulDivDown,
	isPositiveAmount,
	formatAmount,
	parseAmount,
} from "./amount.js";
export {
	Direction,
	type AssetPair,
	oppositeDirection,
	inputAsset,
	outputAsset,
	isDirection,
} from "./direction.js";
export { type Restore, type Checkpointable, isCheckpointable, atomically } from "./checkpoint.js";
export { type Clock, SystemClock, FakeClock } from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
