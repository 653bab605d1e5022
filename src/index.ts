// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type MarketId,
	type AccountId,
	type AssetId,
	type PositionId,
	marketId,
	accountId,
	assetId,
	idToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	type Amount,
	formatAmount,
	parseAmount,
	Direction,
	inputAsset,
	outputAsset,
	type Restore,
	type Checkpointable,
	atomically,
	type Clock,
	SystemClock,
	FakeClock,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	resolveConfig,
	TradingError,
	ErrorCategory,
	InvalidOrderError,
	NothingToClaimError,
	InsufficientShareError,
	MarketFailureError,
	TransferFailureError,
	ConfigError,
	SystemError,
	classifyError,
} from "./shared/index.js";

// ── Engine ───────────────────────────────────────────────────────────
export {
	TakeProfitEngine,
	createTakeProfitEngine,
	restoreEngine,
	type MarketParams,
	type TakeProfitEngineDeps,
} from "./engine/index.js";

// ── Events ───────────────────────────────────────────────────────────
export type {
	EngineEvent,
	EngineEventType,
	EngineEventMap,
	MarketInitialized,
	OrderPlaced,
	OrderCancelled,
	OrderFilled,
	Redeemed,
	CycleCompleted,
	CycleAborted,
} from "./events/index.js";

// ── Pricing ──────────────────────────────────────────────────────────
export {
	MIN_LEVEL,
	MAX_LEVEL,
	resolveLevel,
	ceilLevel,
	priceAtLevel,
	levelAtPrice,
} from "./pricing/index.js";

// ── Orders & Claims ──────────────────────────────────────────────────
export { OrderBook, type OrderKey, type PendingEntry } from "./order/index.js";
export { ClaimLedger, type PositionAccount } from "./ledger/index.js";
export { type PositionKey, positionId } from "./position/index.js";

// ── Execution ────────────────────────────────────────────────────────
export { EngineState, type CycleReport, type Fill } from "./execution/index.js";

// ── Market & Transfer ────────────────────────────────────────────────
export {
	type Market,
	type TradeNotice,
	type TradeNotifier,
	type TradeRequest,
	type TradeReceipt,
	SimulatedMarket,
	type SimulatedMarketConfig,
	linearImpact,
	type ImpactModel,
} from "./market/index.js";
export { type AssetTransfer, InMemoryAssetTransfer } from "./transfer/index.js";

// ── Accounting ───────────────────────────────────────────────────────
export { MovingAverageFee, PointsIssuer } from "./accounting/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type EngineSnapshot,
	type StateStore,
	FileStateStore,
	MemoryStateStore,
	encodeSnapshot,
	decodeSnapshot,
} from "./persistence/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { TypedEmitter } from "./lib/events/index.js";
export { ValidationError, validate } from "./lib/validation/index.js";
