export type {
	Market,
	MarketDescriptor,
	TrackedMarket,
	TradeListener,
	TradeNotice,
	TradeNotifier,
	TradeReceipt,
	TradeRequest,
} from "./types.js";
export { MarketRegistry } from "./market-registry.js";
export {
	DEFAULT_LINEAR_IMPACT,
	linearImpact,
	type ImpactInput,
	type ImpactModel,
	type ImpactQuote,
	type LinearImpactConfig,
} from "./impact-model.js";
export {
	SimulatedMarket,
	isTransactionalNotifier,
	type ListedMarket,
	type SimulatedMarketConfig,
	type TransactionalNotifier,
} from "./simulated-market.js";
