export {
	TakeProfitEngine,
	createTakeProfitEngine,
	restoreEngine,
	type MarketParams,
	type TakeProfitEngineDeps,
} from "./take-profit-engine.js";
