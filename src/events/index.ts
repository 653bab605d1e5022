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
} from "./engine-events.js";
