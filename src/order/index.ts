export { OrderBook } from "./order-book.js";
export { OrderService } from "./order-service.js";
export type { OrderServiceDeps, Placement } from "./order-service.js";
export type { OrderKey, OrderLookup, PendingEntry } from "./types.js";
