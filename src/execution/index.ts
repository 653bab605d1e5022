export { crossedDirection, scanForCrossing } from "./crossing-scanner.js";
export type { ScanWindow } from "./crossing-scanner.js";
export { canTransitionTo, tryTransition } from "./cycle-state.js";
export { ExecutionEngine } from "./execution-engine.js";
export type { ExecutionEngineDeps } from "./execution-engine.js";
export { EngineState } from "./types.js";
export type { Crossing, CycleReport, Fill } from "./types.js";
