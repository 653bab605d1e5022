export {
	MIN_LEVEL,
	MAX_LEVEL,
	resolveLevel,
	resolveLevelChecked,
	ceilLevel,
	isAligned,
	isValidSpacing,
	levelsBetween,
} from "./price-level.js";
export { priceAtLevel, levelAtPrice } from "./tick-math.js";
