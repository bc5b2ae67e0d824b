/**
 * Strategy engine converts a price history into HOLD/BUY/SELL signals.
 */
export type { CrossState, SignalEngine } from "./types";
export { SmaCrossoverStrategy } from "./SmaCrossoverStrategy";
export type { SmaCrossoverConfig } from "./SmaCrossoverStrategy";
export {
	createSignalEngine,
	getRegisteredStrategyTypes,
	isRegisteredStrategyType,
} from "./registry";
export type { SignalEngineFactory } from "./registry";
