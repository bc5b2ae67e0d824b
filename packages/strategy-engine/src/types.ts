import type { Signal } from "@crossbot/core";

export type CrossState = "ABOVE" | "BELOW" | "UNSET";

/**
 * Stateful signal generator. `prices` is ordered oldest first; implementations
 * may keep state between calls, so one instance serves exactly one run.
 */
export interface SignalEngine {
	readonly type: string;
	/** Number of prices needed before the engine can emit anything but HOLD. */
	readonly requiredHistory: number;
	generateSignal(prices: readonly number[]): Signal;
	reset(): void;
}
