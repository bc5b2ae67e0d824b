import { ConfigurationError, Signal } from "@crossbot/core";
import { sma } from "@crossbot/indicators";
import type { CrossState, SignalEngine } from "./types";

export interface SmaCrossoverConfig {
	shortWindow: number;
	longWindow: number;
}

export class SmaCrossoverStrategy implements SignalEngine {
	readonly type = "sma";
	readonly shortWindow: number;
	readonly longWindow: number;
	private lastCrossState: CrossState = "UNSET";

	constructor(config: SmaCrossoverConfig) {
		const { shortWindow, longWindow } = config;
		if (!Number.isInteger(shortWindow) || shortWindow <= 0) {
			throw new ConfigurationError("shortWindow must be a positive integer");
		}
		if (!Number.isInteger(longWindow) || longWindow <= 0) {
			throw new ConfigurationError("longWindow must be a positive integer");
		}
		if (longWindow <= shortWindow) {
			throw new ConfigurationError(
				"longWindow must be greater than shortWindow"
			);
		}
		this.shortWindow = shortWindow;
		this.longWindow = longWindow;
	}

	get requiredHistory(): number {
		return this.longWindow;
	}

	get crossState(): CrossState {
		return this.lastCrossState;
	}

	generateSignal(prices: readonly number[]): Signal {
		const shortMa = sma(prices, this.shortWindow);
		const longMa = sma(prices, this.longWindow);
		if (shortMa === null || longMa === null) {
			return "HOLD";
		}

		// Equal averages count as BELOW.
		const currentState: CrossState = shortMa > longMa ? "ABOVE" : "BELOW";
		const previousState = this.lastCrossState;
		this.lastCrossState = currentState;

		if (previousState === "BELOW" && currentState === "ABOVE") {
			return "BUY";
		}
		if (previousState === "ABOVE" && currentState === "BELOW") {
			return "SELL";
		}
		return "HOLD";
	}

	reset(): void {
		this.lastCrossState = "UNSET";
	}
}
