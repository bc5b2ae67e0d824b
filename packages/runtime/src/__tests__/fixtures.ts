import { BotConfig, DataUnavailableError } from "@crossbot/core";
import type { PriceSource } from "@crossbot/data";

export const TEST_CONFIG: BotConfig = {
	symbol: "BTCUSDT",
	interval: "1m",
	baseAssetAmount: 1,
	risk: { stopLossPct: 0.5, takeProfitPct: 0.9, maxPositionSize: 1 },
	strategy: { type: "sma", shortWindow: 2, longWindow: 4 },
	runtime: { tickIntervalMs: 0, stopTimeoutMs: 1_000 },
};

export const withConfig = (overrides: Partial<BotConfig>): BotConfig => ({
	...TEST_CONFIG,
	...overrides,
});

/** BUY at 100 on index 4, SELL at 110 on index 7. */
export const ROUND_TRIP_PRICES = [90, 90, 90, 90, 100, 180, 110, 110];

/**
 * Serves `script` one price per call, then rejects with
 * `DataUnavailableError` once the script is exhausted.
 */
export class ScriptedPriceSource implements PriceSource {
	readonly venue = "scripted";
	calls = 0;
	recentCalls: Array<{ symbol: string; interval: string; limit: number }> = [];

	constructor(
		private readonly script: readonly number[],
		private readonly history: readonly number[] = []
	) {}

	async currentPrice(_symbol: string): Promise<number> {
		const price = this.script[this.calls];
		this.calls += 1;
		if (price === undefined) {
			throw new DataUnavailableError("script exhausted");
		}
		return price;
	}

	async recentPrices(
		symbol: string,
		interval: string,
		limit: number
	): Promise<number[]> {
		this.recentCalls.push({ symbol, interval, limit });
		return this.history.slice(-limit);
	}
}
