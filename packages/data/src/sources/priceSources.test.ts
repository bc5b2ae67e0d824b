import type { OHLCV } from "ccxt";
import { describe, expect, it } from "vitest";
import { DataUnavailableError } from "@crossbot/core";
import { CcxtPriceSource, OhlcvClient } from "./ccxtPriceSource";
import { FallbackPriceSource } from "./fallbackPriceSource";
import { SyntheticPriceSource } from "./syntheticPriceSource";
import { createPriceSource } from "../createPriceSource";
import type { PriceSource } from "../types";

const buildRows = (closes: number[], start = Date.UTC(2025, 0, 1)): OHLCV[] =>
	closes.map((close, idx) => [
		start + idx * 60_000,
		close - 1,
		close + 1,
		close - 2,
		close,
		100 + idx,
	]);

class StaticOhlcvClient implements OhlcvClient {
	readonly calls: Array<{ symbol: string; timeframe: string; limit?: number }> =
		[];

	constructor(private readonly rows: OHLCV[]) {}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		_since?: number,
		limit?: number
	): Promise<OHLCV[]> {
		this.calls.push({ symbol, timeframe, limit });
		return limit === undefined ? this.rows : this.rows.slice(-limit);
	}
}

class FailingOhlcvClient implements OhlcvClient {
	async fetchOHLCV(): Promise<OHLCV[]> {
		throw new Error("exchange down");
	}
}

class FailingPriceSource implements PriceSource {
	readonly venue = "broken";

	async currentPrice(): Promise<number> {
		throw new DataUnavailableError("no price");
	}

	async recentPrices(): Promise<number[]> {
		throw new DataUnavailableError("no prices");
	}
}

const constantRandom = (value: number) => () => value;

// random() = 0.5 -> base 25_000, gaussian = -sqrt(2 ln 2)
const expectedSample = 25_000 - 250 * Math.sqrt(2 * Math.log(2));

describe("CcxtPriceSource", () => {
	it("maps closes oldest first and unifies the symbol", async () => {
		const client = new StaticOhlcvClient(buildRows([100, 101, 102]));
		const source = new CcxtPriceSource({ client });
		await expect(source.recentPrices("BTCUSDT", "5m", 3)).resolves.toEqual([
			100, 101, 102,
		]);
		expect(client.calls).toEqual([
			{ symbol: "BTC/USDT", timeframe: "5m", limit: 3 },
		]);
	});

	it("uses the latest 1m close as the current price", async () => {
		const client = new StaticOhlcvClient(buildRows([100, 101, 102]));
		const source = new CcxtPriceSource({ client });
		await expect(source.currentPrice("ETH/USDT")).resolves.toBe(102);
		expect(client.calls[0]).toEqual({
			symbol: "ETH/USDT",
			timeframe: "1m",
			limit: 1,
		});
	});

	it("wraps exchange failures in DataUnavailableError", async () => {
		const source = new CcxtPriceSource({ client: new FailingOhlcvClient() });
		await expect(source.currentPrice("BTCUSDT")).rejects.toBeInstanceOf(
			DataUnavailableError
		);
	});

	it("rejects a response containing an unusable close", async () => {
		const rows = buildRows([100, 101, 102]);
		rows[1][4] = 0;
		const source = new CcxtPriceSource({
			client: new StaticOhlcvClient(rows),
		});
		await expect(source.recentPrices("BTCUSDT", "1m", 3)).rejects.toThrowError(
			"Invalid close at candle 1 for BTC/USDT from binance"
		);
	});

	it("reports an empty response as unavailable", async () => {
		const source = new CcxtPriceSource({ client: new StaticOhlcvClient([]) });
		await expect(source.currentPrice("BTCUSDT")).rejects.toThrowError(
			/No price returned for BTCUSDT/
		);
	});
});

describe("SyntheticPriceSource", () => {
	it("samples around a per-symbol base price", async () => {
		const source = new SyntheticPriceSource({ random: constantRandom(0.5) });
		const price = await source.currentPrice("BTCUSDT");
		expect(price).toBeCloseTo(expectedSample, 6);
	});

	it("returns the requested number of prices", async () => {
		const source = new SyntheticPriceSource({ random: constantRandom(0.5) });
		const prices = await source.recentPrices("BTCUSDT", "1m", 4);
		expect(prices).toHaveLength(4);
		for (const price of prices) {
			expect(price).toBeCloseTo(expectedSample, 6);
		}
	});
});

describe("FallbackPriceSource", () => {
	it("serves the fallback when the primary rejects", async () => {
		const source = new FallbackPriceSource(
			new FailingPriceSource(),
			new SyntheticPriceSource({ random: constantRandom(0.5) })
		);
		expect(source.venue).toBe("broken+synthetic");
		await expect(source.currentPrice("BTCUSDT")).resolves.toBeCloseTo(
			expectedSample,
			6
		);
		await expect(source.recentPrices("BTCUSDT", "1m", 2)).resolves.toHaveLength(
			2
		);
	});
});

describe("createPriceSource", () => {
	it("falls back to synthetic prices without credentials", () => {
		expect(createPriceSource({ apiKey: "test-key" }).venue).toBe("synthetic");
	});

	it("uses the exchange when both credentials are present", () => {
		const client = new StaticOhlcvClient([]);
		const source = createPriceSource(
			{ apiKey: "test-key", apiSecret: "test-secret" },
			{ client }
		);
		expect(source).toBeInstanceOf(CcxtPriceSource);
	});

	it("wraps the exchange when fallbackOnError is set", async () => {
		const source = createPriceSource(
			{ apiKey: "test-key", apiSecret: "test-secret" },
			{
				client: new FailingOhlcvClient(),
				fallbackOnError: true,
				synthetic: { random: constantRandom(0.5) },
			}
		);
		expect(source.venue).toBe("binance+synthetic");
		await expect(source.currentPrice("BTCUSDT")).resolves.toBeCloseTo(
			expectedSample,
			6
		);
	});
});
