import { DataUnavailableError } from "@crossbot/core";
import { describe, expect, it } from "vitest";
import { ROUND_TRIP_PRICES, TEST_CONFIG } from "../__tests__/fixtures";
import { runTick } from "../loop/runTick";
import { createTradingSession } from "../session/tradingSession";
import { runBacktest } from "./backtestRunner";

const sineSeries = (length: number): number[] =>
	Array.from({ length }, (_, index) => 100 + 10 * Math.sin(index / 3));

describe("runBacktest", () => {
	it("realizes the profit of a closed round trip", () => {
		const result = runBacktest(ROUND_TRIP_PRICES, { config: TEST_CONFIG });

		expect(result.profit).toBe(10);
		expect(result.tradeCount).toBe(2);
		expect(result.trades).toEqual([
			{ timestamp: 4, action: "BUY", price: 100, quantity: 1 },
			{
				timestamp: 7,
				action: "SELL",
				price: 110,
				quantity: 1,
				reason: "signal",
				realizedPnl: 10,
			},
		]);
		expect(result.openPosition).toBeNull();
		expect(result.summary).toEqual({
			candles: 8,
			closedTrades: 1,
			wins: 1,
			losses: 0,
			breakeven: 0,
			maxDrawdown: 0,
		});
	});

	it("leaves an open position out of the profit", () => {
		const result = runBacktest([90, 90, 90, 90, 100], { config: TEST_CONFIG });

		expect(result.profit).toBe(0);
		expect(result.tradeCount).toBe(1);
		expect(result.openPosition).toEqual({
			entryPrice: 100,
			quantity: 1,
			entryTimestamp: 4,
		});
	});

	it("books a signal exit at a loss", () => {
		const result = runBacktest([10, 10, 10, 10, 20, 20, 5, 5], {
			config: TEST_CONFIG,
		});

		expect(result.profit).toBe(-15);
		expect(result.trades.map((trade) => trade.action)).toEqual(["BUY", "SELL"]);
		expect(result.summary.losses).toBe(1);
		expect(result.summary.maxDrawdown).toBe(15);
	});

	it("produces identical results for the same input", () => {
		const prices = [
			100, 101, 99, 98, 102, 105, 107, 103, 99, 96, 97, 101, 104, 100, 95,
		];
		const first = runBacktest(prices, { config: TEST_CONFIG });
		const second = runBacktest(prices, { config: TEST_CONFIG });

		expect(JSON.stringify(second)).toBe(JSON.stringify(first));
	});

	it("returns an empty result for series shorter than the long window", () => {
		const result = runBacktest([100, 101, 102], { config: TEST_CONFIG });

		expect(result.profit).toBe(0);
		expect(result.trades).toEqual([]);
		expect(result.summary.candles).toBe(3);
	});

	it("rejects non-positive prices", () => {
		expect(() =>
			runBacktest([100, 0, 100], { config: TEST_CONFIG })
		).toThrow(DataUnavailableError);
	});
	it("matches a full-prefix replay", () => {
		const prices = sineSeries(2_000);
		const session = createTradingSession(TEST_CONFIG);
		prices.forEach((price, index) =>
			runTick(session, {
				history: prices.slice(0, index + 1),
				price,
				timestamp: index,
				mode: "backtest",
			})
		);

		const result = runBacktest(prices, { config: TEST_CONFIG });

		expect(session.ledger.size).toBeGreaterThan(0);
		expect(result.trades).toEqual(session.ledger.entries());
	});

	it("replays long series in linear time", () => {
		const prices = sineSeries(100_000);
		const startedAt = performance.now();

		const result = runBacktest(prices, { config: TEST_CONFIG });

		expect(performance.now() - startedAt).toBeLessThan(2_000);
		expect(result.summary.candles).toBe(100_000);
		expect(result.tradeCount).toBeGreaterThan(0);
	});
});
