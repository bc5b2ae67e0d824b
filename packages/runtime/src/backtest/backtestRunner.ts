import { DataUnavailableError } from "@crossbot/core";
import { createTradingSession } from "../session/tradingSession";
import { runTick } from "../loop/runTick";
import { runtimeLogger } from "../runtimeShared";
import type { BacktestOptions, BacktestResult } from "./backtestTypes";

/** Upper bound on candles a controller-driven backtest will fetch. */
export const MAX_BACKTEST_CANDLES = 10_000;

/**
 * Replays `prices` through a fresh session. Trade timestamps are series
 * indexes, so the same input always yields the same ledger.
 */
export const runBacktest = (
	prices: readonly number[],
	options: BacktestOptions
): BacktestResult => {
	for (const [index, price] of prices.entries()) {
		if (!Number.isFinite(price) || price <= 0) {
			throw new DataUnavailableError(
				`Backtest price at index ${index} must be a positive number`
			);
		}
	}

	const session = createTradingSession(options.config);
	const historyWindow = session.strategy.requiredHistory;
	let profit = 0;

	for (let index = 0; index < prices.length; index += 1) {
		// The strategy only reads the trailing `requiredHistory` prices.
		const result = runTick(session, {
			history: prices.slice(Math.max(0, index + 1 - historyWindow), index + 1),
			price: prices[index],
			timestamp: index,
			mode: "backtest",
		});
		profit += result.realizedPnl;
	}

	const trades = session.ledger.entries();
	const account = session.account.snapshot();
	const result: BacktestResult = {
		profit,
		tradeCount: trades.length,
		trades,
		openPosition: session.position,
		summary: {
			candles: prices.length,
			closedTrades: account.trades.closed,
			wins: account.trades.wins,
			losses: account.trades.losses,
			breakeven: account.trades.breakeven,
			maxDrawdown: account.maxDrawdown,
		},
	};

	runtimeLogger.info("backtest_summary", {
		symbol: session.symbol,
		strategy: session.strategy.type,
		candles: prices.length,
		profit,
		tradeCount: result.tradeCount,
		summary: result.summary,
	});

	return result;
};
