import type { PriceSource } from "@crossbot/data";
import type { TradingSession } from "../session/tradingSession";
import { runTick } from "../loop/runTick";
import { describeError, runtimeLogger } from "../runtimeShared";
import { sleep } from "../utils/sleep";

export const DEFAULT_TICK_INTERVAL_MS = 5_000;
const MIN_HISTORY_LIMIT = 1_000;

export interface LiveLoopOptions {
	session: TradingSession;
	priceSource: PriceSource;
	signal: AbortSignal;
	tickIntervalMs?: number;
	/** Epoch seconds for trade timestamps. */
	now?: () => number;
}

export interface LiveLoopStats {
	ticks: number;
	skippedTicks: number;
	failedTicks: number;
	trades: number;
}

export const resolveHistoryLimit = (requiredHistory: number): number =>
	Math.max(MIN_HISTORY_LIMIT, 2 * requiredHistory);

const epochSeconds = (): number => Date.now() / 1_000;

/**
 * Polls the price source until `signal` aborts. A failed fetch skips the tick;
 * nothing short of cancellation ends the loop. Cancellation is honoured
 * between iterations and interrupts the inter-tick sleep.
 */
export const runLiveLoop = async (
	options: LiveLoopOptions
): Promise<LiveLoopStats> => {
	const { session, priceSource, signal } = options;
	const tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
	const now = options.now ?? epochSeconds;
	const historyLimit = resolveHistoryLimit(session.strategy.requiredHistory);
	const history: number[] = [];
	const stats: LiveLoopStats = {
		ticks: 0,
		skippedTicks: 0,
		failedTicks: 0,
		trades: 0,
	};

	runtimeLogger.info("live_loop_started", {
		symbol: session.symbol,
		venue: priceSource.venue,
		strategy: session.strategy.type,
		tickIntervalMs,
		historyLimit,
	});

	while (!signal.aborted) {
		let price: number | null = null;
		try {
			price = await priceSource.currentPrice(session.symbol);
		} catch (error) {
			stats.skippedTicks += 1;
			runtimeLogger.warn("price_fetch_failed", {
				symbol: session.symbol,
				venue: priceSource.venue,
				...describeError(error),
			});
		}

		if (price !== null) {
			history.push(price);
			if (history.length > historyLimit) {
				history.splice(0, history.length - historyLimit);
			}
			try {
				const result = runTick(session, {
					history,
					price,
					timestamp: now(),
					mode: "live",
				});
				stats.ticks += 1;
				stats.trades += result.trades.length;
			} catch (error) {
				stats.failedTicks += 1;
				runtimeLogger.error("tick_failed", {
					symbol: session.symbol,
					price,
					...describeError(error),
				});
			}
		}

		await sleep(tickIntervalMs, signal);
	}

	runtimeLogger.info("live_loop_stopped", {
		symbol: session.symbol,
		...stats,
	});
	return stats;
};
