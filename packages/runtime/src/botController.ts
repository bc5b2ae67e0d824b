import {
	BotConfig,
	BotRunState,
	BotStatus,
	ConfigurationError,
	InvalidStateTransitionError,
	Trade,
} from "@crossbot/core";
import type { PriceSource } from "@crossbot/data";
import { PaperAccount, TradeLedger } from "@crossbot/execution-engine";
import { MAX_BACKTEST_CANDLES, runBacktest } from "./backtest/backtestRunner";
import type { BacktestResult } from "./backtest/backtestTypes";
import { LiveLoopStats, runLiveLoop } from "./live/liveLoop";
import { describeError, runtimeLogger } from "./runtimeShared";
import { createTradingSession } from "./session/tradingSession";

export interface BotControllerOptions {
	config: BotConfig;
	priceSource: PriceSource;
	/** Epoch seconds for live trade timestamps. */
	now?: () => number;
}

export type StartResult =
	| { accepted: true; state: BotRunState }
	| { accepted: false; state: BotRunState; error: InvalidStateTransitionError };

export type StopResult =
	| { accepted: true; state: BotRunState; clean: boolean }
	| { accepted: false; state: BotRunState; error: InvalidStateTransitionError };

interface ActiveRun {
	abort: AbortController;
	done: Promise<LiveLoopStats | null>;
}

/**
 * Lifecycle owner for one live loop: idle -> running -> stopping -> idle.
 * The ledger survives restarts; each start gets a fresh signal engine.
 */
export class BotController {
	private state: BotRunState = "idle";
	private activeRun: ActiveRun | null = null;
	private readonly ledger = new TradeLedger();
	private readonly account = new PaperAccount();

	constructor(private readonly options: BotControllerOptions) {
		// Fail at construction rather than on the first start().
		createTradingSession(options.config);
	}

	get runState(): BotRunState {
		return this.state;
	}

	start(): StartResult {
		if (this.state !== "idle") {
			return {
				accepted: false,
				state: this.state,
				error: new InvalidStateTransitionError(this.state, "start"),
			};
		}

		const { config, priceSource, now } = this.options;
		const session = createTradingSession(config, {
			ledger: this.ledger,
			account: this.account,
		});
		const abort = new AbortController();
		const done = runLiveLoop({
			session,
			priceSource,
			signal: abort.signal,
			tickIntervalMs: config.runtime.tickIntervalMs,
			now,
		}).catch((error: unknown) => {
			runtimeLogger.error("live_loop_crashed", describeError(error));
			return null;
		});

		const run: ActiveRun = { abort, done };
		this.activeRun = run;
		this.state = "running";
		void done.finally(() => {
			if (this.activeRun === run) {
				this.activeRun = null;
				this.state = "idle";
			}
		});

		runtimeLogger.info("bot_started", {
			symbol: config.symbol,
			venue: priceSource.venue,
		});
		return { accepted: true, state: this.state };
	}

	/**
	 * Signals the loop and waits up to `runtime.stopTimeoutMs` for it to
	 * finish. A loop still stuck in a fetch is reported as `clean: false` and
	 * the controller stays `stopping` until it settles.
	 */
	async stop(): Promise<StopResult> {
		const run = this.activeRun;
		if (this.state !== "running" || !run) {
			return {
				accepted: false,
				state: this.state,
				error: new InvalidStateTransitionError(this.state, "stop"),
			};
		}

		this.state = "stopping";
		run.abort.abort();

		const timeoutMs = this.options.config.runtime.stopTimeoutMs;
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), timeoutMs);
		});
		const outcome = await Promise.race([
			run.done.then(() => "settled" as const),
			timedOut,
		]);
		clearTimeout(timer);

		const clean = outcome === "settled";
		if (clean) {
			if (this.activeRun === run) {
				this.activeRun = null;
			}
			this.state = "idle";
			runtimeLogger.info("bot_stopped", { tradeCount: this.ledger.size });
		} else {
			runtimeLogger.warn("bot_stop_forced", { timeoutMs });
		}
		return { accepted: true, state: this.state, clean };
	}

	status(): BotStatus {
		return {
			running: this.state === "running",
			openPositionPrice: this.ledger.openPosition()?.entryPrice ?? null,
			tradeCount: this.ledger.size,
		};
	}

	trades(): Trade[] {
		return this.ledger.entries();
	}

	/**
	 * Fetches `numCandles` closes and replays them on isolated state. Fetch
	 * failures propagate to the caller.
	 */
	async backtest(numCandles: number): Promise<BacktestResult> {
		if (!Number.isInteger(numCandles) || numCandles <= 0) {
			throw new ConfigurationError("numCandles must be a positive integer");
		}
		if (numCandles > MAX_BACKTEST_CANDLES) {
			throw new ConfigurationError(
				`numCandles must not exceed ${MAX_BACKTEST_CANDLES}`
			);
		}
		const { config, priceSource } = this.options;
		const prices = await priceSource.recentPrices(
			config.symbol,
			config.interval,
			numCandles
		);
		return runBacktest(prices, { config });
	}
}
