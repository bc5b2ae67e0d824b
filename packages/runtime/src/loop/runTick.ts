import { ExitReason, Signal, Trade } from "@crossbot/core";
import type { TradingSession } from "../session/tradingSession";
import { RuntimeMode, runtimeLogger } from "../runtimeShared";

export interface TickInput {
	/** Price history including `price` as its last element. */
	history: readonly number[];
	price: number;
	timestamp: number;
	mode: RuntimeMode;
}

export interface TickResult {
	signal: Signal;
	trades: Trade[];
	realizedPnl: number;
	exitReason: ExitReason | null;
}

/**
 * One decision step shared by the live loop and backtests:
 * signal -> risk -> ledger.
 */
export const runTick = (session: TradingSession, input: TickInput): TickResult => {
	const signal = session.strategy.generateSignal(input.history);
	const decision = session.riskManager.apply({
		position: session.position,
		signal,
		price: input.price,
		timestamp: input.timestamp,
	});

	for (const trade of decision.trades) {
		session.ledger.append(trade);
		if (trade.action === "SELL") {
			session.account.registerClosedTrade(trade.realizedPnl ?? 0);
		}
		runtimeLogger.log(
			input.mode === "live" ? "info" : "debug",
			"trade_executed",
			{
				symbol: session.symbol,
				mode: input.mode,
				...trade,
			}
		);
	}
	session.position = decision.position;

	runtimeLogger.debug("tick_evaluated", {
		symbol: session.symbol,
		mode: input.mode,
		timestamp: input.timestamp,
		price: input.price,
		signal,
		exitReason: decision.exitReason,
		openPositionPrice: session.position?.entryPrice ?? null,
	});

	return {
		signal,
		trades: decision.trades,
		realizedPnl: decision.realizedPnl,
		exitReason: decision.exitReason,
	};
};
