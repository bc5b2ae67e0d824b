import type { BotConfig, Position, Trade } from "@crossbot/core";

export interface BacktestOptions {
	config: BotConfig;
}

export interface BacktestSummary {
	candles: number;
	closedTrades: number;
	wins: number;
	losses: number;
	breakeven: number;
	maxDrawdown: number;
}

export interface BacktestResult {
	/** Realized P&L only; an open position at the end contributes nothing. */
	profit: number;
	tradeCount: number;
	trades: Trade[];
	openPosition: Position | null;
	summary: BacktestSummary;
}
