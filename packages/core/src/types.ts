export type Signal = "HOLD" | "BUY" | "SELL";

export type TradeAction = "BUY" | "SELL";

export type ExitReason = "signal" | "stop_loss" | "take_profit";

/**
 * One simulated fill. `timestamp` is epoch seconds for live runs and the
 * series index for backtests.
 */
export interface Trade {
	readonly timestamp: number;
	readonly action: TradeAction;
	readonly price: number;
	readonly quantity: number;
	readonly reason?: ExitReason;
	readonly realizedPnl?: number;
}

export interface Position {
	readonly entryPrice: number;
	readonly quantity: number;
	readonly entryTimestamp: number;
}

export type BotRunState = "idle" | "running" | "stopping";

export interface BotStatus {
	running: boolean;
	openPositionPrice: number | null;
	tradeCount: number;
}
