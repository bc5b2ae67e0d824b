import { BotConfig, Position } from "@crossbot/core";
import { PaperAccount, TradeLedger } from "@crossbot/execution-engine";
import { RiskManager } from "@crossbot/risk-engine";
import { SignalEngine, createSignalEngine } from "@crossbot/strategy-engine";

/**
 * Mutable state of one run: a fresh signal engine plus the book it trades
 * into. The ledger and account may be carried over between live sessions.
 */
export interface TradingSession {
	symbol: string;
	strategy: SignalEngine;
	riskManager: RiskManager;
	ledger: TradeLedger;
	account: PaperAccount;
	position: Position | null;
}

export interface TradingBook {
	ledger: TradeLedger;
	account: PaperAccount;
}

export const createTradingSession = (
	config: BotConfig,
	book: TradingBook = {
		ledger: new TradeLedger(),
		account: new PaperAccount(),
	}
): TradingSession => ({
	symbol: config.symbol,
	strategy: createSignalEngine(config.strategy),
	riskManager: new RiskManager({
		baseAssetAmount: config.baseAssetAmount,
		stopLossPct: config.risk.stopLossPct,
		takeProfitPct: config.risk.takeProfitPct,
		maxPositionSize: config.risk.maxPositionSize,
	}),
	ledger: book.ledger,
	account: book.account,
	position: book.ledger.openPosition(),
});
