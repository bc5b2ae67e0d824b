export interface PaperAccountSnapshot {
	startingBalance: number;
	balance: number;
	totalRealizedPnl: number;
	maxBalance: number;
	maxDrawdown: number;
	trades: {
		closed: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	lastRealizedPnl?: number;
}

/**
 * Tracks realized P&L of closed trades. Equity only moves when a position
 * closes, so drawdown is measured on realized balance.
 */
export class PaperAccount {
	private readonly startingBalance: number;
	private balance: number;
	private maxBalance: number;
	private maxDrawdown = 0;
	private trades = {
		closed: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};
	private lastRealizedPnl?: number;

	constructor(startingBalance = 0) {
		this.startingBalance = startingBalance;
		this.balance = startingBalance;
		this.maxBalance = startingBalance;
	}

	registerClosedTrade(realizedPnl: number): PaperAccountSnapshot {
		this.balance += realizedPnl;
		this.trades.closed += 1;

		if (realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		if (this.balance > this.maxBalance) {
			this.maxBalance = this.balance;
		}
		this.maxDrawdown = Math.max(this.maxDrawdown, this.maxBalance - this.balance);
		this.lastRealizedPnl = realizedPnl;

		return this.snapshot();
	}

	snapshot(): PaperAccountSnapshot {
		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			totalRealizedPnl: this.balance - this.startingBalance,
			maxBalance: this.maxBalance,
			maxDrawdown: this.maxDrawdown,
			trades: { ...this.trades },
			lastRealizedPnl: this.lastRealizedPnl,
		};
	}
}
