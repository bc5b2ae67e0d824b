import { Position, Trade } from "@crossbot/core";

/**
 * Ordered, append-only record of simulated fills. Alternates BUY / SELL, so
 * the open position is always derivable from the last entry.
 */
export class TradeLedger {
	private readonly trades: Trade[] = [];

	append(trade: Trade): void {
		const last = this.last();
		if (trade.action === "BUY" && last?.action === "BUY") {
			throw new Error("Cannot record a BUY while a position is open");
		}
		if (trade.action === "SELL" && last?.action !== "BUY") {
			throw new Error("Cannot record a SELL without an open position");
		}
		this.trades.push(Object.isFrozen(trade) ? trade : Object.freeze({ ...trade }));
	}

	get size(): number {
		return this.trades.length;
	}

	last(): Trade | undefined {
		return this.trades[this.trades.length - 1];
	}

	entries(): Trade[] {
		return [...this.trades];
	}

	openPosition(): Position | null {
		const last = this.last();
		if (!last || last.action !== "BUY") {
			return null;
		}
		return {
			entryPrice: last.price,
			quantity: last.quantity,
			entryTimestamp: last.timestamp,
		};
	}
}
