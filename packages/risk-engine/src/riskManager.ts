import {
	ConfigurationError,
	ExitReason,
	Position,
	Signal,
	Trade,
} from "@crossbot/core";

export interface RiskManagerConfig {
	baseAssetAmount: number;
	stopLossPct: number;
	takeProfitPct: number;
	maxPositionSize: number;
}

export interface RiskInput {
	position: Position | null;
	signal: Signal;
	price: number;
	timestamp: number;
}

export interface RiskDecision {
	position: Position | null;
	trades: Trade[];
	realizedPnl: number;
	exitReason: ExitReason | null;
}

const freezeTrade = (trade: Trade): Trade => Object.freeze(trade);

interface CloseResult {
	trade: Trade;
	realizedPnl: number;
}

/**
 * Single long position of `baseAssetAmount`. Signal exits are evaluated
 * before the stop-loss / take-profit thresholds, and a tick closes at most
 * once. `maxPositionSize` bounds the configured order size at construction.
 */
export class RiskManager {
	constructor(private readonly config: RiskManagerConfig) {
		if (!(config.baseAssetAmount > 0)) {
			throw new ConfigurationError("baseAssetAmount must be positive");
		}
		for (const [field, value] of [
			["stopLossPct", config.stopLossPct],
			["takeProfitPct", config.takeProfitPct],
		] as const) {
			if (!(value > 0 && value < 1)) {
				throw new ConfigurationError(`${field} must be between 0 and 1`);
			}
		}
		if (config.baseAssetAmount > config.maxPositionSize) {
			throw new ConfigurationError(
				`baseAssetAmount ${config.baseAssetAmount} exceeds maxPositionSize ${config.maxPositionSize}`
			);
		}
	}

	apply(input: RiskInput): RiskDecision {
		const { signal, price, timestamp } = input;
		let position = input.position;
		const trades: Trade[] = [];

		if (signal === "BUY" && position === null) {
			position = {
				entryPrice: price,
				quantity: this.config.baseAssetAmount,
				entryTimestamp: timestamp,
			};
			trades.push(
				freezeTrade({
					timestamp,
					action: "BUY",
					price,
					quantity: position.quantity,
				})
			);
		} else if (signal === "SELL" && position !== null) {
			const closed = this.close(position, price, timestamp, "signal");
			trades.push(closed.trade);
			return {
				position: null,
				trades,
				realizedPnl: closed.realizedPnl,
				exitReason: "signal",
			};
		}

		if (position === null) {
			return { position, trades, realizedPnl: 0, exitReason: null };
		}

		const exitReason = this.thresholdExit(position, price);
		if (!exitReason) {
			return { position, trades, realizedPnl: 0, exitReason: null };
		}

		const closed = this.close(position, price, timestamp, exitReason);
		trades.push(closed.trade);
		return {
			position: null,
			trades,
			realizedPnl: closed.realizedPnl,
			exitReason,
		};
	}

	stopLossPrice(entryPrice: number): number {
		return entryPrice * (1 - this.config.stopLossPct);
	}

	takeProfitPrice(entryPrice: number): number {
		return entryPrice * (1 + this.config.takeProfitPct);
	}

	private thresholdExit(position: Position, price: number): ExitReason | null {
		if (price <= this.stopLossPrice(position.entryPrice)) {
			return "stop_loss";
		}
		if (price >= this.takeProfitPrice(position.entryPrice)) {
			return "take_profit";
		}
		return null;
	}

	private close(
		position: Position,
		price: number,
		timestamp: number,
		reason: ExitReason
	): CloseResult {
		const realizedPnl = (price - position.entryPrice) * position.quantity;
		return {
			realizedPnl,
			trade: freezeTrade({
				timestamp,
				action: "SELL",
				price,
				quantity: position.quantity,
				reason,
				realizedPnl,
			}),
		};
	}
}
