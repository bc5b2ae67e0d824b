import { createLogger } from "@crossbot/core";
import type { PriceSource } from "../types";

const fallbackLogger = createLogger("data:fallback");

/**
 * Serves from `primary` and switches to `fallback` for any call the primary
 * rejects.
 */
export class FallbackPriceSource implements PriceSource {
	readonly venue: string;

	constructor(
		private readonly primary: PriceSource,
		private readonly fallback: PriceSource
	) {
		this.venue = `${primary.venue}+${fallback.venue}`;
	}

	async currentPrice(symbol: string): Promise<number> {
		try {
			return await this.primary.currentPrice(symbol);
		} catch (error) {
			this.logFallback("currentPrice", symbol, error);
			return this.fallback.currentPrice(symbol);
		}
	}

	async recentPrices(
		symbol: string,
		interval: string,
		limit: number
	): Promise<number[]> {
		try {
			return await this.primary.recentPrices(symbol, interval, limit);
		} catch (error) {
			this.logFallback("recentPrices", symbol, error);
			return this.fallback.recentPrices(symbol, interval, limit);
		}
	}

	private logFallback(call: string, symbol: string, error: unknown): void {
		fallbackLogger.warn("price_source_fallback", {
			call,
			symbol,
			primary: this.primary.venue,
			fallback: this.fallback.venue,
			error: error instanceof Error ? error.message : String(error),
		});
	}
}
