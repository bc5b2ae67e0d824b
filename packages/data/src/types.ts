/**
 * Price feed consumed by the runtime. Both calls reject with
 * `DataUnavailableError` when the underlying venue cannot answer.
 */
export interface PriceSource {
	readonly venue: string;
	currentPrice(symbol: string): Promise<number>;
	/** Closing prices, oldest first. */
	recentPrices(symbol: string, interval: string, limit: number): Promise<number[]>;
}

export interface PriceSourceCredentials {
	apiKey?: string;
	apiSecret?: string;
}
