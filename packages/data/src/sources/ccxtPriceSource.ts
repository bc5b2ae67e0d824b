import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import { DataUnavailableError, createLogger } from "@crossbot/core";
import type { PriceSource } from "../types";
import { toUnifiedSymbol } from "../utils/symbols";

const ccxtLogger = createLogger("data:ccxt");

/** The slice of a ccxt exchange this source relies on. */
export interface OhlcvClient {
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface CcxtPriceSourceOptions {
	apiKey?: string;
	secret?: string;
	client?: OhlcvClient;
	venue?: string;
}

export class CcxtPriceSource implements PriceSource {
	readonly venue: string;
	private readonly client: OhlcvClient;

	constructor(options: CcxtPriceSourceOptions = {}) {
		this.venue = options.venue ?? "binance";
		this.client =
			options.client ??
			new ccxt.binance({
				apiKey: options.apiKey || undefined,
				secret: options.secret || undefined,
				enableRateLimit: true,
				options: {
					defaultType: "spot",
				},
			});
	}

	async currentPrice(symbol: string): Promise<number> {
		const closes = await this.recentPrices(symbol, "1m", 1);
		const latest = closes[closes.length - 1];
		if (latest === undefined) {
			throw new DataUnavailableError(`No price returned for ${symbol}`);
		}
		return latest;
	}

	async recentPrices(
		symbol: string,
		interval: string,
		limit: number
	): Promise<number[]> {
		const marketSymbol = toUnifiedSymbol(symbol);
		let rows: OHLCV[];
		try {
			rows = await this.client.fetchOHLCV(
				marketSymbol,
				interval,
				undefined,
				limit
			);
		} catch (error) {
			ccxtLogger.warn("fetch_ohlcv_failed", {
				venue: this.venue,
				symbol: marketSymbol,
				interval,
				error: error instanceof Error ? error.message : String(error),
			});
			throw new DataUnavailableError(
				`Failed to fetch ${interval} candles for ${marketSymbol} from ${this.venue}`,
				{ cause: error }
			);
		}

		return rows.map((row, index) => {
			const close = Number(row[4] ?? Number.NaN);
			if (!Number.isFinite(close) || close <= 0) {
				throw new DataUnavailableError(
					`Invalid close at candle ${index} for ${marketSymbol} from ${this.venue}`
				);
			}
			return close;
		});
	}
}
