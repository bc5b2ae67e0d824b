const QUOTE_ASSETS = ["USDT", "USDC", "BUSD", "FDUSD", "BTC", "ETH", "BNB", "EUR"];

/**
 * Converts exchange-native pairs such as `BTCUSDT` into the unified
 * `BTC/USDT` form ccxt expects. Already unified symbols pass through.
 */
export const toUnifiedSymbol = (symbol: string): string => {
	const trimmed = symbol.trim().toUpperCase();
	if (trimmed.includes("/")) {
		return trimmed;
	}
	for (const quote of QUOTE_ASSETS) {
		if (trimmed.length > quote.length && trimmed.endsWith(quote)) {
			return `${trimmed.slice(0, -quote.length)}/${quote}`;
		}
	}
	return trimmed;
};
