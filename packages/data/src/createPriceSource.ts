import { createLogger } from "@crossbot/core";
import { CcxtPriceSource, OhlcvClient } from "./sources/ccxtPriceSource";
import { FallbackPriceSource } from "./sources/fallbackPriceSource";
import {
	SyntheticPriceSource,
	SyntheticPriceSourceOptions,
} from "./sources/syntheticPriceSource";
import type { PriceSource, PriceSourceCredentials } from "./types";

const factoryLogger = createLogger("data:factory");

export interface CreatePriceSourceOptions {
	/** Serve synthetic prices when the exchange call fails. */
	fallbackOnError?: boolean;
	synthetic?: SyntheticPriceSourceOptions;
	client?: OhlcvClient;
}

/**
 * Exchange-backed source when both credentials are present, synthetic
 * prices otherwise.
 */
export const createPriceSource = (
	credentials: PriceSourceCredentials,
	options: CreatePriceSourceOptions = {}
): PriceSource => {
	const hasCredentials = Boolean(credentials.apiKey && credentials.apiSecret);
	if (!hasCredentials) {
		factoryLogger.warn("price_source_synthetic", {
			reason: "missing_credentials",
		});
		return new SyntheticPriceSource(options.synthetic);
	}

	const exchange = new CcxtPriceSource({
		apiKey: credentials.apiKey,
		secret: credentials.apiSecret,
		client: options.client,
	});
	factoryLogger.info("price_source_exchange", {
		venue: exchange.venue,
		fallbackOnError: Boolean(options.fallbackOnError),
	});
	return options.fallbackOnError
		? new FallbackPriceSource(
				exchange,
				new SyntheticPriceSource(options.synthetic)
			)
		: exchange;
};
