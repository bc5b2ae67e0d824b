export type { PriceSource, PriceSourceCredentials } from "./types";
export { CcxtPriceSource } from "./sources/ccxtPriceSource";
export type {
	CcxtPriceSourceOptions,
	OhlcvClient,
} from "./sources/ccxtPriceSource";
export { SyntheticPriceSource } from "./sources/syntheticPriceSource";
export type { SyntheticPriceSourceOptions } from "./sources/syntheticPriceSource";
export { FallbackPriceSource } from "./sources/fallbackPriceSource";
export { createPriceSource } from "./createPriceSource";
export type { CreatePriceSourceOptions } from "./createPriceSource";
export { toUnifiedSymbol } from "./utils/symbols";
