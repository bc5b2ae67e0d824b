import { ConfigurationError, StrategyConfig } from "@crossbot/core";
import { SmaCrossoverStrategy } from "./SmaCrossoverStrategy";
import type { SignalEngine } from "./types";

export type SignalEngineFactory = (config: StrategyConfig) => SignalEngine;

const strategyRegistry = new Map<string, SignalEngineFactory>([
	[
		"sma",
		(config) =>
			new SmaCrossoverStrategy({
				shortWindow: config.shortWindow,
				longWindow: config.longWindow,
			}),
	],
]);

export const getRegisteredStrategyTypes = (): string[] =>
	Array.from(strategyRegistry.keys());

export const isRegisteredStrategyType = (value: unknown): value is string =>
	typeof value === "string" && strategyRegistry.has(value);

/**
 * Builds a fresh engine for `config.type`. Every call returns a new instance
 * with UNSET cross state.
 */
export const createSignalEngine = (config: StrategyConfig): SignalEngine => {
	const factory = strategyRegistry.get(config.type);
	if (!factory) {
		throw new ConfigurationError(
			`Unknown strategy type: ${config.type}. Registered types: ${getRegisteredStrategyTypes().join(", ")}`
		);
	}
	return factory(config);
};
