import dotenv from "dotenv";

export interface EnvConfig {
	binanceApiKey: string;
	binanceApiSecret: string;
	configProfile?: string;
	symbol?: string;
	interval?: string;
}

const loadedEnvPaths = new Set<string>();

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const loadEnvConfig = (envPath?: string): EnvConfig => {
	if (envPath && !loadedEnvPaths.has(envPath)) {
		dotenv.config({ path: envPath });
		loadedEnvPaths.add(envPath);
	}

	return {
		binanceApiKey: readOptionalEnvVar("BINANCE_API_KEY") ?? "",
		binanceApiSecret: readOptionalEnvVar("BINANCE_API_SECRET") ?? "",
		configProfile: readOptionalEnvVar("BOT_CONFIG_PROFILE"),
		symbol: readOptionalEnvVar("BOT_SYMBOL"),
		interval: readOptionalEnvVar("BOT_INTERVAL"),
	};
};
