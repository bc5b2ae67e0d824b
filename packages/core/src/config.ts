import fs from "node:fs";
import path from "node:path";

import { ConfigurationError } from "./errors";
import { EnvConfig, loadEnvConfig } from "./env";

export interface StrategyConfig {
	type: string;
	shortWindow: number;
	longWindow: number;
	[key: string]: unknown;
}

export interface RiskConfig {
	stopLossPct: number;
	takeProfitPct: number;
	/** Upper bound for `baseAssetAmount`; checked when the risk manager is built. */
	maxPositionSize: number;
}

export interface RuntimeConfig {
	tickIntervalMs: number;
	stopTimeoutMs: number;
}

export interface BotConfig {
	symbol: string;
	interval: string;
	baseAssetAmount: number;
	risk: RiskConfig;
	strategy: StrategyConfig;
	runtime: RuntimeConfig;
}

export interface LoadedBotConfig {
	bot: BotConfig;
	env: EnvConfig;
	path: string;
	profile: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

export const DEFAULT_BOT_CONFIG: BotConfig = {
	symbol: "BTCUSDT",
	interval: "1m",
	baseAssetAmount: 0.001,
	risk: {
		stopLossPct: 0.02,
		takeProfitPct: 0.03,
		maxPositionSize: 0.1,
	},
	strategy: {
		type: "sma",
		shortWindow: 7,
		longWindow: 25,
	},
	runtime: {
		tickIntervalMs: 5_000,
		stopTimeoutMs: 5_000,
	},
};

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	const manifestPath = path.join(dir, "package.json");
	if (!fs.existsSync(manifestPath)) {
		return false;
	}
	const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
	return (
		typeof manifest === "object" &&
		manifest !== null &&
		"workspaces" in manifest
	);
};

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultConfigDir = (): string =>
	path.join(getWorkspaceRoot(), "config");

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigurationError(`Config at ${filePath} is not valid JSON`, {
			cause: error,
		});
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const pickRecord = (
	source: Record<string, unknown>,
	key: string
): Record<string, unknown> => {
	const value = source[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigurationError(`Config field "${key}" must be an object`);
	}
	return value;
};

const pickNumber = (
	source: Record<string, unknown>,
	key: string,
	field: string,
	fallback: number
): number => {
	const value = source[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigurationError(`Config field "${field}" must be a number`);
	}
	return value;
};

const pickString = (
	source: Record<string, unknown>,
	key: string,
	field: string,
	fallback: string
): string => {
	const value = source[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim().length) {
		throw new ConfigurationError(
			`Config field "${field}" must be a non-empty string`
		);
	}
	return value.trim();
};

/**
 * Merges a raw config object over the defaults and validates it.
 * Strategy keys beyond the known ones are passed through untouched.
 */
export const resolveBotConfig = (raw: unknown): BotConfig => {
	if (!isRecord(raw)) {
		throw new ConfigurationError("Bot config must be a JSON object");
	}
	const defaults = DEFAULT_BOT_CONFIG;
	const risk = pickRecord(raw, "risk");
	const strategy = pickRecord(raw, "strategy");
	const runtime = pickRecord(raw, "runtime");

	const config: BotConfig = {
		symbol: pickString(raw, "symbol", "symbol", defaults.symbol),
		interval: pickString(raw, "interval", "interval", defaults.interval),
		baseAssetAmount: pickNumber(
			raw,
			"baseAssetAmount",
			"baseAssetAmount",
			defaults.baseAssetAmount
		),
		risk: {
			stopLossPct: pickNumber(
				risk,
				"stopLossPct",
				"risk.stopLossPct",
				defaults.risk.stopLossPct
			),
			takeProfitPct: pickNumber(
				risk,
				"takeProfitPct",
				"risk.takeProfitPct",
				defaults.risk.takeProfitPct
			),
			maxPositionSize: pickNumber(
				risk,
				"maxPositionSize",
				"risk.maxPositionSize",
				defaults.risk.maxPositionSize
			),
		},
		strategy: {
			...strategy,
			type: pickString(
				strategy,
				"type",
				"strategy.type",
				defaults.strategy.type
			),
			shortWindow: pickNumber(
				strategy,
				"shortWindow",
				"strategy.shortWindow",
				defaults.strategy.shortWindow
			),
			longWindow: pickNumber(
				strategy,
				"longWindow",
				"strategy.longWindow",
				defaults.strategy.longWindow
			),
		},
		runtime: {
			tickIntervalMs: pickNumber(
				runtime,
				"tickIntervalMs",
				"runtime.tickIntervalMs",
				defaults.runtime.tickIntervalMs
			),
			stopTimeoutMs: pickNumber(
				runtime,
				"stopTimeoutMs",
				"runtime.stopTimeoutMs",
				defaults.runtime.stopTimeoutMs
			),
		},
	};

	validateBotConfig(config);
	return config;
};

const ensurePositiveInteger = (value: number, field: string): void => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigurationError(`${field} must be a positive integer`);
	}
};

const ensureFraction = (value: number, field: string): void => {
	if (!(value > 0 && value < 1)) {
		throw new ConfigurationError(`${field} must be between 0 and 1`);
	}
};

export const validateBotConfig = (config: BotConfig): void => {
	if (!(config.baseAssetAmount > 0)) {
		throw new ConfigurationError("baseAssetAmount must be positive");
	}
	ensureFraction(config.risk.stopLossPct, "risk.stopLossPct");
	ensureFraction(config.risk.takeProfitPct, "risk.takeProfitPct");
	if (!(config.risk.maxPositionSize > 0)) {
		throw new ConfigurationError("risk.maxPositionSize must be positive");
	}
	ensurePositiveInteger(config.strategy.shortWindow, "strategy.shortWindow");
	ensurePositiveInteger(config.strategy.longWindow, "strategy.longWindow");
	if (config.strategy.longWindow <= config.strategy.shortWindow) {
		throw new ConfigurationError(
			"strategy.longWindow must be greater than strategy.shortWindow"
		);
	}
	if (config.runtime.tickIntervalMs < 0) {
		throw new ConfigurationError("runtime.tickIntervalMs must not be negative");
	}
	if (!(config.runtime.stopTimeoutMs > 0)) {
		throw new ConfigurationError("runtime.stopTimeoutMs must be positive");
	}
};

export const resolveBotConfigPath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "bot", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigurationError(
		`Bot config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadBotConfig = (
	options: ConfigLoadOptions = {}
): LoadedBotConfig => {
	const envPath =
		options.envPath ?? path.join(getWorkspaceRoot(), ".env");
	const env = loadEnvConfig(envPath);
	const configDir = options.configDir ?? getDefaultConfigDir();
	const profile = options.profile ?? env.configProfile ?? "default";
	const configPath = resolveBotConfigPath(configDir, profile);
	const raw = readJsonFile(configPath);
	const overrides = isRecord(raw) ? { ...raw } : raw;
	if (isRecord(overrides)) {
		if (env.symbol) {
			overrides.symbol = env.symbol;
		}
		if (env.interval) {
			overrides.interval = env.interval;
		}
	}

	return {
		bot: resolveBotConfig(overrides),
		env,
		path: configPath,
		profile,
	};
};
