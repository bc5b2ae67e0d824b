export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			const json = JSON.stringify(sanitize(base));
			console.log(json);
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export function debug(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "debug", event, module: moduleName, ...data });
}

export function info(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "info", event, module: moduleName, ...data });
}

export function warn(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "warn", event, module: moduleName, ...data });
}

export function error(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "error", event, module: moduleName, ...data });
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): BaseLogPayload => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen) as BaseLogPayload;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(
			value as Record<string, unknown>
		)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "trade_executed": {
				printTrade(rest);
				break;
			}
			case "backtest_summary": {
				printBacktestSummary(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const printTrade = (rest: Record<string, unknown>): void => {
	const { symbol, action, price, quantity, reason, realizedPnl, timestamp } =
		rest as TradePrettyPayload;
	console.table([
		{
			symbol,
			timestamp,
			action,
			price,
			quantity,
			reason: reason ?? "-",
			realizedPnl: realizedPnl ?? "-",
		},
	]);
};

const printBacktestSummary = (rest: Record<string, unknown>): void => {
	const { symbol, candles, profit, tradeCount, summary } =
		rest as BacktestSummaryPrettyPayload;
	console.table([
		{
			symbol,
			candles,
			profit,
			tradeCount,
			closedTrades: summary?.closedTrades,
			wins: summary?.wins,
			losses: summary?.losses,
			breakeven: summary?.breakeven,
			maxDrawdown: summary?.maxDrawdown,
		},
	]);
};

interface TradePrettyPayload {
	symbol?: string;
	timestamp?: number;
	action?: string;
	price?: number;
	quantity?: number;
	reason?: Nullable<string>;
	realizedPnl?: Nullable<number>;
}

interface BacktestSummaryPrettyPayload {
	symbol?: string;
	candles?: number;
	profit?: number;
	tradeCount?: number;
	summary?: {
		closedTrades?: number;
		wins?: number;
		losses?: number;
		breakeven?: number;
		maxDrawdown?: number;
	};
}
