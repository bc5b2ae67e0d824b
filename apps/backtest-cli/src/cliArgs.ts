export type ArgValue = string | boolean;

export const DEFAULT_CANDLES = 500;

export interface BacktestCliOptions {
	profile?: string;
	configDir?: string;
	envPath?: string;
	candles: number;
	fallback: boolean;
	json: boolean;
	help: boolean;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(["fallback", "json", "help"]);

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--") && !BOOLEAN_FLAGS.has(key)) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.candles === undefined) {
		args.candles = positionals[0];
	}
	return args;
};

const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`--${key} requires a value`);
	}
	return value;
};

const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const parseCandles = (value: string | undefined): number => {
	if (value === undefined) {
		return DEFAULT_CANDLES;
	}
	const candles = Number(value);
	if (!Number.isInteger(candles) || candles <= 0) {
		throw new Error(`Invalid value for --candles: ${value}`);
	}
	return candles;
};

export const resolveCliOptions = (argv: string[]): BacktestCliOptions => {
	const args = parseCliArgs(argv);
	return {
		profile: readString(args, "profile"),
		configDir: readString(args, "configDir"),
		envPath: readString(args, "envPath") ?? readString(args, "env"),
		candles: parseCandles(readString(args, "candles")),
		fallback: readFlag(args, "fallback"),
		json: readFlag(args, "json"),
		help: readFlag(args, "help"),
	};
};
