import { createLogger, isCrossbotError } from "@crossbot/core";

export type RuntimeMode = "live" | "backtest";

export const runtimeLogger = createLogger("runtime");

export const describeError = (error: unknown): Record<string, unknown> => ({
	message: error instanceof Error ? error.message : String(error),
	code: isCrossbotError(error) ? error.code : undefined,
});
