import {
	ConfigurationError,
	DataUnavailableError,
	createLogger,
} from "@crossbot/core";
import { MAX_BACKTEST_CANDLES } from "@crossbot/runtime";
import type { BotController } from "@crossbot/runtime";

const logger = createLogger("bot-server");

export const DEFAULT_BACKTEST_CANDLES = 500;

export interface ApiRequest {
	method: string;
	path: string;
	/** Parsed JSON body; `undefined` when the request had none. */
	body: unknown;
}

export interface ApiResponse {
	status: number;
	body: Record<string, unknown>;
}

export class BadRequestError extends Error {}

const ok = (body: Record<string, unknown>): ApiResponse => ({
	status: 200,
	body,
});

const fail = (status: number, detail: string): ApiResponse => ({
	status,
	body: { detail },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const parseBacktestBody = (body: unknown): number => {
	if (body === undefined || body === null) {
		return DEFAULT_BACKTEST_CANDLES;
	}
	if (!isRecord(body)) {
		throw new BadRequestError("Request body must be a JSON object");
	}
	const value = body.num_candles;
	if (value === undefined) {
		return DEFAULT_BACKTEST_CANDLES;
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new BadRequestError("num_candles must be a positive integer");
	}
	if (value > MAX_BACKTEST_CANDLES) {
		throw new BadRequestError(
			`num_candles must not exceed ${MAX_BACKTEST_CANDLES}`
		);
	}
	return value;
};

type Handler = (request: ApiRequest) => Promise<ApiResponse>;

/**
 * Route table for the control API. Response keys follow the public JSON
 * contract (`snake_case`).
 */
export const createRoutes = (
	controller: BotController
): Record<string, Handler> => ({
	"GET /": async () => ok({ message: "Crossbot API running" }),

	"GET /status": async () => {
		const status = controller.status();
		return ok({
			running: status.running,
			open_position: status.openPositionPrice,
			trade_count: status.tradeCount,
		});
	},

	"POST /start": async () => {
		const result = controller.start();
		if (!result.accepted) {
			return fail(400, result.error.message);
		}
		return ok({ message: "Bot started" });
	},

	"POST /stop": async () => {
		const result = await controller.stop();
		if (!result.accepted) {
			return fail(400, result.error.message);
		}
		return ok({ message: "Bot stopped", clean: result.clean });
	},

	"POST /backtest": async (request) => {
		const numCandles = parseBacktestBody(request.body);
		const result = await controller.backtest(numCandles);
		return ok({
			profit: result.profit,
			trade_count: result.tradeCount,
			trades: result.trades,
		});
	},
});

export const dispatch = async (
	routes: Record<string, Handler>,
	request: ApiRequest
): Promise<ApiResponse> => {
	const handler = routes[`${request.method} ${request.path}`];
	if (!handler) {
		return fail(404, "Not Found");
	}
	try {
		return await handler(request);
	} catch (error) {
		if (error instanceof BadRequestError || error instanceof ConfigurationError) {
			return fail(400, error.message);
		}
		if (error instanceof DataUnavailableError) {
			logger.warn("request_data_unavailable", {
				route: `${request.method} ${request.path}`,
				message: error.message,
			});
			return fail(503, error.message);
		}
		logger.error("request_failed", {
			route: `${request.method} ${request.path}`,
			message: error instanceof Error ? error.message : String(error),
			stack: error instanceof Error ? error.stack : undefined,
		});
		return fail(500, "Internal Server Error");
	}
};
