import { createLogger, loadBotConfig } from "@crossbot/core";
import { createPriceSource } from "@crossbot/data";
import { BotController } from "@crossbot/runtime";
import { createServer } from "./app";

const logger = createLogger("bot-server");

const DEFAULT_PORT = 8000;

const main = async (): Promise<void> => {
	logger.info("server_start", {
		env: process.env.NODE_ENV ?? "development",
		pid: process.pid,
	});

	const loaded = loadBotConfig();
	const priceSource = createPriceSource(
		{
			apiKey: loaded.env.binanceApiKey,
			apiSecret: loaded.env.binanceApiSecret,
		},
		{ fallbackOnError: process.env.PRICE_FALLBACK === "true" }
	);
	const controller = new BotController({ config: loaded.bot, priceSource });
	logger.info("bot_config_loaded", {
		profile: loaded.profile,
		path: loaded.path,
		symbol: loaded.bot.symbol,
		venue: priceSource.venue,
	});

	const port = Number(process.env.PORT) || DEFAULT_PORT;
	const server = createServer(controller);

	const shutdown = (signal: string): void => {
		logger.info("server_shutdown", { signal });
		server.close();
		if (controller.runState === "running") {
			controller
				.stop()
				.then((result) => logger.info("bot_stop_on_shutdown", { ...result }))
				.catch((error: unknown) =>
					logger.error("bot_stop_on_shutdown_failed", {
						message: error instanceof Error ? error.message : String(error),
					})
				);
		}
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	server.listen(port, () => {
		logger.info("server_listening", { port });
	});
};

main().catch((error) => {
	logger.error("server_fatal", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
