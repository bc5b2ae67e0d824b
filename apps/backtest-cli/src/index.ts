#!/usr/bin/env node

import process from "node:process";
import { loadBotConfig } from "@crossbot/core";
import { createPriceSource } from "@crossbot/data";
import { BotController } from "@crossbot/runtime";
import { resolveCliOptions } from "./cliArgs";

const USAGE = `Usage:
  npm run backtest -- [candles] [options]

Options (all optional):
  --candles <number>       Number of candles to replay (default 500)
  --profile <name>         Bot config profile under config/bot/
  --configDir <path>       Custom config directory
  --envPath <path>         Custom .env path
  --fallback               Serve synthetic prices if the exchange call fails
  --json                   Print full JSON result payload
  --help                   Show this message
`;

const formatNumber = (value: number): string => value.toFixed(6);

const main = async (): Promise<void> => {
	const options = resolveCliOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const loaded = loadBotConfig({
		profile: options.profile,
		configDir: options.configDir,
		envPath: options.envPath,
	});
	const priceSource = createPriceSource(
		{
			apiKey: loaded.env.binanceApiKey,
			apiSecret: loaded.env.binanceApiSecret,
		},
		{ fallbackOnError: options.fallback }
	);
	const controller = new BotController({ config: loaded.bot, priceSource });
	const { symbol, interval, strategy } = loaded.bot;

	console.log(
		`Running backtest for ${symbol} ${interval} (${strategy.type} ${strategy.shortWindow}/${strategy.longWindow}) on ${options.candles} candles from ${priceSource.venue}...`
	);
	const result = await controller.backtest(options.candles);

	if (options.json) {
		console.log(JSON.stringify(result, null, 2));
		return;
	}

	console.log("---- Summary ----");
	console.log(`Candles replayed: ${result.summary.candles}`);
	console.log(`Trades executed: ${result.tradeCount}`);
	console.log(
		`Closed trades: ${result.summary.closedTrades} (wins ${result.summary.wins}, losses ${result.summary.losses}, breakeven ${result.summary.breakeven})`
	);
	console.log(`Realized PnL: ${formatNumber(result.profit)}`);
	console.log(`Max drawdown: ${formatNumber(result.summary.maxDrawdown)}`);
	console.log(
		`Open position: ${
			result.openPosition
				? `${result.openPosition.quantity} @ ${result.openPosition.entryPrice}`
				: "none"
		}`
	);
};

main().catch((error) => {
	console.error(
		"Backtest failed:",
		error instanceof Error ? error.message : String(error)
	);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
