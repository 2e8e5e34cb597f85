/**
 * Main entry point.
 * Builds the configuration, opens the database, wires the store, the policy
 * engine and the statistics service into the command layer, and launches the
 * bot with long polling.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { registerCommands } from "./commands/index";
import { loadConfig, validateConfig } from "./config";
import { initDb, openDatabase } from "./database";
import { TelegramChannelPublisher } from "./services/channelPublisher";
import { SvgChartRenderer } from "./services/chartRenderer";
import { EventStore } from "./services/eventStore";
import { PolicyEngine } from "./services/policyEngine";
import { StatsService } from "./services/statsService";
import { systemClock } from "./utils/clock";
import { ConfigError } from "./utils/errors";
import { logger, updateLogLevel } from "./utils/logger";

/**
 * Initialization sequence:
 * 1. Loads and validates configuration from environment variables
 * 2. Opens the SQLite database and creates tables
 * 3. Builds the store, policy engine and statistics service
 * 4. Registers middleware and command handlers
 * 5. Configures graceful shutdown and launches the bot
 *
 * @throws {ConfigError} If configuration validation fails
 */
async function main(): Promise<void> {
	const config = loadConfig();
	validateConfig(config);
	updateLogLevel(config.logLevel);

	const db = openDatabase(config.databasePath);
	initDb(db);

	const store = new EventStore(db, { timezone: config.timezone }, systemClock);
	const engine = new PolicyEngine(
		store,
		{
			dailyLimit: config.dailyLimit,
			resetHour: config.resetHour,
			timezone: config.timezone,
			cooldownMinutes: config.cooldownMinutes,
			adminIds: config.adminIds,
			serializePublishes: config.serializePublishes,
		},
		systemClock,
	);
	const stats = new StatsService(
		store,
		{
			timezone: config.timezone,
			resetHour: config.resetHour,
			dailyLimit: config.dailyLimit,
		},
		systemClock,
	);

	const bot = new Telegraf(config.botToken);

	registerCommands(bot, {
		config,
		engine,
		stats,
		publisher: new TelegramChannelPublisher(bot.telegram, config.channelId),
		charts: new SvgChartRenderer(),
	});

	bot.catch((err, ctx) => {
		logger.error("Bot error", {
			error: err instanceof Error ? err.message : String(err),
			updateId: ctx.update.update_id,
		});
	});

	const shutdown = (signal: string) => {
		logger.info(`Received ${signal}, shutting down`);
		bot.stop(signal);
		db.close();
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	logger.info("Bot starting", {
		sourceChatId: config.sourceChatId,
		channelId: config.channelId,
		dailyLimit: config.dailyLimit,
		resetHour: config.resetHour,
		timezone: config.timezone,
	});

	// Resolves only once polling stops
	await bot.launch();
}

main().catch((error) => {
	if (error instanceof ConfigError) {
		logger.error("Invalid configuration", error.toJSON());
	} else {
		logger.error("Failed to start bot", {
			error: error instanceof Error ? error.message : String(error),
		});
	}
	process.exit(1);
});
