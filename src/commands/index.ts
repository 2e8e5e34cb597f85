/**
 * Command registration.
 * Every command is scoped to the source chat and guarded by its permission
 * flag before the handler runs.
 *
 * @module commands
 */

import type { Context, Telegraf } from "telegraf";
import type { BotConfig } from "../config";
import { requirePermission, sourceChatOnly } from "../middleware/index";
import type { ChannelPublisher } from "../services/channelPublisher";
import type { ChartRenderer } from "../services/chartRenderer";
import type { PolicyEngine } from "../services/policyEngine";
import type { StatsService } from "../services/statsService";
import { COMMAND_NAMES, type CommandName } from "../types";
import { command } from "../utils/commandHelper";
import { createHelpHandler } from "./help";
import { createBanHandler, createResetHandler, createUnbanHandler } from "./moderation";
import { createPublishHandler } from "./publish";
import { createStatsHandler } from "./stats";

export interface CommandDeps {
	config: BotConfig;
	engine: PolicyEngine;
	stats: StatsService;
	publisher: ChannelPublisher;
	charts: ChartRenderer;
}

export type CommandHandler = (ctx: Context) => Promise<void>;

/**
 * Registers all commands with the bot.
 *
 * Commands registered:
 * - /tea - Publish to the channel (optional media and custom text)
 * - /quote - Publish with a random quote as the text
 * - /stats [month|1-12|year|all|hours|weekdays] - Statistics
 * - /reset - Delete the current cycle's records
 * - /ban <hours> [reason] - Ban the replied-to user from publishing
 * - /unban - Lift the replied-to user's ban
 * - /help - Command reference
 *
 * @example
 * ```typescript
 * const bot = new Telegraf(config.botToken);
 * registerCommands(bot, { config, engine, stats, publisher, charts });
 * ```
 */
export function registerCommands(bot: Telegraf<Context>, deps: CommandDeps): void {
	const handlers: Record<CommandName, CommandHandler> = {
		tea: createPublishHandler(deps, "custom"),
		quote: createPublishHandler(deps, "quote"),
		stats: createStatsHandler(deps),
		reset: createResetHandler(deps),
		ban: createBanHandler(deps),
		unban: createUnbanHandler(deps),
		help: createHelpHandler(deps),
	};

	bot.use(sourceChatOnly(deps.config));

	for (const name of COMMAND_NAMES) {
		bot.use(command(name, requirePermission(deps.config, name), handlers[name]));
	}
}
