/**
 * Help command handler.
 *
 * @module commands/help
 */

import type { Context } from "telegraf";
import { logger } from "../utils/logger";
import type { CommandDeps, CommandHandler } from "./index";

export function buildHelpText(deps: Pick<CommandDeps, "config">): string {
	const { config } = deps;
	const reset = `${String(config.resetHour).padStart(2, "0")}:00`;
	return [
		"🍵 Channel forwarding bot",
		"",
		"Commands:",
		"/tea - Publish an announcement to the channel",
		"  • /tea - default announcement",
		"  • /tea as a photo or video caption - media with a caption",
		"  • /tea <text> - announcement with your own text",
		"/quote - Publish an announcement with a random quote",
		"/help - Show this message",
		"",
		"Administrator commands:",
		"/stats [month | 1-12 | year | all | hours | weekdays] - Statistics",
		"/reset - Reset today's counter",
		"/ban <hours> [reason] - Ban the author of the replied-to message",
		"/unban - Lift the ban of the author of the replied-to message",
		"",
		"Limits:",
		`• ${config.dailyLimit} posts per day`,
		`• ${config.cooldownMinutes} minutes between posts`,
		`• Daily reset at ${reset} (${config.timezone})`,
	].join("\n");
}

/**
 * Command: /help
 *
 * Permission: open unless listed in ADMIN_ONLY_COMMANDS
 */
export function createHelpHandler(deps: CommandDeps): CommandHandler {
	return async (ctx: Context) => {
		await ctx.reply(buildHelpText(deps));
		logger.info("Help command used", { userId: ctx.from?.id });
	};
}
