/** Chat scoping and permission control middleware */

import type { Context, MiddlewareFn } from "telegraf";
import { type BotConfig, isAdmin } from "../config";
import type { CommandName } from "../types";
import { displayName } from "../utils/formatting";
import { toIdentity } from "../utils/commandHelper";
import { logger } from "../utils/logger";

/**
 * Middleware that drops every update not coming from the configured source
 * chat. Nothing is replied; the update simply stops here.
 *
 * @example
 * ```typescript
 * bot.use(sourceChatOnly(config));
 * ```
 */
export function sourceChatOnly(config: BotConfig): MiddlewareFn<Context> {
	return (ctx, next) => {
		if (ctx.chat?.id !== config.sourceChatId) {
			logger.debug("Ignoring update from foreign chat", {
				chatId: ctx.chat?.id,
			});
			return;
		}
		return next();
	};
}

/**
 * Middleware enforcing the per-command permission flag: commands listed in
 * `adminOnlyCommands` are limited to the admin allowlist, the rest are open.
 *
 * @example
 * ```typescript
 * bot.use(command('reset', requirePermission(config, 'reset'), resetHandler));
 * ```
 */
export function requirePermission(
	config: BotConfig,
	name: CommandName,
): MiddlewareFn<Context> {
	const adminOnly = config.adminOnlyCommands.includes(name);

	return async (ctx, next) => {
		if (!adminOnly) {
			return next();
		}

		const user = ctx.from;
		if (!user) {
			return;
		}

		if (isAdmin(config, user.id)) {
			return next();
		}

		logger.warn(`Unauthorized /${name} attempt`, {
			userId: user.id,
			username: displayName(toIdentity(user)),
		});
		await ctx.reply("❌ This command is only available to administrators.");
	};
}
