/**
 * Moderation command handlers: /reset, /ban and /unban.
 * Ban and unban always target the author of the replied-to message and key on
 * the numeric account id; display names are only shown.
 *
 * @module commands/moderation
 */

import type { Context } from "telegraf";
import type { ChatIdentity } from "../types";
import { getCommandArgs, getReplyTarget, toIdentity } from "../utils/commandHelper";
import { replyWithError } from "../utils/commandErrors";
import { ValidationError } from "../utils/errors";
import { displayName, formatDateTime } from "../utils/formatting";
import { StructuredLogger } from "../utils/logger";
import type { CommandDeps, CommandHandler } from "./index";

export const BAN_USAGE =
	"Reply to a message of the user you want to ban: /ban <hours> [reason]";
export const UNBAN_USAGE =
	"Reply to a message of the user you want to unban: /unban";

/**
 * @throws {ValidationError} unless `raw` is a positive whole number
 */
export function parseBanHours(raw: string | undefined): number {
	if (raw === undefined || !/^\d+$/.test(raw)) {
		throw new ValidationError(
			`Ban duration must be a positive whole number of hours. ${BAN_USAGE}`,
		);
	}
	const hours = parseInt(raw, 10);
	if (hours < 1) {
		throw new ValidationError(
			`Ban duration must be a positive whole number of hours. ${BAN_USAGE}`,
		);
	}
	return hours;
}

function requireReplyTarget(ctx: Context, usage: string): ChatIdentity {
	const target = getReplyTarget(ctx);
	if (!target) {
		throw new ValidationError(usage);
	}
	return target;
}

/**
 * Command: /reset
 * Deletes all records of the current cycle. Destructive, not undoable.
 *
 * Permission: admin only by default
 *
 * @example
 * User: /reset
 * Bot: ✅ Counter reset. Deleted records: 3
 */
export function createResetHandler(deps: CommandDeps): CommandHandler {
	return async (ctx: Context) => {
		try {
			const deleted = deps.engine.resetToday();
			await ctx.reply(`✅ Counter reset. Deleted records: ${deleted}`);
			StructuredLogger.logSecurityEvent("Cycle reset", {
				userId: ctx.from?.id,
				operation: "reset",
				deleted,
			});
		} catch (error) {
			await replyWithError(ctx, error, "reset");
		}
	};
}

/**
 * Command: /ban <hours> [reason]
 *
 * Permission: admin only by default
 * Syntax (reply): /ban <hours> [reason]
 *
 * @example
 * Admin: (reply to message) /ban 24 spam
 * Bot: 🔨 @alice is banned from publishing until 2026-10-20 15:00 (24h).
 *      Reason: spam
 */
export function createBanHandler(deps: CommandDeps): CommandHandler {
	return async (ctx: Context) => {
		const issuer = ctx.from;
		if (!issuer) return;

		try {
			const target = requireReplyTarget(ctx, BAN_USAGE);
			const args = getCommandArgs(ctx);
			const hours = parseBanHours(args[0]);
			const reason = args.slice(1).join(" ").trim() || undefined;
			const targetName = displayName(target);

			const outcome = deps.engine.banUser({
				subjectUserId: target.id,
				subjectName: targetName,
				issuerId: issuer.id,
				issuerName: displayName(toIdentity(issuer)),
				durationHours: hours,
				reason,
			});

			if (outcome.status === "immune") {
				await ctx.reply(`⛔ Cannot ban ${targetName} - administrators are immune.`);
				return;
			}

			const lines = [
				`🔨 ${targetName} is banned from publishing until ${formatDateTime(outcome.ban.banUntil)} (${hours}h).`,
			];
			if (outcome.ban.reason) {
				lines.push(`Reason: ${outcome.ban.reason}`);
			}
			await ctx.reply(lines.join("\n"));
		} catch (error) {
			await replyWithError(ctx, error, "ban");
		}
	};
}

/**
 * Command: /unban
 *
 * Permission: admin only by default
 * Syntax (reply): /unban
 *
 * @example
 * Admin: (reply to message) /unban
 * Bot: ✅ @alice has been unbanned.
 */
export function createUnbanHandler(deps: CommandDeps): CommandHandler {
	return async (ctx: Context) => {
		try {
			const target = requireReplyTarget(ctx, UNBAN_USAGE);
			const targetName = displayName(target);
			const revoked = deps.engine.unbanUser(target.id);

			if (revoked === 0) {
				await ctx.reply(`ℹ️ ${targetName} has no active ban.`);
				return;
			}
			await ctx.reply(`✅ ${targetName} has been unbanned.`);
		} catch (error) {
			await replyWithError(ctx, error, "unban");
		}
	};
}
