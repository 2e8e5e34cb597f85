/**
 * Publish command handlers.
 * /tea posts the command message (text, photo, video or video note) to the
 * channel with a caption; /quote does the same with a random quote as the
 * caption text. Both go through the policy engine, which records the post
 * only after the channel accepted it.
 *
 * @module commands/publish
 */

import type { Context } from "telegraf";
import type { PublishOutcome } from "../types";
import { getCustomText, getPayload, toIdentity } from "../utils/commandHelper";
import { replyWithError } from "../utils/commandErrors";
import {
	composeCaption,
	displayName,
	randomQuote,
	renderDenial,
} from "../utils/formatting";
import { logger } from "../utils/logger";
import type { CommandDeps, CommandHandler } from "./index";

export type CaptionSource = "custom" | "quote";

/**
 * Command: /tea [text], /quote
 *
 * Permission: open unless listed in ADMIN_ONLY_COMMANDS
 * Syntax: /tea [custom text] (as text, or as the caption of a photo/video)
 *
 * @example
 * User: /tea good morning
 * Bot: ✅ Sent! 4 posts left today.
 */
export function createPublishHandler(
	deps: CommandDeps,
	source: CaptionSource,
): CommandHandler {
	return async (ctx: Context) => {
		const user = ctx.from;
		const message = ctx.message;
		if (!user || !message) return;

		const name = displayName(toIdentity(user));
		const payload = getPayload(message);
		const customText = source === "quote" ? randomQuote() : getCustomText(ctx);
		const caption = composeCaption(payload.kind, name, customText);

		let outcome: PublishOutcome;
		try {
			outcome = await deps.engine.publish(
				{ userId: user.id, username: name, kind: payload.kind },
				() => deps.publisher.publish({ payload, caption }),
			);
		} catch (error) {
			await replyWithError(ctx, error, source === "quote" ? "quote" : "tea");
			return;
		}

		if (outcome.status === "denied") {
			await ctx.reply(renderDenial(outcome.denial));
			logger.warn("Publish denied", {
				userId: user.id,
				username: name,
				reason: outcome.denial.reason,
			});
			return;
		}

		// Already delivered and recorded; a failed confirmation goes to bot.catch
		logger.info(`Sent ${payload.kind} by ${name}`, {
			eventId: outcome.eventId,
		});
		await ctx.reply(`✅ Sent! ${outcome.remaining} posts left today.`);
	};
}
