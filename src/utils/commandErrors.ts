/** Maps failures raised while handling a command to a user-facing reply */

import type { Context } from "telegraf";
import { DeliveryError, ValidationError } from "./errors";
import { StructuredLogger } from "./logger";

export const GENERIC_FAILURE = "❌ Something went wrong. Please try again later.";
export const DELIVERY_FAILURE = "❌ Failed to send the message to the channel.";

/**
 * Validation problems are shown verbatim. Storage and delivery failures are
 * logged and answered with a generic notice.
 */
export async function replyWithError(
	ctx: Context,
	error: unknown,
	operation: string,
): Promise<void> {
	if (error instanceof ValidationError) {
		await ctx.reply(`⚠️ ${error.message}`);
		return;
	}

	const context = { userId: ctx.from?.id, operation };
	if (error instanceof DeliveryError) {
		StructuredLogger.logError(
			error.cause instanceof Error ? error.cause : error,
			context,
		);
		await ctx.reply(DELIVERY_FAILURE);
		return;
	}

	if (error instanceof Error) {
		StructuredLogger.logError(error, context);
	} else {
		StructuredLogger.logError(String(error), context);
	}
	await ctx.reply(GENERIC_FAILURE);
}
