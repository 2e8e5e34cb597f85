/** Command parsing utilities: command matching, arguments, reply targets and payloads */

import { type Context, Composer, type Middleware, type MiddlewareFn } from "telegraf";
import type { Message, User } from "telegraf/types";
import type { ChatIdentity, CommandName } from "../types";

export interface ParsedCommand {
	name: string;
	/** Bot the command is addressed to (`/name@bot`), null when unqualified */
	botUsername: string | null;
	/** Whitespace-separated words after the command */
	args: string[];
	/** Everything after the command, trimmed; null when blank */
	rest: string | null;
}

export type ChannelPayload =
	| { kind: "text" }
	| { kind: "photo"; fileId: string }
	| { kind: "video"; fileId: string }
	| { kind: "video_note"; fileId: string };

const COMMAND_PATTERN = /^\/([a-zA-Z0-9_]+)(?:@([a-zA-Z0-9_]+))?(?=\s|$)/;

/** Text of a message, or the caption of a media message */
export function messageText(message: Message): string | null {
	if ("text" in message) return message.text;
	if ("caption" in message && message.caption) return message.caption;
	return null;
}

/**
 * Parses `/name[@bot] args...` from the text or the media caption.
 * Command names are matched case-insensitively.
 */
export function parseCommand(message: Message): ParsedCommand | null {
	const text = messageText(message)?.trim();
	if (!text) return null;

	const match = text.match(COMMAND_PATTERN);
	if (!match) return null;

	const rest = text.slice(match[0].length).trim();
	return {
		name: match[1].toLowerCase(),
		botUsername: match[2] ?? null,
		args: rest.length > 0 ? rest.split(/\s+/) : [],
		rest: rest.length > 0 ? rest : null,
	};
}

/**
 * Middleware that runs `fns` only for messages carrying command `name`,
 * either as text or as a media caption. Commands addressed to another
 * bot and other updates pass through.
 */
export function command(
	name: CommandName,
	...fns: Middleware<Context>[]
): MiddlewareFn<Context> {
	const handler = Composer.compose(fns);
	return (ctx, next) => {
		const parsed = ctx.message ? parseCommand(ctx.message) : null;
		if (!parsed || parsed.name !== name) {
			return next();
		}
		if (
			parsed.botUsername !== null &&
			parsed.botUsername.toLowerCase() !== ctx.botInfo.username.toLowerCase()
		) {
			return next();
		}
		return handler(ctx, next);
	};
}

export function getCommandArgs(ctx: Context): string[] {
	if (!ctx.message) return [];
	return parseCommand(ctx.message)?.args ?? [];
}

/** Custom text after the command, e.g. `/tea good morning` -> "good morning" */
export function getCustomText(ctx: Context): string | undefined {
	if (!ctx.message) return undefined;
	return parseCommand(ctx.message)?.rest ?? undefined;
}

export function toIdentity(user: User): ChatIdentity {
	return {
		id: user.id,
		username: user.username,
		firstName: user.first_name,
		lastName: user.last_name,
	};
}

/** Sender of the message this command replies to */
export function getReplyTarget(ctx: Context): ChatIdentity | null {
	if (
		ctx.message &&
		"reply_to_message" in ctx.message &&
		ctx.message.reply_to_message
	) {
		const repliedMessage = ctx.message.reply_to_message;
		if ("from" in repliedMessage && repliedMessage.from) {
			return toIdentity(repliedMessage.from);
		}
	}
	return null;
}

/** Media carried by the command message itself; largest photo size wins */
export function getPayload(message: Message): ChannelPayload {
	if ("photo" in message && message.photo.length > 0) {
		return {
			kind: "photo",
			fileId: message.photo[message.photo.length - 1].file_id,
		};
	}
	if ("video" in message) {
		return { kind: "video", fileId: message.video.file_id };
	}
	if ("video_note" in message) {
		return { kind: "video_note", fileId: message.video_note.file_id };
	}
	return { kind: "text" };
}
