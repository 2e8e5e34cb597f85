/**
 * Channel publisher.
 * Posts an approved forward to the target channel through the Telegram API.
 * Video notes cannot carry a caption, so the caption follows as its own
 * message.
 *
 * @module services/channelPublisher
 */

import type { Telegram } from "telegraf";
import type { ChannelPayload } from "../utils/commandHelper";

export interface OutboundPost {
	payload: ChannelPayload;
	caption: string;
}

export interface ChannelPublisher {
	publish(post: OutboundPost): Promise<void>;
}

export class TelegramChannelPublisher implements ChannelPublisher {
	constructor(
		private readonly telegram: Telegram,
		private readonly channelId: number,
	) {}

	async publish(post: OutboundPost): Promise<void> {
		const { payload, caption } = post;
		switch (payload.kind) {
			case "photo":
				await this.telegram.sendPhoto(this.channelId, payload.fileId, {
					caption,
				});
				return;
			case "video":
				await this.telegram.sendVideo(this.channelId, payload.fileId, {
					caption,
				});
				return;
			case "video_note":
				await this.telegram.sendVideoNote(this.channelId, payload.fileId);
				await this.telegram.sendMessage(this.channelId, caption);
				return;
			case "text":
				await this.telegram.sendMessage(this.channelId, caption);
				return;
		}
	}
}
