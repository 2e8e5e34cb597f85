/** Display names, captions and user-facing renderings of engine results */

import type { DateTime, Duration } from "luxon";
import quotes from "../../assets/quotes.json";
import type { ChatIdentity, Denial, MessageKind } from "../types";

export const ANONYMOUS = "Anonymous";

const TEA_EMOJI = ["🍵", "🫖", "🌱", "🍃", "🍯", "🍫", "🍪"];

const KIND_BADGES: Record<MessageKind, string> = {
	text: "",
	photo: " 📷",
	video: " 🎬",
	video_note: " 🎥",
};

export type RandomSource = () => number;

function pick<T>(items: readonly T[], random: RandomSource): T {
	return items[Math.floor(random() * items.length) % items.length];
}

/**
 * `@handle` when the account has one, else "first last", else "Anonymous".
 *
 * @example
 * ```typescript
 * displayName({ id: 1, username: 'alice' });            // '@alice'
 * displayName({ id: 2, firstName: 'Bob', lastName: '' }); // 'Bob'
 * ```
 */
export function displayName(user: ChatIdentity): string {
	if (user.username) {
		return `@${user.username}`;
	}

	const name = [user.firstName, user.lastName]
		.map((part) => (part ?? "").trim())
		.filter((part) => part.length > 0)
		.join(" ");

	return name || ANONYMOUS;
}

/**
 * Caption for the channel post. The decorative emoji are random; the
 * structure is `<decor> Tea[ badge]. "<custom>"\nby <name>` with custom text,
 * `<decor> Tea[ badge] <decor>\nby <name>` without.
 */
export function composeCaption(
	kind: MessageKind,
	name: string,
	customText?: string,
	random: RandomSource = Math.random,
): string {
	const decor = () => pick(TEA_EMOJI, random);
	const badge = KIND_BADGES[kind];

	if (customText) {
		return `${decor()} ${decor()} Tea${badge}. "${customText}"\nby ${name}`;
	}
	return `${decor()} ${decor()} Tea${badge} ${decor()} ${decor()}\nby ${name}`;
}

export function randomQuote(random: RandomSource = Math.random): string {
	return pick(quotes, random);
}

/** "3h 05m", "12m 30s", "45s" */
export function formatDuration(duration: Duration): string {
	const totalSeconds = Math.max(0, Math.ceil(duration.as("seconds")));
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;

	if (hours > 0) {
		return `${hours}h ${String(minutes).padStart(2, "0")}m`;
	}
	if (minutes > 0) {
		return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
	}
	return `${seconds}s`;
}

export function formatClock(instant: DateTime): string {
	return instant.toFormat("HH:mm");
}

export function formatDateTime(instant: DateTime): string {
	return instant.toFormat("yyyy-MM-dd HH:mm");
}

export function renderDenial(denial: Denial): string {
	switch (denial.reason) {
		case "BANNED": {
			const lines = [
				`🚫 You are banned from publishing for another ${formatDuration(denial.remaining)}.`,
			];
			if (denial.banReason) {
				lines.push(`Reason: ${denial.banReason}`);
			}
			lines.push(`Issued by: ${denial.issuer}`);
			return lines.join("\n");
		}
		case "TOO_SOON":
			return `⏳ Too soon! The next post is possible in ${formatDuration(denial.remaining)}.`;
		case "QUOTA_EXCEEDED":
			return `⏰ Daily limit reached (${denial.used}/${denial.limit}). Next announcement after ${formatClock(denial.nextCycleStart)}.`;
		default: {
			const unreachable: never = denial;
			return unreachable;
		}
	}
}
