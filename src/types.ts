/** Database row types (snake_case matches SQLite columns) and domain entities */

import type { DateTime, Duration } from "luxon";

export const MESSAGE_KINDS = ["text", "photo", "video", "video_note"] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

export interface BanRow {
	id: number;
	subject_user_id: number;
	subject_display_name: string;
	issuer_user_id: number;
	issuer_display_name: string;
	reason: string | null;
	ban_until: number; // UTC epoch milliseconds
	created_at: number; // UTC epoch milliseconds
	active: number; // 0 | 1
}

export interface Ban {
	id: number;
	subjectUserId: number;
	subjectDisplayName: string;
	issuerUserId: number;
	issuerDisplayName: string;
	reason: string | null;
	banUntil: DateTime;
	createdAt: DateTime;
	active: boolean;
}

/** Account identity as delivered by the messaging gateway */
export interface ChatIdentity {
	id: number;
	username?: string;
	firstName?: string;
	lastName?: string;
}

export interface UserCount {
	username: string;
	count: number;
}

export interface HourBucket {
	hour: number;
	count: number;
}

/** 0 = Monday ... 6 = Sunday */
export interface WeekdayBucket {
	weekday: number;
	count: number;
}

export interface DayBucket {
	day: number;
	count: number;
}

export interface MonthBucket {
	month: number;
	count: number;
}

export interface YearBucket {
	year: number;
	count: number;
}

export type Denial =
	| {
			reason: "BANNED";
			remaining: Duration;
			banReason: string | null;
			issuer: string;
			until: DateTime;
	  }
	| { reason: "TOO_SOON"; remaining: Duration; availableAt: DateTime }
	| {
			reason: "QUOTA_EXCEEDED";
			used: number;
			limit: number;
			nextCycleStart: DateTime;
	  };

export type PublishDecision =
	| { outcome: "ALLOW"; used: number }
	| { outcome: "DENY"; denial: Denial };

export type PublishOutcome =
	| { status: "published"; eventId: number; remaining: number }
	| { status: "denied"; denial: Denial };

export type BanOutcome =
	| { status: "created"; ban: Ban }
	| { status: "immune"; subjectUserId: number };

export const COMMAND_NAMES = [
	"tea",
	"quote",
	"stats",
	"reset",
	"ban",
	"unban",
	"help",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(value: string): value is CommandName {
	return COMMAND_NAMES.some((name) => name === value);
}
