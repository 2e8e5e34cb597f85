/**
 * Event store module.
 * Owns the `forwards` log and the `bans` registry. Every public method runs as
 * one SQLite transaction: it either commits fully or rolls back and throws a
 * {@link StorageError}. Mutations also write one audit log line.
 *
 * Instants cross this boundary as luxon `DateTime` values and are persisted
 * as UTC epoch milliseconds, plus the wall-clock text in the configured zone
 * that calendar bucketing reads.
 *
 * @module services/eventStore
 */

import { DateTime } from "luxon";
import type { DatabaseHandle } from "../database";
import type {
	Ban,
	BanRow,
	DayBucket,
	HourBucket,
	MessageKind,
	MonthBucket,
	UserCount,
	WeekdayBucket,
	YearBucket,
} from "../types";
import type { Clock } from "../utils/clock";
import { StorageError } from "../utils/errors";
import { logger, StructuredLogger } from "../utils/logger";
import { daysInMonth, monthWindow, yearWindow } from "./timeWindows";

const LOCAL_TIME_FORMAT = "yyyy-MM-dd HH:mm:ss";

export interface EventStoreOptions {
	timezone: string;
}

interface BucketRow {
	bucket: number;
	count: number;
}

export interface NewBan {
	subjectUserId: number;
	subjectName: string;
	issuerId: number;
	issuerName: string;
	durationHours: number;
	reason?: string;
}

export class EventStore {
	constructor(
		private readonly db: DatabaseHandle,
		private readonly options: EventStoreOptions,
		private readonly clock: Clock,
	) {}

	/**
	 * Appends one forward event.
	 *
	 * @param at - Defaults to the clock's current instant
	 * @returns The new event's id
	 *
	 * @example
	 * ```typescript
	 * const id = store.recordForward('@alice', 'photo');
	 * ```
	 */
	recordForward(username: string, kind: MessageKind, at?: DateTime): number {
		const instant = this.zoned(at ?? this.clock.now());
		const id = this.transact("record_forward", () => {
			const result = this.db
				.prepare(
					"INSERT INTO forwards (username, message_kind, timestamp, local_time) VALUES (?, ?, ?, ?)",
				)
				.run(
					username,
					kind,
					instant.toMillis(),
					instant.toFormat(LOCAL_TIME_FORMAT),
				);
			return Number(result.lastInsertRowid);
		});

		StructuredLogger.logUserAction("Forward recorded", {
			username,
			operation: "record_forward",
			kind,
			eventId: id,
		});
		return id;
	}

	countSince(instant: DateTime): number {
		return this.transact("count_since", () =>
			this.count("SELECT COUNT(*) AS count FROM forwards WHERE timestamp >= ?", [
				instant.toMillis(),
			]),
		);
	}

	/** Used by the daily reset; the only path that removes events */
	deleteSince(instant: DateTime): number {
		const deleted = this.transact("delete_since", () => {
			const result = this.db
				.prepare("DELETE FROM forwards WHERE timestamp >= ?")
				.run(instant.toMillis());
			return result.changes;
		});

		StructuredLogger.logSecurityEvent("Forwards deleted", {
			operation: "delete_since",
			since: instant.toISO(),
			deleted,
		});
		return deleted;
	}

	/**
	 * Most recent event instant, across everyone or for one display name.
	 */
	latestEventTime(username?: string): DateTime | null {
		const row = this.transact("latest_event_time", () =>
			username === undefined
				? this.db
						.prepare<[], { latest: number | null }>(
							"SELECT MAX(timestamp) AS latest FROM forwards",
						)
						.get()
				: this.db
						.prepare<[string], { latest: number | null }>(
							"SELECT MAX(timestamp) AS latest FROM forwards WHERE username = ?",
						)
						.get(username),
		);

		if (!row || row.latest === null) return null;
		return this.fromMillis(row.latest);
	}

	/**
	 * Inserts a ban lasting `durationHours` from now. Any still-active ban of the
	 * same subject is deactivated in the same transaction, so one subject never
	 * has two live bans.
	 *
	 * Duration validation belongs to the caller.
	 */
	createBan(ban: NewBan): number {
		const now = this.zoned(this.clock.now());
		const banUntil = now.plus({ hours: ban.durationHours });

		const id = this.transact("create_ban", () => {
			this.db
				.prepare(
					"UPDATE bans SET active = 0 WHERE subject_user_id = ? AND active = 1",
				)
				.run(ban.subjectUserId);

			const result = this.db
				.prepare(
					`INSERT INTO bans (subject_user_id, subject_display_name, issuer_user_id, issuer_display_name, reason, ban_until, created_at, active)
           VALUES (?, ?, ?, ?, ?, ?, ?, 1)`,
				)
				.run(
					ban.subjectUserId,
					ban.subjectName,
					ban.issuerId,
					ban.issuerName,
					ban.reason ?? null,
					banUntil.toMillis(),
					now.toMillis(),
				);
			return Number(result.lastInsertRowid);
		});

		StructuredLogger.logSecurityEvent("Ban created", {
			userId: ban.subjectUserId,
			username: ban.subjectName,
			operation: "create_ban",
			issuerId: ban.issuerId,
			hours: ban.durationHours,
			reason: ban.reason,
			banId: id,
		});
		return id;
	}

	/** The newest ban that is both flagged active and not yet expired */
	activeBan(subjectUserId: number): Ban | null {
		const now = this.clock.now().toMillis();
		const row = this.transact("active_ban", () =>
			this.db
				.prepare<[number, number], BanRow>(
					`SELECT * FROM bans
           WHERE subject_user_id = ? AND active = 1 AND ban_until > ?
           ORDER BY created_at DESC, id DESC
           LIMIT 1`,
				)
				.get(subjectUserId, now),
		);

		return row ? this.toBan(row) : null;
	}

	findBan(id: number): Ban | null {
		const row = this.transact("find_ban", () =>
			this.db.prepare<[number], BanRow>("SELECT * FROM bans WHERE id = ?").get(id),
		);
		return row ? this.toBan(row) : null;
	}

	/**
	 * Deactivates every live ban of the subject.
	 *
	 * @returns Number of bans revoked; 0 when none was live
	 */
	revokeBan(subjectUserId: number): number {
		const now = this.clock.now().toMillis();
		const revoked = this.transact("revoke_ban", () => {
			const result = this.db
				.prepare(
					"UPDATE bans SET active = 0 WHERE subject_user_id = ? AND active = 1 AND ban_until > ?",
				)
				.run(subjectUserId, now);
			return result.changes;
		});

		StructuredLogger.logSecurityEvent("Ban revoked", {
			userId: subjectUserId,
			operation: "revoke_ban",
			revoked,
		});
		return revoked;
	}

	countInRange(start: DateTime, end: DateTime): number {
		return this.transact("count_in_range", () =>
			this.count(
				"SELECT COUNT(*) AS count FROM forwards WHERE timestamp >= ? AND timestamp < ?",
				[start.toMillis(), end.toMillis()],
			),
		);
	}

	/** Count per display name, highest first; ties keep first-seen order */
	usersRanked(start: DateTime, end: DateTime, limit?: number): UserCount[] {
		const sql = `SELECT username, COUNT(*) AS count, MIN(id) AS first_id
       FROM forwards
       WHERE timestamp >= ? AND timestamp < ?
       GROUP BY username
       ORDER BY count DESC, first_id ASC
       ${limit === undefined ? "" : "LIMIT ?"}`;
		const params =
			limit === undefined
				? [start.toMillis(), end.toMillis()]
				: [start.toMillis(), end.toMillis(), limit];

		const rows = this.transact("users_ranked", () =>
			this.db
				.prepare<number[], { username: string; count: number }>(sql)
				.all(...params),
		);
		return rows.map((row) => ({ username: row.username, count: row.count }));
	}

	topUsersThisMonth(limit: number): UserCount[] {
		const now = this.zoned(this.clock.now());
		const { start, end } = monthWindow(now.month, now.year, this.options.timezone);
		return this.usersRanked(start, end, limit);
	}

	/** 24 buckets, hour 0 to 23 */
	hourHistogram(start: DateTime, end: DateTime): HourBucket[] {
		const counts = this.buckets(
			"hour_histogram",
			"CAST(strftime('%H', local_time) AS INTEGER)",
			start,
			end,
		);
		return Array.from({ length: 24 }, (_, hour) => ({
			hour,
			count: counts.get(hour) ?? 0,
		}));
	}

	/**
	 * 7 buckets, Monday first. SQLite numbers weekdays 0 = Sunday, so
	 * `(w + 6) % 7` moves Sunday to the end.
	 */
	weekdayHistogram(start: DateTime, end: DateTime): WeekdayBucket[] {
		const native = this.buckets(
			"weekday_histogram",
			"CAST(strftime('%w', local_time) AS INTEGER)",
			start,
			end,
		);

		const counts = new Map<number, number>();
		for (const [sqliteWeekday, count] of native) {
			counts.set((sqliteWeekday + 6) % 7, count);
		}
		return Array.from({ length: 7 }, (_, weekday) => ({
			weekday,
			count: counts.get(weekday) ?? 0,
		}));
	}

	/** One bucket per calendar day of the month, 1-based */
	dayOfMonthHistogram(month: number, year: number): DayBucket[] {
		const { start, end } = monthWindow(month, year, this.options.timezone);
		const counts = this.buckets(
			"day_histogram",
			"CAST(strftime('%d', local_time) AS INTEGER)",
			start,
			end,
		);
		return Array.from({ length: daysInMonth(month, year) }, (_, index) => ({
			day: index + 1,
			count: counts.get(index + 1) ?? 0,
		}));
	}

	/** 12 buckets, month 1 to 12 */
	monthHistogram(year: number): MonthBucket[] {
		const { start, end } = yearWindow(year, this.options.timezone);
		const counts = this.buckets(
			"month_histogram",
			"CAST(strftime('%m', local_time) AS INTEGER)",
			start,
			end,
		);
		return Array.from({ length: 12 }, (_, index) => ({
			month: index + 1,
			count: counts.get(index + 1) ?? 0,
		}));
	}

	/** Only years that have events, oldest first */
	yearHistogram(): YearBucket[] {
		const rows = this.transact("year_histogram", () =>
			this.db
				.prepare<[], BucketRow>(
					`SELECT CAST(strftime('%Y', local_time) AS INTEGER) AS bucket, COUNT(*) AS count
           FROM forwards
           GROUP BY bucket
           ORDER BY bucket ASC`,
				)
				.all(),
		);
		return rows.map((row) => ({ year: row.bucket, count: row.count }));
	}

	distinctUsers(start: DateTime, end: DateTime): string[] {
		const rows = this.transact("distinct_users", () =>
			this.db
				.prepare<[number, number], { username: string }>(
					`SELECT DISTINCT username FROM forwards
           WHERE timestamp >= ? AND timestamp < ?
           ORDER BY username ASC`,
				)
				.all(start.toMillis(), end.toMillis()),
		);
		return rows.map((row) => row.username);
	}

	private buckets(
		operation: string,
		bucketExpression: string,
		start: DateTime,
		end: DateTime,
	): Map<number, number> {
		const rows = this.transact(operation, () =>
			this.db
				.prepare<[number, number], BucketRow>(
					`SELECT ${bucketExpression} AS bucket, COUNT(*) AS count
           FROM forwards
           WHERE timestamp >= ? AND timestamp < ?
           GROUP BY bucket`,
				)
				.all(start.toMillis(), end.toMillis()),
		);
		return new Map(rows.map((row) => [row.bucket, row.count]));
	}

	private count(sql: string, params: number[]): number {
		const row = this.db.prepare<number[], { count: number }>(sql).get(...params);
		return row?.count ?? 0;
	}

	private transact<T>(operation: string, fn: () => T): T {
		try {
			return this.db.transaction(fn)();
		} catch (error) {
			logger.error(`Database operation failed: ${operation}`, { error });
			throw new StorageError(operation, error);
		}
	}

	private zoned(instant: DateTime): DateTime {
		return instant.setZone(this.options.timezone);
	}

	private fromMillis(ms: number): DateTime {
		return DateTime.fromMillis(ms, { zone: this.options.timezone });
	}

	private toBan(row: BanRow): Ban {
		return {
			id: row.id,
			subjectUserId: row.subject_user_id,
			subjectDisplayName: row.subject_display_name,
			issuerUserId: row.issuer_user_id,
			issuerDisplayName: row.issuer_display_name,
			reason: row.reason,
			banUntil: this.fromMillis(row.ban_until),
			createdAt: this.fromMillis(row.created_at),
			active: row.active === 1,
		};
	}
}
