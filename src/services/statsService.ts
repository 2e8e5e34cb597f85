/**
 * Statistics aggregator.
 * Read-only views over the forwards log, sliced by calendar windows in the
 * configured zone. "Today" is the quota cycle, so the numbers here always
 * agree with what the publish check counts.
 *
 * @module services/statsService
 */

import type { DateTime } from "luxon";
import type {
	DayBucket,
	HourBucket,
	MonthBucket,
	UserCount,
	WeekdayBucket,
	YearBucket,
} from "../types";
import type { Clock } from "../utils/clock";
import type { EventStore } from "./eventStore";
import {
	allTimeWindow,
	monthWindow,
	nextCycleStart,
	resolveMonth,
	todayWindow,
	yearWindow,
} from "./timeWindows";

export interface StatsOptions {
	timezone: string;
	resetHour: number;
	dailyLimit: number;
}

/** Top users shown in the default summary */
export const SUMMARY_TOP_USERS = 5;

export interface DailySummary {
	today: number;
	limit: number;
	remaining: number;
	nextReset: DateTime;
	month: number;
	year: number;
	allTime: number;
	topUsersThisMonth: UserCount[];
}

export interface MonthReport {
	month: number;
	year: number;
	total: number;
	ranking: UserCount[];
	participants: string[];
	days: DayBucket[];
}

export interface YearReport {
	year: number;
	total: number;
	ranking: UserCount[];
	months: MonthBucket[];
}

export interface AllTimeReport {
	total: number;
	ranking: UserCount[];
	years: YearBucket[];
}

export interface HourReport {
	total: number;
	hours: HourBucket[];
}

export interface WeekdayReport {
	total: number;
	weekdays: WeekdayBucket[];
}

export class StatsService {
	constructor(
		private readonly store: EventStore,
		private readonly options: StatsOptions,
		private readonly clock: Clock,
	) {}

	private now(): DateTime {
		return this.clock.now().setZone(this.options.timezone);
	}

	summary(): DailySummary {
		const now = this.now();
		const today = todayWindow(now, this.options.resetHour);
		const month = monthWindow(now.month, now.year, this.options.timezone);
		const year = yearWindow(now.year, this.options.timezone);
		const allTime = allTimeWindow(now);

		const todayCount = this.store.countInRange(today.start, today.end);
		return {
			today: todayCount,
			limit: this.options.dailyLimit,
			remaining: Math.max(0, this.options.dailyLimit - todayCount),
			nextReset: nextCycleStart(now, this.options.resetHour),
			month: this.store.countInRange(month.start, month.end),
			year: this.store.countInRange(year.start, year.end),
			allTime: this.store.countInRange(allTime.start, allTime.end),
			topUsersThisMonth: this.store.topUsersThisMonth(SUMMARY_TOP_USERS),
		};
	}

	/**
	 * Report for the current month, or for the most recent occurrence of
	 * `requestedMonth` (1-12).
	 *
	 * @throws {ValidationError} when `requestedMonth` cannot be resolved
	 */
	monthReport(requestedMonth?: number): MonthReport {
		const now = this.now();
		const { month, year } =
			requestedMonth === undefined
				? { month: now.month, year: now.year }
				: resolveMonth(requestedMonth, now);
		const { start, end } = monthWindow(month, year, this.options.timezone);

		return {
			month,
			year,
			total: this.store.countInRange(start, end),
			ranking: this.store.usersRanked(start, end),
			participants: this.store.distinctUsers(start, end),
			days: this.store.dayOfMonthHistogram(month, year),
		};
	}

	yearReport(): YearReport {
		const now = this.now();
		const { start, end } = yearWindow(now.year, this.options.timezone);
		return {
			year: now.year,
			total: this.store.countInRange(start, end),
			ranking: this.store.usersRanked(start, end),
			months: this.store.monthHistogram(now.year),
		};
	}

	allTimeReport(): AllTimeReport {
		const { start, end } = allTimeWindow(this.now());
		return {
			total: this.store.countInRange(start, end),
			ranking: this.store.usersRanked(start, end),
			years: this.store.yearHistogram(),
		};
	}

	hourReport(): HourReport {
		const { start, end } = allTimeWindow(this.now());
		const hours = this.store.hourHistogram(start, end);
		return { total: sumCounts(hours), hours };
	}

	weekdayReport(): WeekdayReport {
		const { start, end } = allTimeWindow(this.now());
		const weekdays = this.store.weekdayHistogram(start, end);
		return { total: sumCounts(weekdays), weekdays };
	}
}

function sumCounts(buckets: ReadonlyArray<{ count: number }>): number {
	return buckets.reduce((sum, bucket) => sum + bucket.count, 0);
}
