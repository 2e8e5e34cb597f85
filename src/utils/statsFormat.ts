/**
 * Text and chart series for the statistics command.
 *
 * @module utils/statsFormat
 */

import type { ChartSeries } from "../services/chartRenderer";
import type {
	AllTimeReport,
	DailySummary,
	HourReport,
	MonthReport,
	WeekdayReport,
	YearReport,
} from "../services/statsService";
import type { UserCount } from "../types";
import { formatDateTime } from "./formatting";

export const MONTH_NAMES = [
	"January",
	"February",
	"March",
	"April",
	"May",
	"June",
	"July",
	"August",
	"September",
	"October",
	"November",
	"December",
] as const;

export const MONTH_SHORT = MONTH_NAMES.map((name) => name.slice(0, 3));

/** Monday first, matching weekday bucket indexes */
export const WEEKDAY_NAMES = [
	"Monday",
	"Tuesday",
	"Wednesday",
	"Thursday",
	"Friday",
	"Saturday",
	"Sunday",
] as const;

export function monthName(month: number): string {
	return MONTH_NAMES[month - 1] ?? `Month ${month}`;
}

function renderRanking(ranking: UserCount[]): string[] {
	if (ranking.length === 0) {
		return ["No posts yet."];
	}
	return ranking.map(
		(entry, index) => `${index + 1}. ${entry.username}: ${entry.count}`,
	);
}

export function renderSummary(summary: DailySummary): string {
	return [
		"📊 Forward statistics",
		"",
		`Today: ${summary.today}/${summary.limit} (remaining: ${summary.remaining})`,
		`Next reset: ${formatDateTime(summary.nextReset)}`,
		"",
		`This month: ${summary.month}`,
		`This year: ${summary.year}`,
		`All time: ${summary.allTime}`,
		"",
		"Top this month:",
		...renderRanking(summary.topUsersThisMonth),
	].join("\n");
}

export function renderMonthReport(report: MonthReport): string {
	return [
		`📅 ${monthName(report.month)} ${report.year}`,
		"",
		`Total: ${report.total}`,
		`Participants: ${report.participants.length}`,
		"",
		...renderRanking(report.ranking),
	].join("\n");
}

export function renderYearReport(report: YearReport): string {
	const busiest = report.months.reduce(
		(best, bucket) => (bucket.count > best.count ? bucket : best),
		{ month: 0, count: 0 },
	);
	const lines = [`📆 ${report.year}`, "", `Total: ${report.total}`];
	if (busiest.count > 0) {
		lines.push(`Busiest month: ${monthName(busiest.month)} (${busiest.count})`);
	}
	lines.push("", ...renderRanking(report.ranking));
	return lines.join("\n");
}

export function renderAllTimeReport(report: AllTimeReport): string {
	const lines = ["🗂 All time", "", `Total: ${report.total}`];
	if (report.years.length > 0) {
		lines.push("", "By year:");
		for (const bucket of report.years) {
			lines.push(`${bucket.year}: ${bucket.count}`);
		}
	}
	lines.push("", ...renderRanking(report.ranking));
	return lines.join("\n");
}

export function renderHourReport(report: HourReport): string {
	return [
		"🕐 Activity by hour (all time)",
		"",
		...report.hours.map(
			(bucket) => `${String(bucket.hour).padStart(2, "0")}:00  ${bucket.count}`,
		),
		"",
		`Total: ${report.total}`,
	].join("\n");
}

export function renderWeekdayReport(report: WeekdayReport): string {
	return [
		"📅 Activity by weekday (all time)",
		"",
		...report.weekdays.map(
			(bucket) => `${WEEKDAY_NAMES[bucket.weekday]}: ${bucket.count}`,
		),
		"",
		`Total: ${report.total}`,
	].join("\n");
}

export function monthChart(report: MonthReport): ChartSeries {
	return {
		title: `Activity by day: ${monthName(report.month)} ${report.year}`,
		labels: report.days.map((bucket) => String(bucket.day)),
		values: report.days.map((bucket) => bucket.count),
	};
}

export function yearChart(report: YearReport): ChartSeries {
	return {
		title: `Activity by month: ${report.year}`,
		labels: [...MONTH_SHORT],
		values: report.months.map((bucket) => bucket.count),
	};
}

export function allTimeChart(report: AllTimeReport): ChartSeries {
	return {
		title: "Activity by year",
		labels: report.years.map((bucket) => String(bucket.year)),
		values: report.years.map((bucket) => bucket.count),
	};
}

export function hourChart(report: HourReport): ChartSeries {
	return {
		title: "Activity by hour (all time)",
		labels: report.hours.map((bucket) => String(bucket.hour).padStart(2, "0")),
		values: report.hours.map((bucket) => bucket.count),
	};
}

export function weekdayChart(report: WeekdayReport): ChartSeries {
	return {
		title: "Activity by weekday (all time)",
		labels: WEEKDAY_NAMES.map((name) => name.slice(0, 3)),
		values: report.weekdays.map((bucket) => bucket.count),
	};
}
