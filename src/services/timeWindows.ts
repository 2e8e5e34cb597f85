/**
 * Calendar arithmetic shared by the quota check, the daily reset and the
 * statistics aggregator. All windows are half-open `[start, end)` and live in
 * the configured zone.
 *
 * @module services/timeWindows
 */

import { DateTime } from "luxon";
import { ValidationError } from "../utils/errors";

export interface TimeWindow {
	start: DateTime;
	end: DateTime;
}

/** Synthetic lower bound used by the "all time" window */
export const EPOCH_YEAR = 2000;

/**
 * Start of the cycle containing `now`: today at `resetHour:00`, or yesterday
 * at `resetHour:00` while the clock is still before the reset hour.
 *
 * @example
 * ```typescript
 * // resetHour 4, now 03:59 on the 10th -> 04:00 on the 9th
 * cycleStart(now, 4);
 * ```
 */
export function cycleStart(now: DateTime, resetHour: number): DateTime {
	let start = now.set({ hour: resetHour, minute: 0, second: 0, millisecond: 0 });
	if (now.hour < resetHour) {
		start = start.minus({ days: 1 });
	}
	return start;
}

export function nextCycleStart(now: DateTime, resetHour: number): DateTime {
	return cycleStart(now, resetHour).plus({ hours: 24 });
}

/** The statistics "today", identical to the quota cycle */
export function todayWindow(now: DateTime, resetHour: number): TimeWindow {
	const start = cycleStart(now, resetHour);
	return { start, end: start.plus({ hours: 24 }) };
}

export function monthWindow(month: number, year: number, zone: string): TimeWindow {
	const start = DateTime.fromObject({ year, month, day: 1 }, { zone });
	return { start, end: start.plus({ months: 1 }) };
}

export function yearWindow(year: number, zone: string): TimeWindow {
	const start = DateTime.fromObject({ year, month: 1, day: 1 }, { zone });
	return { start, end: start.plus({ years: 1 }) };
}

/** From {@link EPOCH_YEAR} up to and including `now` */
export function allTimeWindow(now: DateTime): TimeWindow {
	const start = DateTime.fromObject(
		{ year: EPOCH_YEAR, month: 1, day: 1 },
		{ zone: now.zone },
	);
	return { start, end: now.plus({ milliseconds: 1 }) };
}

export function daysInMonth(month: number, year: number): number {
	const days = DateTime.fromObject({ year, month, day: 1 }).daysInMonth;
	if (days === undefined) {
		throw new ValidationError(`Invalid month ${month}/${year}`);
	}
	return days;
}

export interface ResolvedMonth {
	month: number;
	year: number;
}

/**
 * Resolves a month number to its most recent occurrence that is not in the
 * future. A month later than the current one means last year's.
 *
 * @throws {ValidationError} for numbers outside 1-12, or an occurrence more than
 * 11 months back or in the future
 */
export function resolveMonth(month: number, now: DateTime): ResolvedMonth {
	if (!Number.isInteger(month) || month < 1 || month > 12) {
		throw new ValidationError("Month must be a number from 1 to 12.", {
			month,
		});
	}

	const year = month > now.month ? now.year - 1 : now.year;
	const monthsBack = (now.year - year) * 12 + (now.month - month);
	if (monthsBack < 0 || monthsBack > 11) {
		throw new ValidationError(
			"Only the last 12 months are available for monthly statistics.",
			{ month, year },
		);
	}

	return { month, year };
}
