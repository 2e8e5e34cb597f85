/**
 * Statistics command handler.
 * Sends the textual report first; the chart follows when one applies and
 * rendering succeeds. A rendering failure is only logged.
 *
 * @module commands/stats
 */

import type { Context } from "telegraf";
import type { ChartSeries } from "../services/chartRenderer";
import type { StatsService } from "../services/statsService";
import { getCommandArgs } from "../utils/commandHelper";
import { replyWithError } from "../utils/commandErrors";
import { ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
	allTimeChart,
	hourChart,
	monthChart,
	renderAllTimeReport,
	renderHourReport,
	renderMonthReport,
	renderSummary,
	renderWeekdayReport,
	renderYearReport,
	weekdayChart,
	yearChart,
} from "../utils/statsFormat";
import type { CommandDeps, CommandHandler } from "./index";

export type StatsView =
	| { kind: "summary" }
	| { kind: "month"; month?: number }
	| { kind: "year" }
	| { kind: "all" }
	| { kind: "hours" }
	| { kind: "weekdays" };

export const STATS_USAGE =
	"Usage: /stats [month | 1-12 | year | all | hours | weekdays]";

/**
 * Maps the optional /stats argument to a view.
 *
 * @throws {ValidationError} for anything unrecognised
 */
export function parseStatsArgument(arg?: string): StatsView {
	if (arg === undefined) return { kind: "summary" };

	const value = arg.trim().toLowerCase();
	if (/^\d{1,2}$/.test(value)) {
		return { kind: "month", month: parseInt(value, 10) };
	}

	switch (value) {
		case "month":
			return { kind: "month" };
		case "year":
			return { kind: "year" };
		case "all":
			return { kind: "all" };
		case "hours":
			return { kind: "hours" };
		case "weekdays":
			return { kind: "weekdays" };
		default:
			throw new ValidationError(STATS_USAGE);
	}
}

export interface StatsResponse {
	text: string;
	chart?: ChartSeries;
}

export function buildStatsResponse(stats: StatsService, view: StatsView): StatsResponse {
	switch (view.kind) {
		case "summary":
			return { text: renderSummary(stats.summary()) };
		case "month": {
			const report = stats.monthReport(view.month);
			return { text: renderMonthReport(report), chart: monthChart(report) };
		}
		case "year": {
			const report = stats.yearReport();
			return { text: renderYearReport(report), chart: yearChart(report) };
		}
		case "all": {
			const report = stats.allTimeReport();
			return {
				text: renderAllTimeReport(report),
				chart: report.years.length > 0 ? allTimeChart(report) : undefined,
			};
		}
		case "hours": {
			const report = stats.hourReport();
			return { text: renderHourReport(report), chart: hourChart(report) };
		}
		case "weekdays": {
			const report = stats.weekdayReport();
			return { text: renderWeekdayReport(report), chart: weekdayChart(report) };
		}
	}
}

/**
 * Command: /stats [month | 1-12 | year | all | hours | weekdays]
 *
 * Permission: admin only by default
 *
 * @example
 * User: /stats 3
 * Bot: 📅 March 2026 ... (followed by a chart of activity per day)
 */
export function createStatsHandler(deps: CommandDeps): CommandHandler {
	return async (ctx: Context) => {
		let response: StatsResponse;
		try {
			const view = parseStatsArgument(getCommandArgs(ctx)[0]);
			response = buildStatsResponse(deps.stats, view);
			await ctx.reply(response.text);
		} catch (error) {
			await replyWithError(ctx, error, "stats");
			return;
		}

		if (!response.chart) return;

		try {
			const image = await deps.charts.render(response.chart);
			await ctx.replyWithPhoto({ source: image });
		} catch (error) {
			logger.warn("Chart rendering failed, sent text only", {
				title: response.chart.title,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	};
}
