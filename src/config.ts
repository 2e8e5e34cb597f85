/**
 * Configuration module.
 * Loads environment variables and builds the immutable configuration value
 * that is handed to the store, the policy engine and the command layer.
 *
 * @module config
 */

import * as dotenv from "dotenv";
import { IANAZone } from "luxon";
import { type CommandName, isCommandName } from "./types";
import { ConfigError } from "./utils/errors";
import { logger } from "./utils/logger";

dotenv.config();

/**
 * Bot settings. Built once at startup by {@link loadConfig}; frozen.
 */
export interface BotConfig {
	/** Telegram bot API token from BotFather */
	readonly botToken: string;

	/** Group chat whose commands are served; every other chat is ignored */
	readonly sourceChatId: number;

	/** Channel the posts are published to */
	readonly channelId: number;

	/** Static administrator allowlist */
	readonly adminIds: readonly number[];

	/** Successful publishes allowed per cycle */
	readonly dailyLimit: number;

	/** Hour (0-23, local) at which a new cycle starts */
	readonly resetHour: number;

	/** IANA time zone for cycle boundaries, calendars and persisted wall-clock text */
	readonly timezone: string;

	/** Minimum minutes between any two successful publishes (global) */
	readonly cooldownMinutes: number;

	/** File path to SQLite database */
	readonly databasePath: string;

	/** Logging level (error, warn, info, debug) */
	readonly logLevel: string;

	/** Run check, delivery and recording of a publish under one in-process lock */
	readonly serializePublishes: boolean;

	/** Commands restricted to {@link BotConfig.adminIds} */
	readonly adminOnlyCommands: readonly CommandName[];
}

export type Env = Record<string, string | undefined>;

const DEFAULT_ADMIN_ONLY: readonly CommandName[] = [
	"stats",
	"reset",
	"ban",
	"unban",
];

function parseIntOr(raw: string | undefined, fallback: number): number {
	if (raw === undefined || raw.trim() === "") return fallback;
	return parseInt(raw.trim(), 10);
}

function parseIdList(raw: string | undefined): number[] {
	return (raw || "")
		.split(",")
		.map((id) => parseInt(id.trim(), 10))
		.filter((id) => !Number.isNaN(id));
}

function parseCommandList(raw: string | undefined): CommandName[] {
	if (raw === undefined) return [...DEFAULT_ADMIN_ONLY];
	const names = raw
		.split(",")
		.map((name) => name.trim().toLowerCase())
		.filter((name) => name.length > 0);

	const commands: CommandName[] = [];
	for (const name of names) {
		if (!isCommandName(name)) {
			throw new ConfigError(
				`ADMIN_ONLY_COMMANDS contains unknown command "${name}"`,
				"adminOnlyCommands",
			);
		}
		commands.push(name);
	}
	return commands;
}

/**
 * Builds the configuration from an environment map (process.env by default).
 * Falls back to default values where appropriate; call {@link validateConfig}
 * before using the result.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * validateConfig(config);
 * ```
 */
export function loadConfig(env: Env = process.env): BotConfig {
	return Object.freeze({
		botToken: env.BOT_TOKEN || "",
		sourceChatId: parseIntOr(env.GROUP_ID, 0),
		channelId: parseIntOr(env.CHANNEL_ID, 0),
		adminIds: Object.freeze(parseIdList(env.ADMINS)),
		dailyLimit: parseIntOr(env.DAILY_LIMIT, 5),
		resetHour: parseIntOr(env.RESET_HOUR, 4),
		timezone: env.TIMEZONE || "Europe/Moscow",
		cooldownMinutes: parseIntOr(env.COOLDOWN_MINUTES, 30),
		databasePath: env.DB_PATH || "./data/forwards.db",
		logLevel: env.LOG_LEVEL || "info",
		serializePublishes: (env.SERIALIZE_PUBLISHES || "").toLowerCase() === "true",
		adminOnlyCommands: Object.freeze(parseCommandList(env.ADMIN_ONLY_COMMANDS)),
	});
}

/**
 * Validates that all required configuration values are present and valid.
 * Called at bot startup before anything touches the database.
 *
 * @throws {ConfigError} naming the first invalid field
 */
export function validateConfig(config: BotConfig): void {
	if (!config.botToken) {
		throw new ConfigError(
			"BOT_TOKEN is required in environment variables",
			"botToken",
		);
	}
	if (!config.sourceChatId) {
		throw new ConfigError(
			"GROUP_ID is required in environment variables",
			"sourceChatId",
		);
	}
	if (!config.channelId) {
		throw new ConfigError(
			"CHANNEL_ID is required in environment variables",
			"channelId",
		);
	}
	if (!Number.isInteger(config.dailyLimit) || config.dailyLimit < 1) {
		throw new ConfigError(
			"DAILY_LIMIT must be a positive integer",
			"dailyLimit",
		);
	}
	if (
		!Number.isInteger(config.resetHour) ||
		config.resetHour < 0 ||
		config.resetHour > 23
	) {
		throw new ConfigError(
			"RESET_HOUR must be an integer between 0 and 23",
			"resetHour",
		);
	}
	if (!IANAZone.isValidZone(config.timezone)) {
		throw new ConfigError(
			`TIMEZONE "${config.timezone}" is not a valid IANA time zone`,
			"timezone",
		);
	}
	if (!Number.isInteger(config.cooldownMinutes) || config.cooldownMinutes < 0) {
		throw new ConfigError(
			"COOLDOWN_MINUTES must be a non-negative integer",
			"cooldownMinutes",
		);
	}

	if (config.adminIds.length === 0) {
		logger.warn(
			"ADMINS is empty - admin-only commands will be unavailable to everyone",
		);
	}
}

export function isAdmin(config: BotConfig, userId: number): boolean {
	return config.adminIds.includes(userId);
}
