/**
 * Logger utility module.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as fs from "fs";
import * as path from "path";
import * as winston from "winston";

/**
 * Directory path for log files.
 * Defaults to the 'logs' directory under the working directory.
 */
const logDir = process.env.LOG_DIR || path.resolve(process.cwd(), "logs");

if (!fs.existsSync(logDir)) {
	fs.mkdirSync(logDir, { recursive: true });
}

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.errors({ stack: true }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
		if (Object.keys(meta).length > 0 && meta.stack) {
			msg += `\n${meta.stack}`;
		} else if (Object.keys(meta).length > 0) {
			msg += ` ${JSON.stringify(meta)}`;
		}
		return msg;
	}),
);

/**
 * Reads directly from process.env to avoid a circular dependency with the
 * config module, which logs its own warnings.
 */
const getLogLevel = (): string => {
	return process.env.LOG_LEVEL || "info";
};

/**
 * Main Winston logger instance.
 *
 * - Console output with color coding
 * - Combined log file (all levels) with 10MB rotation, 5 files max
 * - Error log file (errors only) with 10MB rotation, 5 files max
 * - Handlers for uncaught exceptions and unhandled rejections
 *
 * @example
 * ```typescript
 * logger.info('Forward recorded', { username: '@alice', kind: 'photo' });
 * logger.error('Channel post failed', { error });
 * ```
 */
export const logger = winston.createLogger({
	level: getLogLevel(),
	format: logFormat,
	transports: [
		new winston.transports.Console({
			format: winston.format.combine(winston.format.colorize(), logFormat),
		}),
		new winston.transports.File({
			filename: path.join(logDir, "combined.log"),
			maxsize: 10485760, // 10MB
			maxFiles: 5,
			tailable: true,
		}),
		new winston.transports.File({
			filename: path.join(logDir, "error.log"),
			level: "error",
			maxsize: 10485760, // 10MB
			maxFiles: 5,
			tailable: true,
		}),
	],
	exceptionHandlers: [
		new winston.transports.File({
			filename: path.join(logDir, "exceptions.log"),
			maxsize: 10485760,
			maxFiles: 3,
		}),
	],
	rejectionHandlers: [
		new winston.transports.File({
			filename: path.join(logDir, "rejections.log"),
			maxsize: 10485760,
			maxFiles: 3,
		}),
	],
});

/**
 * Updates the logger's level at runtime.
 *
 * @param level - The new log level (error, warn, info, debug)
 */
export const updateLogLevel = (level: string): void => {
	logger.level = level;
};

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
	/** Telegram user ID */
	userId?: number;
	/** Display name */
	username?: string;
	/** Operation type */
	operation?: string;
	/** Additional metadata */
	[key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 * Every store mutation goes through one of these methods so the audit trail
 * has a uniform shape.
 */
export class StructuredLogger {
	/**
	 * Logs a user action with context.
	 *
	 * @example
	 * ```typescript
	 * StructuredLogger.logUserAction('Forward recorded', {
	 *   username: '@alice',
	 *   operation: 'record_forward',
	 *   kind: 'photo'
	 * });
	 * ```
	 */
	static logUserAction(action: string, context: LogContext): void {
		logger.info(action, StructuredLogger.sanitizeContext(context));
	}

	/**
	 * Logs a security event (bans, unbans, destructive resets).
	 *
	 * @example
	 * ```typescript
	 * StructuredLogger.logSecurityEvent('User banned', {
	 *   userId: 12345,
	 *   operation: 'ban',
	 *   hours: 24
	 * });
	 * ```
	 */
	static logSecurityEvent(event: string, context: LogContext): void {
		logger.warn(`[SECURITY] ${event}`, StructuredLogger.sanitizeContext(context));
	}

	/**
	 * Logs an error with full context and stack trace.
	 */
	static logError(error: Error | string, context: LogContext = {}): void {
		if (error instanceof Error) {
			logger.error(error.message, {
				...StructuredLogger.sanitizeContext(context),
				stack: error.stack,
			});
		} else {
			logger.error(error, StructuredLogger.sanitizeContext(context));
		}
	}

	/**
	 * Masks fields that must never reach the log files.
	 */
	private static sanitizeContext(context: LogContext): LogContext {
		const sanitized = { ...context };
		const sensitiveKeys = ["token", "botToken", "secret", "password"];

		for (const key of sensitiveKeys) {
			if (key in sanitized) {
				sanitized[key] = "[REDACTED]";
			}
		}

		return sanitized;
	}
}
