/**
 * Error taxonomy shared by the store, the policy engine and the command layer.
 *
 * Policy denials are not errors; they are returned as {@link PublishDecision}
 * values. Everything here is a failure the caller has to render or log.
 *
 * @module utils/errors
 */

export enum ErrorCode {
	VALIDATION = "VALIDATION",
	STORAGE = "STORAGE",
	DELIVERY = "DELIVERY",
	CONFIG = "CONFIG",
}

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly safeMeta: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		safeMeta: Record<string, unknown> = {},
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "AppError";
		this.code = code;
		this.safeMeta = safeMeta;
	}

	toJSON() {
		return {
			code: this.code,
			message: this.message,
			...this.safeMeta,
		};
	}
}

/** Malformed command input. The message is shown to the user as-is. */
export class ValidationError extends AppError {
	constructor(message: string, safeMeta: Record<string, unknown> = {}) {
		super(ErrorCode.VALIDATION, message, safeMeta);
		this.name = "ValidationError";
	}
}

/** A store operation failed and its transaction was rolled back. */
export class StorageError extends AppError {
	constructor(operation: string, cause: unknown) {
		super(
			ErrorCode.STORAGE,
			`Storage operation failed: ${operation}`,
			{ operation },
			{ cause },
		);
		this.name = "StorageError";
	}
}

/** Posting to the channel failed; nothing was recorded. */
export class DeliveryError extends AppError {
	constructor(cause: unknown) {
		super(
			ErrorCode.DELIVERY,
			"Failed to deliver the post to the channel",
			{},
			{ cause },
		);
		this.name = "DeliveryError";
	}
}

export class ConfigError extends AppError {
	constructor(message: string, field: string) {
		super(ErrorCode.CONFIG, message, { field });
		this.name = "ConfigError";
	}
}
