export type CrossbotErrorCode =
	| "CONFIGURATION_ERROR"
	| "DATA_UNAVAILABLE"
	| "INVALID_STATE_TRANSITION";

export abstract class CrossbotError extends Error {
	abstract readonly code: CrossbotErrorCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Invalid strategy or risk parameters. Thrown before anything starts. */
export class ConfigurationError extends CrossbotError {
	readonly code = "CONFIGURATION_ERROR";
}

/** A price source could not deliver data. */
export class DataUnavailableError extends CrossbotError {
	readonly code = "DATA_UNAVAILABLE";
}

export class InvalidStateTransitionError extends CrossbotError {
	readonly code = "INVALID_STATE_TRANSITION";

	constructor(
		readonly from: string,
		readonly attempted: "start" | "stop"
	) {
		super(
			attempted === "start" ? "Bot already running" : "Bot not running"
		);
	}
}

export const isCrossbotError = (value: unknown): value is CrossbotError =>
	value instanceof CrossbotError;
