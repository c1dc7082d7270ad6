export class TaggerError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TaggerError";
	}
}

export class ConfigError extends TaggerError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class CredentialsError extends TaggerError {
	constructor(message: string) {
		super(message);
		this.name = "CredentialsError";
	}
}

export class MetadataError extends TaggerError {
	constructor(message: string) {
		super(message);
		this.name = "MetadataError";
	}
}

/**
 * Raised by vision clients when the API asks us to slow down (HTTP 429).
 * The dispatcher waits a full rate window and retries the same batch.
 */
export class RateLimitError extends TaggerError {
	constructor(message: string) {
		super(message);
		this.name = "RateLimitError";
	}
}

const RATE_LIMIT_PATTERN = /rate_limit_error|rate[ -]?limit|\b429\b|RESOURCE_EXHAUSTED/i;

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function statusOf(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null) return undefined;
	if ("status" in error && typeof error.status === "number") return error.status;
	if ("status_code" in error && typeof error.status_code === "number") {
		return error.status_code;
	}
	return undefined;
}

export function isRateLimitError(error: unknown): boolean {
	if (error instanceof RateLimitError) return true;
	if (statusOf(error) === 429) return true;
	return RATE_LIMIT_PATTERN.test(errorMessage(error));
}
