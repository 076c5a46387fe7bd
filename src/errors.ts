export class ScraperError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Bad setup: empty token pool, invalid config value, unsafe cache key. */
export class ConfigurationError extends ScraperError {}

/** A non-2xx status the dispatcher has no retry or soft-failure policy for. */
export class HttpStatusError extends ScraperError {
	readonly status: number;
	readonly endpoint: string;
	readonly responseText: string;

	constructor(status: number, endpoint: string, responseText: string) {
		super(`GitHub API request failed (${status}) for ${endpoint}`);
		this.status = status;
		this.endpoint = endpoint;
		this.responseText = responseText;
	}
}

/** Timeouts, connection errors or 5xx responses outnumbered the credential pool. */
export class FatalNetworkError extends ScraperError {
	readonly attempts: number;

	constructor(message: string, attempts: number, cause?: unknown) {
		super(message, { cause });
		this.attempts = attempts;
	}
}

export class RequestTimeoutError extends ScraperError {
	readonly timeoutMs: number;

	constructor(url: string, timeoutMs: number) {
		super(`Request to ${url} timed out after ${timeoutMs}ms`);
		this.timeoutMs = timeoutMs;
	}
}

export class ConnectionError extends ScraperError {}

export class DispatchCancelledError extends ScraperError {
	constructor(cause?: unknown) {
		super("Request was cancelled", { cause });
	}
}

export class DiffParseError extends ScraperError {}

export function isTransportError(
	err: unknown
): err is RequestTimeoutError | ConnectionError {
	return err instanceof RequestTimeoutError || err instanceof ConnectionError;
}
