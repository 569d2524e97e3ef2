import { ConnectionError, TaplineError } from "@tapline/core";

/** HTTP error from the Quickbase API. Fails only the stream that made the request. */
export class QuickbaseApiError extends TaplineError {
	/** HTTP status code returned by Quickbase. */
	readonly statusCode: number;
	/** Raw response body from Quickbase. */
	readonly responseBody: string;

	constructor(statusCode: number, responseBody: string, cause?: Error) {
		super(`Quickbase API error (${statusCode}): ${responseBody}`, "QUICKBASE_API_ERROR", cause);
		this.statusCode = statusCode;
		this.responseBody = responseBody;
	}
}

/** Rate limit error (HTTP 429) after retries were exhausted. */
export class QuickbaseRateLimitError extends TaplineError {
	/** Milliseconds Quickbase asked us to wait. */
	readonly retryAfterMs: number;

	constructor(retryAfterMs: number, cause?: Error) {
		super(`Quickbase rate limited, retry after ${retryAfterMs}ms`, "QUICKBASE_RATE_LIMITED", cause);
		this.retryAfterMs = retryAfterMs;
	}
}

/** Quickbase rejected the user token (HTTP 401/403). Aborts the run. */
export class QuickbaseAuthError extends ConnectionError {
	/** HTTP status code returned by Quickbase. */
	readonly statusCode: number;

	constructor(statusCode: number, responseBody: string, cause?: Error) {
		super(
			`Quickbase authentication failed (${statusCode}): ${responseBody}`,
			"QUICKBASE_AUTH_ERROR",
			cause,
		);
		this.statusCode = statusCode;
	}
}

/** The Quickbase API could not be reached at all. Aborts the run. */
export class QuickbaseConnectionError extends ConnectionError {
	constructor(message: string, cause?: Error) {
		super(message, "QUICKBASE_CONNECTION_ERROR", cause);
	}
}
