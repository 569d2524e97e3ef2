/** Base error class for all Tapline errors */
export class TaplineError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/**
 * The remote service could not be reached or rejected our credentials.
 *
 * Connection errors abort the whole sync run. Connector packages extend this
 * class for their own auth and transport failures so the orchestrator can
 * classify them with {@link isConnectionFatal}.
 */
export class ConnectionError extends TaplineError {
	constructor(message: string, code = "CONNECTION_FAILED", cause?: Error) {
		super(message, code, cause);
	}
}

/** A single stream's pass failed; other streams keep running */
export class StreamError extends TaplineError {
	constructor(message: string, cause?: Error) {
		super(message, "STREAM_FAILED", cause);
	}
}

/** Remote schema could not be mapped (missing cursor field, ambiguous keys) */
export class SchemaError extends TaplineError {
	constructor(message: string, cause?: Error) {
		super(message, "SCHEMA_MISMATCH", cause);
	}
}

/** Connector configuration failed validation */
export class ConfigValidationError extends TaplineError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_VALIDATION", cause);
	}
}

/** Bookmark state document is malformed */
export class StateError extends TaplineError {
	constructor(message: string, cause?: Error) {
		super(message, "STATE_INVALID", cause);
	}
}

/** Catalog document is malformed or selects an impossible replication */
export class CatalogError extends TaplineError {
	constructor(message: string, cause?: Error) {
		super(message, "CATALOG_INVALID", cause);
	}
}

/** Whether an error must abort the entire run rather than a single stream. */
export function isConnectionFatal(err: unknown): err is ConnectionError {
	return err instanceof ConnectionError;
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
