/** Log severity levels. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Injectable logging callback.
 *
 * Library code calls this instead of writing to `console` directly,
 * allowing consumers to route log output however they wish.
 */
export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

/** Ordered from most to least verbose. */
export const LOG_LEVELS: ReadonlyArray<LogLevel> = ["debug", "info", "warn", "error"];

/** Type guard for user-supplied level names (e.g. the `--log-level` flag). */
export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as ReadonlyArray<string>).includes(value);
}

/** Render a log line. Metadata is appended as a single JSON object. */
export function formatLogLine(
	level: LogLevel,
	message: string,
	meta?: Record<string, unknown>,
): string {
	const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
	return `[tapline] ${level.toUpperCase()} ${message}${suffix}`;
}

/**
 * Default logger. Writes to stderr for every level: stdout is reserved
 * for the SCHEMA/RECORD/STATE message stream.
 */
export const defaultLogger: Logger = (level, message, meta) =>
	console.error(formatLogLine(level, message, meta));

/** Wrap a logger so that entries below `minLevel` are dropped. */
export function createLogger(minLevel: LogLevel, sink: Logger = defaultLogger): Logger {
	const threshold = LOG_LEVELS.indexOf(minLevel);
	return (level, message, meta) => {
		if (LOG_LEVELS.indexOf(level) < threshold) return;
		sink(level, message, meta);
	};
}

/** Logger that discards everything. */
export const silentLogger: Logger = () => {};
