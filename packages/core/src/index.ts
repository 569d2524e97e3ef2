export * from "./catalog";
export {
	createLogger,
	defaultLogger,
	formatLogLine,
	isLogLevel,
	LOG_LEVELS,
	type Logger,
	type LogLevel,
	silentLogger,
} from "./logger";
export * from "./messages";
export * from "./result";
export * from "./state";
export * from "./stream";
export * from "./sync";
