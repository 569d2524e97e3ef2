import { createLogger, defaultLogger, isLogLevel, LOG_LEVELS, type Logger } from "@tapline/core";
import { flagValue, hasFlag, parseArgs } from "./args";
import { discover } from "./commands/discover";
import { sync } from "./commands/sync";
import { checkConnection } from "./commands/test-connection";
import { loadConfigFile } from "./files";
import { print, printError } from "./output";

export const VERSION = "0.1.0";

export const HELP = `tapline: extract Quickbase tables as SCHEMA/RECORD/STATE messages

Usage: tapline --config <file> [mode] [options]

Modes:
  (default)                Sync the selected streams to stdout
  --discover               Write the catalog of the app's tables to stdout
  --test                   Check that the credentials can read the app

Options:
  --config <file>          Connector config (hostname, appId, userToken, startDate, ...)
  --catalog <file>         Catalog selecting streams and fields (default: discover all)
  --state <file>           State from a previous run (bookmarks or a STATE message)
  --log-level <level>      One of debug, info, warn, error (default: info)

General:
  --help, -h               Show this help message
  --version, -v            Show version

The user token may be given in the QB_USER_TOKEN environment variable instead
of the config file.

Examples:
  tapline --config config.json --discover > catalog.json
  tapline --config config.json --catalog catalog.json --state state.json
`;

/** Process-level collaborators, replaced in tests. */
export interface CliContext {
	env?: Record<string, string | undefined>;
	/** Where log lines go (default: stderr). */
	logSink?: Logger;
}

/** Run the CLI and return its exit code. */
export async function main(argv: string[], context: CliContext = {}): Promise<number> {
	const { flags, positional } = parseArgs(argv);

	if (hasFlag(flags, "version", "v")) {
		print(VERSION);
		return 0;
	}

	if (hasFlag(flags, "help", "h")) {
		print(HELP);
		return 0;
	}

	if (positional.length > 0) {
		printError(`Unexpected argument: ${positional[0]}\nRun 'tapline --help' for usage.`);
		return 1;
	}

	const level = flagValue(flags, "log-level") ?? "info";
	if (!isLogLevel(level)) {
		printError(`--log-level must be one of: ${LOG_LEVELS.join(", ")}`);
		return 1;
	}
	const logger = createLogger(level, context.logSink ?? defaultLogger);

	const configPath = flagValue(flags, "config");
	if (configPath === undefined) {
		printError("--config is required\nRun 'tapline --help' for usage.");
		return 1;
	}

	const isDiscover = hasFlag(flags, "discover");
	const isTest = hasFlag(flags, "test");
	if (isDiscover && isTest) {
		printError("--discover and --test cannot be combined");
		return 1;
	}

	const config = loadConfigFile(configPath, context.env ?? process.env);
	if (!config.ok) {
		printError(config.error.message);
		return 1;
	}

	if (isDiscover) return discover(config.value, logger);
	if (isTest) return checkConnection(config.value, logger);

	return sync({
		config: config.value,
		catalogPath: flagValue(flags, "catalog"),
		statePath: flagValue(flags, "state"),
		logger,
	});
}
