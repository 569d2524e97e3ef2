import { type QuickbaseConfig, syncQuickbase } from "@tapline/connector-quickbase";
import { type Catalog, type Logger, type SyncState, WritableMessageSink } from "@tapline/core";
import { loadCatalogFile, loadStateFile } from "../files";
import { printError, warn } from "../output";

/** Options for {@link sync}. */
export interface SyncCommandOptions {
	config: QuickbaseConfig;
	/** `--catalog`; every discovered stream is synced when absent. */
	catalogPath?: string;
	/** `--state`; every stream starts from the start date when absent. */
	statePath?: string;
	logger: Logger;
}

/**
 * `tapline --config c.json [--catalog cat.json] [--state s.json]`: Sync the
 * selected streams, writing SCHEMA, RECORD and STATE messages to stdout.
 *
 * Streams that fail on their own are logged and do not change the exit
 * code; invalid input and connection failures exit with 1.
 */
export async function sync(options: SyncCommandOptions): Promise<number> {
	const { config, logger } = options;

	let catalog: Catalog | undefined;
	if (options.catalogPath) {
		const loaded = loadCatalogFile(options.catalogPath);
		if (!loaded.ok) {
			printError(loaded.error.message);
			return 1;
		}
		catalog = loaded.value;
	}

	let state: SyncState | undefined;
	if (options.statePath) {
		const loaded = loadStateFile(options.statePath);
		if (!loaded.ok) {
			printError(loaded.error.message);
			return 1;
		}
		state = loaded.value;
	}

	const result = await syncQuickbase({
		config,
		catalog,
		state,
		sink: new WritableMessageSink(process.stdout),
		logger,
	});
	if (!result.ok) {
		printError(`Sync aborted: ${result.error.message}`);
		return 1;
	}

	const { failed } = result.value;
	if (failed.length > 0) {
		warn(`${failed.length} stream(s) failed: ${failed.map((f) => f.stream).join(", ")}`);
	}
	return 0;
}
