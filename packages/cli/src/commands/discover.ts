import {
	discoverCatalog,
	QuickbaseClient,
	type QuickbaseConfig,
} from "@tapline/connector-quickbase";
import type { Logger } from "@tapline/core";
import { printError, printJson } from "../output";

/**
 * `tapline --discover`: Write the app's catalog to stdout.
 */
export async function discover(config: QuickbaseConfig, logger: Logger): Promise<number> {
	const client = new QuickbaseClient(config, { logger });
	const result = await discoverCatalog(client, config, logger);
	if (!result.ok) {
		printError(`Discovery failed: ${result.error.message}`);
		return 1;
	}

	printJson(result.value);
	return 0;
}
