import { type QuickbaseConfig, testConnection } from "@tapline/connector-quickbase";
import type { Logger } from "@tapline/core";
import { print, printError } from "../output";

/**
 * `tapline --test`: Check that the token can read the configured app.
 */
export async function checkConnection(config: QuickbaseConfig, logger: Logger): Promise<number> {
	const result = await testConnection(config, { logger });
	if (!result.ok) {
		printError(`Connection test failed: ${result.error.message}`);
		return 1;
	}

	print(`Connected to app ${config.appId} on ${config.hostname}`);
	return 0;
}
