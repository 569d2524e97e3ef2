import { Ok, type Result } from "@tapline/core";
import { QuickbaseClient, type QuickbaseClientOptions, type QuickbaseError } from "./client";
import type { QuickbaseConfig } from "./types";

/**
 * Test a Quickbase connection by listing the app's tables.
 *
 * Creates a `QuickbaseClient` internally and calls `GET /v1/tables`, the
 * cheapest request that checks the token against the app.
 */
export async function testConnection(
	config: QuickbaseConfig,
	options: QuickbaseClientOptions = {},
): Promise<Result<void, QuickbaseError>> {
	const client = new QuickbaseClient(config, options);
	const result = await client.listTables();
	if (!result.ok) return result;
	return Ok(undefined);
}
