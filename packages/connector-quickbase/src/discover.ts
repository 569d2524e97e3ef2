// ---------------------------------------------------------------------------
// Discovery: Quickbase app tables → catalog
// ---------------------------------------------------------------------------

import {
	buildCatalogEntry,
	type Catalog,
	type CatalogEntry,
	type CatalogField,
	defaultLogger,
	isConnectionFatal,
	type Logger,
	Ok,
	type Replication,
	type Result,
	type TaplineError,
} from "@tapline/core";
import type { QuickbaseQueryService } from "./client";
import { claimUniqueName, normalizeName } from "./normalize";
import { findKeyProperties, hasReplicationKey, REPLICATION_KEY } from "./schemas";
import { mapFieldType } from "./type-mapper";
import type { FieldCatalogEntry, QuickbaseConfig, QuickbaseTable } from "./types";

/**
 * Build a catalog of the app's tables.
 *
 * Tables with a `date_modified` field replicate incrementally on it; the
 * rest are full-table. A table whose fields cannot be read, or that has
 * more than one record-id field, is logged and left out. Connection errors
 * abort discovery.
 */
export async function discoverCatalog(
	client: QuickbaseQueryService,
	config: Pick<QuickbaseConfig, "tables">,
	logger: Logger = defaultLogger,
): Promise<Result<Catalog, TaplineError>> {
	const tablesResult = await client.listTables();
	if (!tablesResult.ok) return tablesResult;

	const tables = filterTables(tablesResult.value, config.tables, logger);
	const streams: CatalogEntry[] = [];
	const names = new Set<string>();

	for (const table of tables) {
		const fieldsResult = await client.fetchFieldCatalog(table.id);
		if (!fieldsResult.ok) {
			const error: Error = fieldsResult.error;
			if (isConnectionFatal(error)) return fieldsResult;
			logger("warn", `Skipping table ${table.id} (${table.name}): ${error.message}`);
			continue;
		}

		const keys = findKeyProperties(table.id, fieldsResult.value);
		if (!keys.ok) {
			logger("warn", `Skipping table ${table.id} (${table.name}): ${keys.error.message}`);
			continue;
		}

		const name = claimUniqueName(normalizeName(table.name) || table.id, table.id, names);

		streams.push(buildTableEntry(table, name, fieldsResult.value, keys.value));
	}

	logger("info", `Discovered ${streams.length} stream(s)`);
	return Ok({ streams });
}

function buildTableEntry(
	table: QuickbaseTable,
	name: string,
	entries: FieldCatalogEntry[],
	keyProperties: string[],
): CatalogEntry {
	const replication: Replication = hasReplicationKey(entries)
		? { method: "INCREMENTAL", cursorField: REPLICATION_KEY }
		: { method: "FULL_TABLE" };
	const automatic = new Set(keyProperties);
	if (replication.method === "INCREMENTAL") automatic.add(replication.cursorField);

	const fields: CatalogField[] = entries.map((entry) => ({
		name: entry.name,
		schema: mapFieldType(entry.fieldType).schema,
		inclusion: automatic.has(entry.name) ? "automatic" : "available",
		extra: { "quickbase-field-id": entry.id, "quickbase-field-type": entry.fieldType },
	}));

	return buildCatalogEntry({ streamId: table.id, name, fields, keyProperties, replication });
}

/** Keep only the configured table names, warning about names the app does not have. */
function filterTables(
	tables: QuickbaseTable[],
	wanted: string[] | undefined,
	logger: Logger,
): QuickbaseTable[] {
	if (!wanted || wanted.length === 0) return tables;

	const present = new Set(tables.map((t) => t.name));
	for (const name of wanted) {
		if (!present.has(name)) {
			logger("warn", `Configured table "${name}" not found in app`);
		}
	}
	const include = new Set(wanted);
	return tables.filter((t) => include.has(t.name));
}
