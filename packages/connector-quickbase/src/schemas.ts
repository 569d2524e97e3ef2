// ---------------------------------------------------------------------------
// Quickbase Field Catalog → Stream Schema
// ---------------------------------------------------------------------------

import { Err, type JsonSchema, Ok, type Result, SchemaError } from "@tapline/core";
import { claimUniqueName, normalizeName } from "./normalize";
import { mapFieldType } from "./type-mapper";
import type { FieldCatalogEntry, QuickbaseField } from "./types";

/** Property name of the standard "Date Modified" field used as the replication key. */
export const REPLICATION_KEY = "date_modified";

/** Field type of the table's record id. */
const RECORD_ID_TYPE = "recordid";

/**
 * Attach a property name to every field.
 *
 * Names are normalised labels. When two labels normalise to the same name,
 * the later field (by id) gets its id appended, repeatedly if the result
 * is also taken: `status`, `status_12`, `status_12_12`.
 */
export function toCatalogEntries(fields: QuickbaseField[]): FieldCatalogEntry[] {
	const taken = new Set<string>();
	const sorted = [...fields].sort((a, b) => a.id - b.id);
	const named = new Map<number, string>();

	for (const field of sorted) {
		const base = normalizeName(field.label) || `field_${field.id}`;
		named.set(field.id, claimUniqueName(base, String(field.id), taken));
	}

	return fields.map((field) => ({
		id: field.id,
		label: field.label,
		name: named.get(field.id) ?? `field_${field.id}`,
		fieldType: field.fieldType,
	}));
}

/** Schema fragment for every field, keyed by property name, in catalog order. */
export function buildFieldSchemas(entries: FieldCatalogEntry[]): Record<string, JsonSchema> {
	const properties: Record<string, JsonSchema> = {};
	for (const entry of entries) {
		properties[entry.name] = mapFieldType(entry.fieldType).schema;
	}
	return properties;
}

/**
 * Primary key of a table: its single `recordid` field.
 *
 * A table without one has no key; more than one is ambiguous.
 */
export function findKeyProperties(
	tableId: string,
	entries: FieldCatalogEntry[],
): Result<string[], SchemaError> {
	const ids = entries.filter((e) => e.fieldType === RECORD_ID_TYPE).map((e) => e.name);
	if (ids.length > 1) {
		return Err(new SchemaError(`In table ${tableId}, found multiple key fields: ${ids.join(", ")}`));
	}
	return Ok(ids);
}

/** Whether the table has the standard modification-date field. */
export function hasReplicationKey(entries: FieldCatalogEntry[]): boolean {
	return entries.some((e) => e.name === REPLICATION_KEY);
}
