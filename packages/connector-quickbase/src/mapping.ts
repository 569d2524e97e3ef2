// ---------------------------------------------------------------------------
// Quickbase Record → Flat Row Mapping
// ---------------------------------------------------------------------------

import { type Coerce, mapFieldType } from "./type-mapper";
import type { FieldCatalogEntry, QuickbaseRecord } from "./types";

/** Name and coercion for each field id of a table. */
export type FieldLookup = Map<number, { name: string; coerce: Coerce }>;

/** Build the lookup used by {@link mapRecord} from a table's field catalog. */
export function buildFieldLookup(entries: FieldCatalogEntry[]): FieldLookup {
	const lookup: FieldLookup = new Map();
	for (const entry of entries) {
		lookup.set(entry.id, { name: entry.name, coerce: mapFieldType(entry.fieldType).coerce });
	}
	return lookup;
}

/**
 * Map a Quickbase record (`{ "6": { value } }`) to a row keyed by property
 * name, coercing every value. Field ids missing from the lookup are dropped.
 */
export function mapRecord(record: QuickbaseRecord, lookup: FieldLookup): Record<string, unknown> {
	const row: Record<string, unknown> = {};
	for (const [fieldId, cell] of Object.entries(record)) {
		const field = lookup.get(Number(fieldId));
		if (!field) continue;
		row[field.name] = field.coerce(cell?.value);
	}
	return row;
}
