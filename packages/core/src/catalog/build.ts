import type { JsonSchema } from "../messages/types";
import type { Replication } from "../stream/types";
import type { CatalogEntry, Inclusion, MetadataEntry } from "./types";

/** A discovered property, ready to be written into a catalog entry. */
export interface CatalogField {
	name: string;
	schema: JsonSchema;
	inclusion: Inclusion;
	/** Connector-specific metadata (e.g. the remote field id). */
	extra?: Record<string, unknown>;
}

/**
 * Build a catalog entry with standard stream and field metadata.
 *
 * Every supported field is marked selected; key properties and the
 * replication key should be passed with `inclusion: "automatic"`.
 */
export function buildCatalogEntry(options: {
	streamId: string;
	name: string;
	fields: CatalogField[];
	keyProperties: string[];
	replication: Replication;
	selected?: boolean;
}): CatalogEntry {
	const { streamId, name, fields, keyProperties, replication } = options;
	const replicationKey = replication.method === "INCREMENTAL" ? replication.cursorField : undefined;

	const properties: Record<string, JsonSchema> = {};
	for (const field of fields) {
		properties[field.name] = field.schema;
	}

	const streamMetadata: Record<string, unknown> = {
		selected: options.selected ?? true,
		"replication-method": replication.method,
		"table-key-properties": keyProperties,
		"valid-replication-keys": replicationKey ? [replicationKey] : [],
	};
	if (replicationKey) {
		streamMetadata["replication-key"] = replicationKey;
	}

	const metadata: MetadataEntry[] = [{ breadcrumb: [], metadata: streamMetadata }];
	for (const field of fields) {
		metadata.push({
			breadcrumb: ["properties", field.name],
			metadata: {
				...field.extra,
				inclusion: field.inclusion,
				selected: field.inclusion !== "unsupported",
			},
		});
	}

	return {
		tap_stream_id: streamId,
		stream: name,
		schema: { type: "object", properties },
		key_properties: keyProperties,
		metadata,
	};
}
