import { CatalogError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import {
	REPLICATION_METHODS,
	type Replication,
	type ReplicationMethod,
	type StreamDefinition,
} from "../stream/types";
import type { Catalog, CatalogEntry } from "./types";

/** Metadata of the stream itself (`breadcrumb: []`). */
export function streamMetadata(entry: CatalogEntry): Record<string, unknown> {
	return entry.metadata.find((m) => m.breadcrumb.length === 0)?.metadata ?? {};
}

/** Metadata of one property (`breadcrumb: ["properties", name]`). */
export function fieldMetadata(entry: CatalogEntry, field: string): Record<string, unknown> {
	const match = entry.metadata.find(
		(m) =>
			m.breadcrumb.length === 2 && m.breadcrumb[0] === "properties" && m.breadcrumb[1] === field,
	);
	return match?.metadata ?? {};
}

/** Whether a field is selected, honouring `inclusion` and `selected-by-default`. */
export function isFieldSelected(metadata: Record<string, unknown>): boolean {
	if (metadata.inclusion === "automatic") return true;
	if (metadata.inclusion === "unsupported") return false;
	if (typeof metadata.selected === "boolean") return metadata.selected;
	return metadata["selected-by-default"] === true;
}

/**
 * Turn the selected catalog entries into stream definitions.
 *
 * Streams without `selected: true` in their stream metadata are skipped.
 * The replication method defaults to INCREMENTAL when a replication key is
 * present and FULL_TABLE otherwise.
 */
export function resolveStreamDefinitions(
	catalog: Catalog,
): Result<StreamDefinition[], CatalogError> {
	const definitions: StreamDefinition[] = [];

	for (const entry of catalog.streams) {
		const root = streamMetadata(entry);
		if (root.selected !== true) continue;

		const replication = resolveReplication(entry.stream, root);
		if (!replication.ok) return replication;

		const selectedFields = Object.keys(entry.schema.properties).filter((field) =>
			isFieldSelected(fieldMetadata(entry, field)),
		);

		const tableKeys = root["table-key-properties"];
		const keyProperties =
			entry.key_properties.length > 0
				? entry.key_properties
				: Array.isArray(tableKeys)
					? tableKeys.filter((key): key is string => typeof key === "string")
					: [];

		definitions.push({
			streamId: entry.tap_stream_id,
			name: entry.stream,
			selectedFields,
			keyProperties,
			replication: replication.value,
		});
	}

	return Ok(definitions);
}

function resolveReplication(
	stream: string,
	root: Record<string, unknown>,
): Result<Replication, CatalogError> {
	const key = root["replication-key"];
	const rawMethod =
		root["replication-method"] ?? (typeof key === "string" ? "INCREMENTAL" : "FULL_TABLE");

	if (!isReplicationMethod(rawMethod)) {
		return Err(
			new CatalogError(
				`Stream "${stream}" replication-method must be one of: ${REPLICATION_METHODS.join(", ")}`,
			),
		);
	}

	if (rawMethod === "FULL_TABLE") return Ok({ method: "FULL_TABLE" });

	if (typeof key !== "string" || key.length === 0) {
		return Err(new CatalogError(`Stream "${stream}" is INCREMENTAL but has no replication-key`));
	}
	return Ok({ method: "INCREMENTAL", cursorField: key });
}

function isReplicationMethod(value: unknown): value is ReplicationMethod {
	return typeof value === "string" && (REPLICATION_METHODS as readonly string[]).includes(value);
}
