import type { JsonSchema } from "../messages/types";
import { CatalogError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { Catalog, CatalogEntry, MetadataEntry } from "./types";

/**
 * Validate a raw catalog document (e.g. parsed from `--catalog`).
 *
 * Checks the structure only; selection and replication are checked by
 * {@link import("./resolve").resolveStreamDefinitions}.
 */
export function validateCatalog(input: unknown): Result<Catalog, CatalogError> {
	if (typeof input !== "object" || input === null) {
		return Err(new CatalogError("Catalog must be an object"));
	}

	const obj = input as Record<string, unknown>;
	if (!Array.isArray(obj.streams)) {
		return Err(new CatalogError("Catalog must have a streams array"));
	}

	const streams: CatalogEntry[] = [];
	for (let i = 0; i < obj.streams.length; i++) {
		const entry: unknown = obj.streams[i];
		if (typeof entry !== "object" || entry === null) {
			return Err(new CatalogError(`Catalog stream at index ${i} must be an object`));
		}
		const raw = entry as Record<string, unknown>;

		if (typeof raw.tap_stream_id !== "string" || raw.tap_stream_id.length === 0) {
			return Err(new CatalogError(`Catalog stream at index ${i} must have a tap_stream_id`));
		}
		const name =
			typeof raw.stream === "string" && raw.stream.length > 0 ? raw.stream : raw.tap_stream_id;

		const schema = raw.schema;
		if (typeof schema !== "object" || schema === null) {
			return Err(new CatalogError(`Catalog stream "${name}" must have a schema object`));
		}
		const properties = (schema as Record<string, unknown>).properties;
		if (!isSchemaMap(properties)) {
			return Err(
				new CatalogError(
					`Catalog stream "${name}" schema must have properties, each with a type`,
				),
			);
		}

		const keyProperties = raw.key_properties ?? [];
		if (!isStringArray(keyProperties)) {
			return Err(new CatalogError(`Catalog stream "${name}" key_properties must be a string array`));
		}

		const metadata = raw.metadata ?? [];
		if (!Array.isArray(metadata) || !metadata.every(isMetadataEntry)) {
			return Err(
				new CatalogError(
					`Catalog stream "${name}" metadata must be an array of { breadcrumb, metadata } entries`,
				),
			);
		}

		streams.push({
			tap_stream_id: raw.tap_stream_id,
			stream: name,
			schema: { type: "object", properties },
			key_properties: keyProperties,
			metadata,
		});
	}

	return Ok({ streams });
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isSchemaMap(value: unknown): value is Record<string, JsonSchema> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
	return Object.values(value).every(
		(schema) => typeof schema === "object" && schema !== null && "type" in schema,
	);
}

function isMetadataEntry(value: unknown): value is MetadataEntry {
	if (typeof value !== "object" || value === null) return false;
	const entry = value as Record<string, unknown>;
	return (
		isStringArray(entry.breadcrumb) && typeof entry.metadata === "object" && entry.metadata !== null
	);
}
