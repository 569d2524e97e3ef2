// ---------------------------------------------------------------------------
// Interchange message types: SCHEMA / RECORD / STATE
// ---------------------------------------------------------------------------

import type { SyncState } from "../state/types";

/** JSON-schema primitive type names used in stream schemas. */
export type JsonSchemaType = "string" | "number" | "integer" | "boolean" | "object" | "array" | "null";

/** The subset of JSON Schema emitted for stream properties. */
export interface JsonSchema {
	type: JsonSchemaType | JsonSchemaType[];
	/** Format annotation, e.g. `date-time`. */
	format?: string;
	/** Nested properties for object-typed fields. */
	properties?: Record<string, JsonSchema>;
	/** Element schema for array-typed fields. */
	items?: JsonSchema;
}

/** Top-level schema of a stream: always an object keyed by property name. */
export interface StreamSchema {
	type: "object";
	properties: Record<string, JsonSchema>;
}

/** Announces the shape of a stream. Precedes every record of that stream. */
export interface SchemaMessage {
	type: "SCHEMA";
	stream: string;
	schema: StreamSchema;
	key_properties: string[];
	bookmark_properties: string[];
}

/** One extracted row. */
export interface RecordMessage {
	type: "RECORD";
	stream: string;
	record: Record<string, unknown>;
	/** ISO-8601 extraction time; omitted when the run has no clock. */
	time_extracted?: string;
}

/** Checkpoint of every stream's bookmark. The host persists the last one. */
export interface StateMessage {
	type: "STATE";
	value: SyncState;
}

/** Any message written to the output channel. */
export type Message = SchemaMessage | RecordMessage | StateMessage;

/** Build a SCHEMA message. */
export function schemaMessage(
	stream: string,
	schema: StreamSchema,
	keyProperties: string[] = [],
	bookmarkProperties: string[] = [],
): SchemaMessage {
	return {
		type: "SCHEMA",
		stream,
		schema,
		key_properties: keyProperties,
		bookmark_properties: bookmarkProperties,
	};
}

/** Build a RECORD message. */
export function recordMessage(
	stream: string,
	record: Record<string, unknown>,
	timeExtracted?: string,
): RecordMessage {
	const message: RecordMessage = { type: "RECORD", stream, record };
	if (timeExtracted !== undefined) {
		message.time_extracted = timeExtracted;
	}
	return message;
}

/** Build a STATE message from a snapshot of the bookmark state. */
export function stateMessage(state: SyncState): StateMessage {
	return { type: "STATE", value: { bookmarks: { ...state.bookmarks } } };
}
