import type { SyncState } from "../state/types";

/** Supported replication methods. */
export const REPLICATION_METHODS = ["INCREMENTAL", "FULL_TABLE"] as const;

/** Union of replication method names. */
export type ReplicationMethod = (typeof REPLICATION_METHODS)[number];

/** How a stream decides which rows to read. Resolved once per stream. */
export type Replication = { method: "INCREMENTAL"; cursorField: string } | { method: "FULL_TABLE" };

/** Static description of one stream, resolved from the catalog before a run. */
export interface StreamDefinition {
	/** Remote table identifier. */
	streamId: string;
	/** Stream name; also the key of the stream's bookmark. */
	name: string;
	/** Selected property names, in output order. */
	selectedFields: string[];
	/** Primary-key property names. */
	keyProperties: string[];
	replication: Replication;
}

/** Structured row filter. Connectors render it into their own query language. */
export interface RowFilter {
	kind: "onOrAfter";
	/** Property name of the cursor field. */
	field: string;
	/** Inclusive lower bound, `YYYY-MM-DD`. */
	date: string;
}

/** Outcome of one completed stream pass. */
export interface StreamSyncResult {
	stream: string;
	recordCount: number;
	/** Bookmark after the pass; `undefined` for full-table streams without one. */
	bookmark: string | undefined;
	/** State including this stream's committed bookmark. */
	state: SyncState;
}
