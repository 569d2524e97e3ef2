// ---------------------------------------------------------------------------
// Quickbase Connector: Type Definitions
// ---------------------------------------------------------------------------

/** Connection configuration for a Quickbase app. */
export interface QuickbaseConfig {
	/** Realm hostname (e.g. "mycompany.quickbase.com"). */
	hostname: string;
	/** Id of the app whose tables are extracted. */
	appId: string;
	/** User token sent as `QB-USER-TOKEN`. */
	userToken: string;
	/** Earliest modification date to sync on a stream's first run. */
	startDate?: string;
	/** Optional User-Agent header. */
	userAgent?: string;
	/** Restrict discovery to these table names (default: every table in the app). */
	tables?: string[];
}

// ---------------------------------------------------------------------------
// Quickbase JSON API v1: Minimal Response Types
// ---------------------------------------------------------------------------

/** A table from GET /v1/tables. */
export interface QuickbaseTable {
	id: string;
	name: string;
	alias?: string;
	description?: string;
}

/** A field from GET /v1/fields. */
export interface QuickbaseField {
	id: number;
	label: string;
	fieldType: string;
}

/** One cell of a record; Quickbase wraps every value. */
export interface QuickbaseCell {
	value: unknown;
}

/** A record from POST /v1/records/query, keyed by field id. */
export type QuickbaseRecord = Record<string, QuickbaseCell>;

/** Response of POST /v1/records/query. */
export interface QuickbaseQueryResponse {
	data: QuickbaseRecord[];
	fields?: Array<{ id: number; label: string; type: string }>;
	metadata: {
		totalRecords: number;
		numRecords: number;
		numFields?: number;
		skip?: number;
		top?: number;
	};
}

// ---------------------------------------------------------------------------
// Query service: what the table stream needs from the client
// ---------------------------------------------------------------------------

/** A field with its normalised property name. */
export interface FieldCatalogEntry {
	id: number;
	label: string;
	/** Property name used in schemas and records. Unique within a table. */
	name: string;
	fieldType: string;
}

/** Parameters of a single page request. */
export interface QueryRowsRequest {
	tableId: string;
	fieldIds: number[];
	/** Query in Quickbase's query language, e.g. `{'2'.OAF.'2024-01-05'}`. */
	where?: string;
	sortBy?: Array<{ fieldId: number; order: "ASC" | "DESC" }>;
	/** Offset of the page; omitted for the first page. */
	pageToken?: number;
}

/** One page of rows and the token of the next page, if any. */
export interface RowPageResponse {
	rows: QuickbaseRecord[];
	nextPageToken: number | undefined;
	totalRecords: number;
}
