export { QuickbaseClient } from "./client";
export type { QuickbaseClientOptions, QuickbaseError, QuickbaseQueryService } from "./client";
export { USER_TOKEN_ENV, validateQuickbaseConfig } from "./config";
export { discoverCatalog } from "./discover";
export {
	QuickbaseApiError,
	QuickbaseAuthError,
	QuickbaseConnectionError,
	QuickbaseRateLimitError,
} from "./errors";
export { renderFilter } from "./filter";
export { buildFieldLookup, mapRecord } from "./mapping";
export type { FieldLookup } from "./mapping";
export { claimUniqueName, normalizeName } from "./normalize";
export {
	buildFieldSchemas,
	findKeyProperties,
	hasReplicationKey,
	REPLICATION_KEY,
	toCatalogEntries,
} from "./schemas";
export { QuickbaseTableStream } from "./stream";
export type { QuickbaseTableStreamOptions } from "./stream";
export { syncQuickbase } from "./sync";
export type { QuickbaseSyncOptions } from "./sync";
export { testConnection } from "./test-connection";
export { KNOWN_FIELD_TYPES, mapFieldType } from "./type-mapper";
export type { Coerce, FieldTypeMapping } from "./type-mapper";
export type {
	FieldCatalogEntry,
	QueryRowsRequest,
	QuickbaseCell,
	QuickbaseConfig,
	QuickbaseField,
	QuickbaseQueryResponse,
	QuickbaseRecord,
	QuickbaseTable,
	RowPageResponse,
} from "./types";
