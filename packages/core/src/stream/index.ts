export { BaseTableStream, type RowPage, type TableStreamOptions } from "./base-table-stream";
export {
	type Replication,
	REPLICATION_METHODS,
	type ReplicationMethod,
	type RowFilter,
	type StreamDefinition,
	type StreamSyncResult,
} from "./types";
