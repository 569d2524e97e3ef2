export {
	runSync,
	type StreamFailure,
	type SyncOptions,
	type SyncStream,
	type SyncSummary,
} from "./orchestrator";
