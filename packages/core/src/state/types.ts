/**
 * Bookmark state carried by STATE messages.
 *
 * Each bookmark is a `YYYY-MM-DD` date keyed by stream name. The remote
 * filter works at day granularity, so finer cursors would be meaningless.
 */
export interface SyncState {
	bookmarks: Record<string, string>;
}

/** Bookmark used when neither the state nor the config provides one. */
export const DEFAULT_START_DATE = "1970-01-01";
