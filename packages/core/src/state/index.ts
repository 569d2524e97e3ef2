export {
	emptyState,
	getBookmark,
	maxBookmark,
	parseState,
	resolveStartDate,
	toBookmarkDate,
	withBookmark,
} from "./bookmarks";
export { DEFAULT_START_DATE, type SyncState } from "./types";
