// ---------------------------------------------------------------------------
// Bookmark state: parsing and advancing per-stream dates
// ---------------------------------------------------------------------------

import { StateError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { DEFAULT_START_DATE, type SyncState } from "./types";

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

/** A state with no bookmarks. */
export function emptyState(): SyncState {
	return { bookmarks: {} };
}

/**
 * Reduce a cursor value to its bookmark date.
 *
 * Strings that start with a calendar date keep that date as written;
 * other strings are parsed and reduced to their UTC date. Numbers are
 * epoch milliseconds. Returns `undefined` for anything unparseable.
 */
export function toBookmarkDate(value: unknown): string | undefined {
	if (typeof value === "number") {
		if (!Number.isFinite(value)) return undefined;
		return new Date(value).toISOString().slice(0, 10);
	}
	if (typeof value !== "string" || value.length === 0) return undefined;

	const match = DATE_RE.exec(value);
	if (match) {
		const [, year, month, day] = match;
		const probe = new Date(`${year}-${month}-${day}T00:00:00Z`);
		if (Number.isNaN(probe.getTime()) || probe.getUTCDate() !== Number(day)) return undefined;
		return `${year}-${month}-${day}`;
	}

	const ms = Date.parse(value);
	if (Number.isNaN(ms)) return undefined;
	return new Date(ms).toISOString().slice(0, 10);
}

/** The later of two bookmark dates. `undefined` never wins. */
export function maxBookmark(current: string, candidate: string | undefined): string {
	if (candidate === undefined) return current;
	return candidate > current ? candidate : current;
}

/** Bookmark for `stream`, or `undefined` on its first run. */
export function getBookmark(state: SyncState, stream: string): string | undefined {
	return Object.hasOwn(state.bookmarks, stream) ? state.bookmarks[stream] : undefined;
}

/** Copy of `state` with the bookmark for `stream` set to `date`. */
export function withBookmark(state: SyncState, stream: string, date: string): SyncState {
	return { bookmarks: { ...state.bookmarks, [stream]: date } };
}

/** Resolve the configured global start date, falling back to {@link DEFAULT_START_DATE}. */
export function resolveStartDate(startDate: string | undefined): string {
	return toBookmarkDate(startDate) ?? DEFAULT_START_DATE;
}

/**
 * Parse a persisted state document.
 *
 * Accepts either the bare state (`{ bookmarks }`) or the last STATE message
 * as written by a previous run (`{ type: "STATE", value: { bookmarks } }`).
 * `null`, `undefined` and `{}` yield an empty state.
 */
export function parseState(input: unknown): Result<SyncState, StateError> {
	if (input === null || input === undefined) return Ok(emptyState());
	if (typeof input !== "object" || Array.isArray(input)) {
		return Err(new StateError("State must be a JSON object"));
	}

	const obj = input as Record<string, unknown>;
	if (obj.type === "STATE") {
		return parseState(obj.value);
	}

	if (obj.bookmarks === undefined) return Ok(emptyState());
	if (typeof obj.bookmarks !== "object" || obj.bookmarks === null || Array.isArray(obj.bookmarks)) {
		return Err(new StateError("State bookmarks must be an object"));
	}

	const entries: Array<[string, string]> = [];
	for (const [stream, raw] of Object.entries(obj.bookmarks)) {
		const date = toBookmarkDate(raw);
		if (date === undefined) {
			return Err(
				new StateError(`Bookmark for stream "${stream}" is not a date: ${JSON.stringify(raw)}`),
			);
		}
		entries.push([stream, date]);
	}

	// fromEntries defines own properties, so a stream named "__proto__" survives
	return Ok({ bookmarks: Object.fromEntries(entries) });
}
