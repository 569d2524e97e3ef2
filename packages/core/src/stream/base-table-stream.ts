// ---------------------------------------------------------------------------
// BaseTableStream: one SCHEMA → RECORD* → STATE pass over a remote table
// ---------------------------------------------------------------------------

import { defaultLogger, type Logger } from "../logger";
import type { MessageSink } from "../messages/sink";
import { type JsonSchema, recordMessage, schemaMessage, stateMessage } from "../messages/types";
import { SchemaError, type TaplineError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import {
	getBookmark,
	maxBookmark,
	resolveStartDate,
	toBookmarkDate,
	withBookmark,
} from "../state/bookmarks";
import type { SyncState } from "../state/types";
import type { RowFilter, StreamDefinition, StreamSyncResult } from "./types";

/** A page of rows keyed by property name, values already coerced. */
export type RowPage = Array<Record<string, unknown>>;

/** Construction options shared by every table stream. */
export interface TableStreamOptions {
	definition: StreamDefinition;
	/** Global start date used as the bookmark on a stream's first run. */
	startDate?: string;
	logger?: Logger;
	/**
	 * Clock for `time_extracted`. Pass `null` to omit the field, which makes
	 * RECORD messages depend on the row data alone.
	 */
	clock?: (() => Date) | null;
}

/**
 * Base class for streams that read one remote table per run.
 *
 * Implements the pass itself: resolve the bookmark, announce the schema,
 * filter on the cursor field, emit records page by page and commit the
 * forward-only bookmark. Subclasses supply the remote schema and the pages.
 *
 * The cursor filter works at day granularity, so a run started mid-day
 * re-reads every row already emitted earlier that day. Those duplicate
 * RECORD messages are expected; deduplication belongs downstream.
 */
export abstract class BaseTableStream {
	readonly definition: StreamDefinition;
	protected readonly logger: Logger;
	private readonly startDate: string;
	private readonly clock: (() => Date) | null;

	constructor(options: TableStreamOptions) {
		this.definition = options.definition;
		this.logger = options.logger ?? defaultLogger;
		this.startDate = resolveStartDate(options.startDate);
		this.clock = options.clock === undefined ? () => new Date() : options.clock;
	}

	/** Stream name (bookmark key). */
	get name(): string {
		return this.definition.name;
	}

	/** Fetch the remote field catalog, mapped to a schema per property name. */
	protected abstract loadSchema(): Promise<Result<Record<string, JsonSchema>, TaplineError>>;

	/**
	 * Lazily read pages of rows containing `fields`, restricted by `filter`.
	 *
	 * Each page is consumed before the next is requested. The sequence is
	 * finite and cannot be restarted.
	 */
	protected abstract readPages(
		fields: string[],
		filter: RowFilter | undefined,
	): AsyncIterable<Result<RowPage, TaplineError>>;

	/** Run one pass and return the state with this stream's bookmark committed. */
	async sync(sink: MessageSink, state: SyncState): Promise<Result<StreamSyncResult, TaplineError>> {
		const { name, replication } = this.definition;
		const previous = getBookmark(state, name) ?? this.startDate;
		const cursorField = replication.method === "INCREMENTAL" ? replication.cursorField : undefined;

		this.logger("info", `Starting stream ${name}`, {
			replication: replication.method,
			bookmark: cursorField ? previous : undefined,
		});

		const schemaResult = await this.loadSchema();
		if (!schemaResult.ok) return schemaResult;
		const remote = schemaResult.value;

		if (cursorField !== undefined && !Object.hasOwn(remote, cursorField)) {
			return Err(
				new SchemaError(`Stream ${name}: replication key "${cursorField}" not found in remote fields`),
			);
		}

		const selected = this.definition.selectedFields.filter((field) => {
			if (Object.hasOwn(remote, field)) return true;
			this.logger("warn", `Stream ${name}: selected field "${field}" no longer exists remotely`);
			return false;
		});

		const properties: Record<string, JsonSchema> = {};
		for (const field of selected) {
			const schema = remote[field];
			if (schema) properties[field] = schema;
		}

		await sink.write(
			schemaMessage(
				name,
				{ type: "object", properties },
				this.definition.keyProperties.filter((key) => Object.hasOwn(properties, key)),
				cursorField ? [cursorField] : [],
			),
		);

		let recordCount = 0;
		let observed: string | undefined;

		if (selected.length > 0) {
			const filter: RowFilter | undefined = cursorField
				? { kind: "onOrAfter", field: cursorField, date: previous }
				: undefined;
			const fields =
				cursorField && !selected.includes(cursorField) ? [...selected, cursorField] : selected;

			for await (const page of this.readPages(fields, filter)) {
				if (!page.ok) return page;

				for (const row of page.value) {
					if (cursorField) {
						const date = toBookmarkDate(row[cursorField]);
						observed = observed === undefined ? date : maxBookmark(observed, date);
					}
					await sink.write(recordMessage(name, project(row, selected), this.timeExtracted()));
					recordCount++;
				}
			}
		} else {
			this.logger("warn", `Stream ${name}: no fields selected, skipping record fetch`);
		}

		let nextState = state;
		if (cursorField) {
			nextState = withBookmark(state, name, maxBookmark(previous, observed));
		}
		await sink.write(stateMessage(nextState));

		const bookmark = getBookmark(nextState, name);
		this.logger("info", `Finished stream ${name}`, { records: recordCount, bookmark });

		return Ok({ stream: name, recordCount, bookmark, state: nextState });
	}

	private timeExtracted(): string | undefined {
		return this.clock ? this.clock().toISOString() : undefined;
	}
}

/** Keep only `fields`, in order. Missing values become `null`. */
function project(row: Record<string, unknown>, fields: string[]): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const field of fields) {
		out[field] = Object.hasOwn(row, field) ? (row[field] ?? null) : null;
	}
	return out;
}
