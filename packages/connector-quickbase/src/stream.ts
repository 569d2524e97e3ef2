// ---------------------------------------------------------------------------
// QuickbaseTableStream: one Quickbase table as a SCHEMA/RECORD/STATE stream
// ---------------------------------------------------------------------------

import {
	BaseTableStream,
	Err,
	type JsonSchema,
	Ok,
	type Result,
	type RowFilter,
	type RowPage,
	SchemaError,
	type TableStreamOptions,
	type TaplineError,
} from "@tapline/core";
import type { QuickbaseQueryService } from "./client";
import { renderFilter } from "./filter";
import { buildFieldLookup, mapRecord } from "./mapping";
import { buildFieldSchemas } from "./schemas";
import type { FieldCatalogEntry, QueryRowsRequest } from "./types";

/** Options for {@link QuickbaseTableStream}. */
export interface QuickbaseTableStreamOptions extends TableStreamOptions {
	client: QuickbaseQueryService;
}

/**
 * Reads one Quickbase table, page by page, sorted by the cursor field for
 * incremental streams and by record id otherwise.
 */
export class QuickbaseTableStream extends BaseTableStream {
	private readonly client: QuickbaseQueryService;
	private fields: FieldCatalogEntry[] = [];

	constructor(options: QuickbaseTableStreamOptions) {
		super(options);
		this.client = options.client;
	}

	protected async loadSchema(): Promise<Result<Record<string, JsonSchema>, TaplineError>> {
		const result = await this.client.fetchFieldCatalog(this.definition.streamId);
		if (!result.ok) return result;

		this.fields = result.value;
		return Ok(buildFieldSchemas(this.fields));
	}

	protected async *readPages(
		fields: string[],
		filter: RowFilter | undefined,
	): AsyncIterable<Result<RowPage, TaplineError>> {
		const tableId = this.definition.streamId;
		const byName = new Map(this.fields.map((f) => [f.name, f]));

		const fieldIds: number[] = [];
		for (const name of fields) {
			const entry = byName.get(name);
			if (entry) fieldIds.push(entry.id);
		}

		const request: QueryRowsRequest = { tableId, fieldIds };
		if (filter) {
			const cursor = byName.get(filter.field);
			if (!cursor) {
				yield Err(new SchemaError(`Table ${tableId}: no field named "${filter.field}"`));
				return;
			}
			request.where = renderFilter(filter, cursor.id);
			request.sortBy = [{ fieldId: cursor.id, order: "ASC" }];
		} else {
			// Skip paging needs a stable order or rows shift between pages.
			const recordId = this.fields.find((f) => f.fieldType === "recordid");
			if (recordId) request.sortBy = [{ fieldId: recordId.id, order: "ASC" }];
		}

		const lookup = buildFieldLookup(this.fields);
		let pageToken: number | undefined;
		let fetched = 0;

		this.logger("info", `Fetching data for table ${tableId} (${this.definition.name})`, {
			where: request.where,
		});

		do {
			const result = await this.client.queryRows({ ...request, pageToken });
			if (!result.ok) {
				yield result;
				return;
			}

			const page = result.value;
			fetched += page.rows.length;
			this.logger("info", `Retrieved ${fetched}/${page.totalRecords} records`, { table: tableId });

			yield Ok(page.rows.map((record) => mapRecord(record, lookup)));
			pageToken = page.nextPageToken;
		} while (pageToken !== undefined);
	}
}
