import { Ok, type Result } from "@tapline/core";
import { vi } from "vitest";
import type { QuickbaseError, QuickbaseQueryService } from "../client";
import type { FieldCatalogEntry, QueryRowsRequest, QuickbaseTable, RowPageResponse } from "../types";

/** Field catalog of a typical table: key, modification date, two data fields. */
export const PROJECT_FIELDS: FieldCatalogEntry[] = [
	{ id: 3, label: "Record ID#", name: "record_id_nbr", fieldType: "recordid" },
	{ id: 2, label: "Date Modified", name: "date_modified", fieldType: "timestamp" },
	{ id: 6, label: "Name", name: "name", fieldType: "text" },
	{ id: 7, label: "Budget", name: "budget", fieldType: "currency" },
];

export function page(
	rows: RowPageResponse["rows"],
	nextPageToken?: number,
	totalRecords = rows.length,
): Result<RowPageResponse, QuickbaseError> {
	return Ok({ rows, nextPageToken, totalRecords });
}

/** A query service backed by fixed tables, catalogs and pages. */
export function fakeClient(options: {
	tables?: QuickbaseTable[];
	fields?: Record<string, Result<FieldCatalogEntry[], QuickbaseError>>;
	pages?: Array<Result<RowPageResponse, QuickbaseError>>;
	listTables?: Result<QuickbaseTable[], QuickbaseError>;
}) {
	const pages = [...(options.pages ?? [])];
	return {
		listTables: vi.fn(
			async (): Promise<Result<QuickbaseTable[], QuickbaseError>> =>
				options.listTables ?? Ok(options.tables ?? []),
		),
		fetchFieldCatalog: vi.fn(
			async (tableId: string): Promise<Result<FieldCatalogEntry[], QuickbaseError>> =>
				options.fields?.[tableId] ?? Ok([]),
		),
		queryRows: vi.fn(
			async (_request: QueryRowsRequest): Promise<Result<RowPageResponse, QuickbaseError>> =>
				pages.shift() ?? page([]),
		),
	} satisfies QuickbaseQueryService;
}
