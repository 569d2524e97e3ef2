import type { RowFilter } from "@tapline/core";

/**
 * Render a row filter in Quickbase's query language.
 *
 * `OAF` is "on or after" and compares dates only, so every row modified on
 * the bookmark day matches again.
 * See https://help.quickbase.com/api-guide/componentsquery.html
 */
export function renderFilter(filter: RowFilter, fieldId: number): string {
	switch (filter.kind) {
		case "onOrAfter":
			return `{'${fieldId}'.OAF.'${filter.date}'}`;
	}
}
