// ---------------------------------------------------------------------------
// Quickbase field type → JSON schema fragment + value coercion
// ---------------------------------------------------------------------------

import type { JsonSchema, JsonSchemaType } from "@tapline/core";

/** Converts a raw cell value into its interchange representation. */
export type Coerce = (value: unknown) => unknown;

/** Schema fragment and coercion rule for one Quickbase field type. */
export interface FieldTypeMapping {
	schema: JsonSchema;
	coerce: Coerce;
}

function nullable(type: JsonSchemaType, extra: Omit<JsonSchema, "type"> = {}): JsonSchema {
	return { type: [type, "null"], ...extra };
}

// ---------------------------------------------------------------------------
// Coercions
// ---------------------------------------------------------------------------

function toStringValue(value: unknown): string | null {
	if (value === null || value === undefined) return null;
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	return JSON.stringify(value);
}

/** Numbers and numeric strings. NaN and ±Infinity are not valid JSON, so they become null. */
function toNumber(value: unknown): number | null {
	if (typeof value === "number") return Number.isFinite(value) ? value : null;
	if (typeof value === "string" && value.trim().length > 0) {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
}

function toInteger(value: unknown): number | null {
	const n = toNumber(value);
	return n === null ? null : Math.trunc(n);
}

const TRUE_STRINGS = new Set(["true", "1", "yes"]);
const FALSE_STRINGS = new Set(["false", "0", "no", ""]);

function toBoolean(value: unknown): boolean | null {
	if (typeof value === "boolean") return value;
	if (typeof value === "number") return value !== 0;
	if (typeof value === "string") {
		const lower = value.trim().toLowerCase();
		if (TRUE_STRINGS.has(lower)) return true;
		if (FALSE_STRINGS.has(lower)) return false;
	}
	return null;
}

/** Epoch milliseconds become ISO-8601; strings are already formatted by Quickbase. */
function toDateTime(value: unknown): string | null {
	if (typeof value === "number") {
		return Number.isFinite(value) ? new Date(value).toISOString() : null;
	}
	return toStringValue(value);
}

function toDate(value: unknown): string | null {
	const formatted = toDateTime(value);
	return typeof value === "number" && formatted !== null ? formatted.slice(0, 10) : formatted;
}

function toStringArray(value: unknown): string[] | null {
	if (value === null || value === undefined) return null;
	const items = Array.isArray(value) ? value : [value];
	return items.map(toStringValue).filter((item): item is string => item !== null);
}

const USER_KEYS = ["email", "id", "name", "userName"] as const;

type QuickbaseUser = Record<(typeof USER_KEYS)[number], string | null>;

function toUser(value: unknown): QuickbaseUser | null {
	if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
	const raw = value as Record<string, unknown>;
	const user: QuickbaseUser = { email: null, id: null, name: null, userName: null };
	for (const key of USER_KEYS) {
		user[key] = toStringValue(raw[key]);
	}
	return user;
}

function toUserList(value: unknown): QuickbaseUser[] | null {
	if (!Array.isArray(value)) return null;
	return value.map(toUser).filter((user): user is QuickbaseUser => user !== null);
}

/** File attachments arrive as `{ url, versions }`; only the URL is kept. */
function toFileUrl(value: unknown): string | null {
	if (typeof value === "object" && value !== null && !Array.isArray(value)) {
		const url = (value as Record<string, unknown>).url;
		return typeof url === "string" ? url : null;
	}
	return toStringValue(value);
}

// ---------------------------------------------------------------------------
// Mapping table
// ---------------------------------------------------------------------------

const USER_SCHEMA: JsonSchema = nullable("object", {
	properties: {
		email: nullable("string"),
		id: nullable("string"),
		name: nullable("string"),
		userName: nullable("string"),
	},
});

const STRING: FieldTypeMapping = { schema: nullable("string"), coerce: toStringValue };
const NUMBER: FieldTypeMapping = { schema: nullable("number"), coerce: toNumber };
const INTEGER: FieldTypeMapping = { schema: nullable("integer"), coerce: toInteger };
const DATE_TIME: FieldTypeMapping = {
	schema: nullable("string", { format: "date-time" }),
	coerce: toDateTime,
};

const MAPPINGS = new Map<string, FieldTypeMapping>([
	["text", STRING],
	["text-multi-line", STRING],
	["text-multiple-choice", STRING],
	["rich-text", STRING],
	["email", STRING],
	["url", STRING],
	["phone", STRING],
	["address", STRING],
	["dblink", STRING],
	["predecessor", STRING],
	["lookup", STRING],
	["numeric", NUMBER],
	["currency", NUMBER],
	["percent", NUMBER],
	["rating", NUMBER],
	["duration", INTEGER],
	["recordid", INTEGER],
	["checkbox", { schema: nullable("boolean"), coerce: toBoolean }],
	["date", { schema: nullable("string", { format: "date" }), coerce: toDate }],
	["timestamp", DATE_TIME],
	["datetime", DATE_TIME],
	["timeofday", { schema: nullable("string", { format: "time" }), coerce: toStringValue }],
	["multitext", { schema: nullable("array", { items: { type: "string" } }), coerce: toStringArray }],
	["user", { schema: USER_SCHEMA, coerce: toUser }],
	["multiuser", { schema: nullable("array", { items: USER_SCHEMA }), coerce: toUserList }],
	["file", { schema: nullable("string"), coerce: toFileUrl }],
]);

/** Every Quickbase field type with a dedicated mapping. */
export const KNOWN_FIELD_TYPES: ReadonlyArray<string> = [...MAPPINGS.keys()];

/**
 * Map a Quickbase field type to its schema fragment and coercion.
 *
 * Unknown types map to a nullable string and their values are stringified.
 */
export function mapFieldType(fieldType: string): FieldTypeMapping {
	return MAPPINGS.get(fieldType) ?? STRING;
}
