import { describe, expect, it } from "vitest";
import { buildCatalogEntry } from "../build";
import { fieldMetadata, isFieldSelected, resolveStreamDefinitions, streamMetadata } from "../resolve";
import type { Catalog } from "../types";
import { validateCatalog } from "../validate";

function ordersEntry() {
	return buildCatalogEntry({
		streamId: "bqx7xre7q",
		name: "orders",
		fields: [
			{ name: "record_id", schema: { type: ["integer", "null"] }, inclusion: "automatic" },
			{ name: "customer", schema: { type: ["string", "null"] }, inclusion: "available" },
			{
				name: "date_modified",
				schema: { type: ["string", "null"], format: "date-time" },
				inclusion: "automatic",
				extra: { "field-id": 2 },
			},
		],
		keyProperties: ["record_id"],
		replication: { method: "INCREMENTAL", cursorField: "date_modified" },
	});
}

describe("buildCatalogEntry", () => {
	it("writes stream and field metadata", () => {
		const entry = ordersEntry();

		expect(entry.tap_stream_id).toBe("bqx7xre7q");
		expect(Object.keys(entry.schema.properties)).toEqual(["record_id", "customer", "date_modified"]);
		expect(streamMetadata(entry)).toEqual({
			selected: true,
			"replication-method": "INCREMENTAL",
			"replication-key": "date_modified",
			"table-key-properties": ["record_id"],
			"valid-replication-keys": ["date_modified"],
		});
		expect(fieldMetadata(entry, "date_modified")).toEqual({
			"field-id": 2,
			inclusion: "automatic",
			selected: true,
		});
	});

	it("omits the replication key for full-table streams", () => {
		const entry = buildCatalogEntry({
			streamId: "t1",
			name: "lookups",
			fields: [],
			keyProperties: [],
			replication: { method: "FULL_TABLE" },
		});
		expect(streamMetadata(entry)["replication-key"]).toBeUndefined();
		expect(streamMetadata(entry)["valid-replication-keys"]).toEqual([]);
	});
});

describe("isFieldSelected", () => {
	it("always selects automatic fields and never unsupported ones", () => {
		expect(isFieldSelected({ inclusion: "automatic", selected: false })).toBe(true);
		expect(isFieldSelected({ inclusion: "unsupported", selected: true })).toBe(false);
	});

	it("falls back to selected-by-default", () => {
		expect(isFieldSelected({ inclusion: "available" })).toBe(false);
		expect(isFieldSelected({ "selected-by-default": true })).toBe(true);
		expect(isFieldSelected({ selected: false, "selected-by-default": true })).toBe(false);
	});
});

describe("resolveStreamDefinitions", () => {
	it("resolves selected streams and fields", () => {
		const entry = ordersEntry();
		const customer = entry.metadata.find((m) => m.breadcrumb[1] === "customer");
		customer!.metadata.selected = false;

		const result = resolveStreamDefinitions({ streams: [entry] });

		expect(result).toEqual({
			ok: true,
			value: [
				{
					streamId: "bqx7xre7q",
					name: "orders",
					selectedFields: ["record_id", "date_modified"],
					keyProperties: ["record_id"],
					replication: { method: "INCREMENTAL", cursorField: "date_modified" },
				},
			],
		});
	});

	it("skips streams that are not selected", () => {
		const entry = ordersEntry();
		streamMetadata(entry).selected = false;

		const result = resolveStreamDefinitions({ streams: [entry] });
		expect(result).toEqual({ ok: true, value: [] });
	});

	it("honours a FULL_TABLE override", () => {
		const entry = ordersEntry();
		streamMetadata(entry)["replication-method"] = "FULL_TABLE";

		const result = resolveStreamDefinitions({ streams: [entry] });
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value[0]!.replication).toEqual({ method: "FULL_TABLE" });
	});

	it("rejects INCREMENTAL without a replication key", () => {
		const catalog: Catalog = {
			streams: [
				{
					tap_stream_id: "t1",
					stream: "orders",
					schema: { type: "object", properties: {} },
					key_properties: [],
					metadata: [
						{ breadcrumb: [], metadata: { selected: true, "replication-method": "INCREMENTAL" } },
					],
				},
			],
		};

		const result = resolveStreamDefinitions(catalog);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe('Stream "orders" is INCREMENTAL but has no replication-key');
		}
	});

	it("rejects unknown replication methods", () => {
		const entry = ordersEntry();
		streamMetadata(entry)["replication-method"] = "LOG_BASED";

		const result = resolveStreamDefinitions({ streams: [entry] });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("CATALOG_INVALID");
	});
});

describe("validateCatalog", () => {
	it("accepts a catalog produced by discovery after a JSON round trip", () => {
		const catalog = JSON.parse(JSON.stringify({ streams: [ordersEntry()] }));
		const result = validateCatalog(catalog);
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.streams[0]!.stream).toBe("orders");
	});

	it("defaults the stream name to tap_stream_id", () => {
		const result = validateCatalog({
			streams: [{ tap_stream_id: "bqx7xre7q", schema: { properties: {} } }],
		});
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.streams[0]).toEqual({
				tap_stream_id: "bqx7xre7q",
				stream: "bqx7xre7q",
				schema: { type: "object", properties: {} },
				key_properties: [],
				metadata: [],
			});
		}
	});

	it("rejects malformed documents", () => {
		expect(validateCatalog(null).ok).toBe(false);
		expect(validateCatalog({}).ok).toBe(false);
		expect(validateCatalog({ streams: [{ stream: "orders" }] }).ok).toBe(false);
		expect(
			validateCatalog({ streams: [{ tap_stream_id: "t1", schema: { properties: {} }, metadata: [{}] }] })
				.ok,
		).toBe(false);
	});
});
