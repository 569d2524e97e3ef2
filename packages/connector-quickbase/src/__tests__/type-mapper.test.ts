import { describe, expect, it } from "vitest";
import { KNOWN_FIELD_TYPES, mapFieldType } from "../type-mapper";

describe("mapFieldType", () => {
	it("gives every known type a nullable schema", () => {
		for (const fieldType of KNOWN_FIELD_TYPES) {
			const { schema } = mapFieldType(fieldType);
			expect(Array.isArray(schema.type), fieldType).toBe(true);
			expect(schema.type, fieldType).toContain("null");
		}
	});

	it("maps unknown types to a nullable string", () => {
		const mapping = mapFieldType("some-future-type");
		expect(mapping.schema).toEqual({ type: ["string", "null"] });
		expect(mapping.coerce({ a: 1 })).toBe('{"a":1}');
		expect(mapping.coerce(7)).toBe("7");
	});

	it("maps null and undefined to null for every type", () => {
		for (const fieldType of KNOWN_FIELD_TYPES) {
			const { coerce } = mapFieldType(fieldType);
			expect(coerce(null), fieldType).toBeNull();
			expect(coerce(undefined), fieldType).toBeNull();
		}
	});

	describe("text", () => {
		it("stringifies scalars", () => {
			const { coerce } = mapFieldType("text");
			expect(coerce("hello")).toBe("hello");
			expect(coerce(42)).toBe("42");
			expect(coerce(true)).toBe("true");
		});
	});

	describe("numeric", () => {
		const { schema, coerce } = mapFieldType("numeric");

		it("uses a number schema", () => {
			expect(schema).toEqual({ type: ["number", "null"] });
		});

		it("parses numeric strings", () => {
			expect(coerce(12.5)).toBe(12.5);
			expect(coerce("12.5")).toBe(12.5);
		});

		it("turns non-finite and unparseable values into null", () => {
			expect(coerce(Number.NaN)).toBeNull();
			expect(coerce(Number.POSITIVE_INFINITY)).toBeNull();
			expect(coerce("abc")).toBeNull();
			expect(coerce("")).toBeNull();
		});
	});

	describe("duration and recordid", () => {
		it("produce integers", () => {
			expect(mapFieldType("duration").schema).toEqual({ type: ["integer", "null"] });
			expect(mapFieldType("duration").coerce(90061.9)).toBe(90061);
			expect(mapFieldType("recordid").coerce("3600000")).toBe(3600000);
		});
	});

	describe("checkbox", () => {
		const { coerce } = mapFieldType("checkbox");

		it("accepts booleans, digits and words", () => {
			expect(coerce(true)).toBe(true);
			expect(coerce("true")).toBe(true);
			expect(coerce("1")).toBe(true);
			expect(coerce(1)).toBe(true);
			expect(coerce(false)).toBe(false);
			expect(coerce("false")).toBe(false);
			expect(coerce("0")).toBe(false);
			expect(coerce(0)).toBe(false);
			expect(coerce("")).toBe(false);
		});

		it("returns null for anything else", () => {
			expect(coerce("maybe")).toBeNull();
		});
	});

	describe("dates and times", () => {
		it("formats epoch milliseconds for date fields", () => {
			const { schema, coerce } = mapFieldType("date");
			expect(schema).toEqual({ type: ["string", "null"], format: "date" });
			expect(coerce(Date.UTC(2024, 0, 5, 13))).toBe("2024-01-05");
			expect(coerce("2024-01-05")).toBe("2024-01-05");
		});

		it("formats epoch milliseconds for timestamps", () => {
			const { schema, coerce } = mapFieldType("timestamp");
			expect(schema).toEqual({ type: ["string", "null"], format: "date-time" });
			expect(coerce(Date.UTC(2024, 0, 5, 13, 30))).toBe("2024-01-05T13:30:00.000Z");
			expect(coerce("2024-01-05T13:30:00Z")).toBe("2024-01-05T13:30:00Z");
			expect(mapFieldType("datetime").schema).toEqual(schema);
		});

		it("passes time of day through", () => {
			const { schema, coerce } = mapFieldType("timeofday");
			expect(schema).toEqual({ type: ["string", "null"], format: "time" });
			expect(coerce("09:30:00")).toBe("09:30:00");
		});
	});

	describe("multitext", () => {
		const { schema, coerce } = mapFieldType("multitext");

		it("uses an array of strings", () => {
			expect(schema).toEqual({ type: ["array", "null"], items: { type: "string" } });
		});

		it("keeps arrays and wraps scalars", () => {
			expect(coerce(["a", "b"])).toEqual(["a", "b"]);
			expect(coerce("a")).toEqual(["a"]);
		});
	});

	describe("users", () => {
		const ann = { email: "ann@example.com", id: "1.abc", name: "Ann", userName: "ann", extra: 1 };

		it("keeps only the user keys", () => {
			expect(mapFieldType("user").coerce(ann)).toEqual({
				email: "ann@example.com",
				id: "1.abc",
				name: "Ann",
				userName: "ann",
			});
			expect(mapFieldType("user").coerce({ email: "bob@example.com" })).toEqual({
				email: "bob@example.com",
				id: null,
				name: null,
				userName: null,
			});
		});

		it("drops non-object entries from user lists", () => {
			const users = mapFieldType("multiuser").coerce([ann, "nobody"]);
			expect(users).toEqual([
				{ email: "ann@example.com", id: "1.abc", name: "Ann", userName: "ann" },
			]);
		});
	});

	describe("file", () => {
		it("keeps only the attachment url", () => {
			const { coerce } = mapFieldType("file");
			expect(coerce({ url: "https://example.com/files/1", versions: [] })).toBe(
				"https://example.com/files/1",
			);
			expect(coerce("report.pdf")).toBe("report.pdf");
		});
	});
});
