import { describe, expect, it } from "vitest";
import { flagValue, hasFlag, parseArgs } from "../args";

describe("parseArgs", () => {
	it("parses --flag value pairs", () => {
		const result = parseArgs([
			"node", "tapline",
			"--config", "config.json",
			"--state", "state.json",
		]);
		expect(result.flags).toEqual({ config: "config.json", state: "state.json" });
		expect(result.positional).toEqual([]);
	});

	it("parses --flag=value syntax", () => {
		const result = parseArgs(["node", "tapline", "--config=config.json", "--log-level=debug"]);
		expect(result.flags).toEqual({ config: "config.json", "log-level": "debug" });
	});

	it("does not let boolean switches consume the next word", () => {
		const result = parseArgs(["node", "tapline", "--discover", "extra.json", "--config", "c.json"]);
		expect(result.flags).toEqual({ discover: "true", config: "c.json" });
		expect(result.positional).toEqual(["extra.json"]);
	});

	it("treats a trailing valued flag as bare", () => {
		const result = parseArgs(["node", "tapline", "--config"]);
		expect(result.flags).toEqual({ config: "true" });
	});

	it("parses short flags", () => {
		const result = parseArgs(["node", "tapline", "-h"]);
		expect(result.flags).toEqual({ h: "true" });
	});
});

describe("hasFlag", () => {
	it("matches any of the given names", () => {
		expect(hasFlag({ v: "true" }, "version", "v")).toBe(true);
		expect(hasFlag({ config: "c.json" }, "version", "v")).toBe(false);
	});
});

describe("flagValue", () => {
	it("ignores bare flags", () => {
		expect(flagValue({ config: "c.json" }, "config")).toBe("c.json");
		expect(flagValue({ config: "true" }, "config")).toBeUndefined();
		expect(flagValue({}, "config")).toBeUndefined();
	});
});
