import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../logger";
import { CallbackMessageSink } from "../../messages/sink";
import { type Message, recordMessage, schemaMessage, stateMessage } from "../../messages/types";
import { ConnectionError, StreamError, type TaplineError } from "../../result/errors";
import { Err, Ok, type Result } from "../../result/result";
import { withBookmark } from "../../state/bookmarks";
import type { SyncState } from "../../state/types";
import type { StreamDefinition, StreamSyncResult } from "../../stream/types";
import { runSync, type SyncStream } from "../orchestrator";

// ---------------------------------------------------------------------------
// Scripted streams
// ---------------------------------------------------------------------------

function definition(name: string): StreamDefinition {
	return {
		streamId: `tbl_${name}`,
		name,
		selectedFields: ["id"],
		keyProperties: ["id"],
		replication: { method: "INCREMENTAL", cursorField: "date_modified" },
	};
}

/** A stream that emits one record and commits `bookmark`. */
function succeeding(name: string, bookmark: string): SyncStream {
	return {
		definition: definition(name),
		async sync(sink, state): Promise<Result<StreamSyncResult, TaplineError>> {
			await sink.write(schemaMessage(name, { type: "object", properties: {} }));
			await sink.write(recordMessage(name, { id: 1 }));
			const next = withBookmark(state, name, bookmark);
			await sink.write(stateMessage(next));
			return Ok({ stream: name, recordCount: 1, bookmark, state: next });
		},
	};
}

function failing(name: string, error: TaplineError): SyncStream {
	return {
		definition: definition(name),
		sync: vi.fn().mockResolvedValue(Err(error)),
	};
}

function collect() {
	const messages: Message[] = [];
	const sink = new CallbackMessageSink((m) => {
		messages.push(m);
	});
	return { messages, sink };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("runSync", () => {
	it("runs streams in order and threads state through them", async () => {
		const { messages, sink } = collect();
		const result = await runSync({
			streams: [succeeding("a", "2024-01-07"), succeeding("b", "2024-01-08")],
			sink,
			state: { bookmarks: { a: "2024-01-05" } },
			logger: silentLogger,
		});

		expect(messages.map((m) => `${m.type}:${"stream" in m ? m.stream : "-"}`)).toEqual([
			"SCHEMA:a",
			"RECORD:a",
			"STATE:-",
			"SCHEMA:b",
			"RECORD:b",
			"STATE:-",
		]);
		const finalState = messages[messages.length - 1];
		expect(finalState).toEqual({
			type: "STATE",
			value: { bookmarks: { a: "2024-01-07", b: "2024-01-08" } },
		});
		expect(result).toEqual({
			ok: true,
			value: {
				succeeded: ["a", "b"],
				failed: [],
				recordCount: 2,
				state: { bookmarks: { a: "2024-01-07", b: "2024-01-08" } },
			},
		});
	});

	it("keeps going after a stream-fatal error", async () => {
		const { messages, sink } = collect();
		const notFound = new StreamError("table not found");
		const result = await runSync({
			streams: [failing("a", notFound), succeeding("b", "2024-01-08")],
			sink,
			logger: silentLogger,
		});

		expect(messages.map((m) => m.type)).toEqual(["SCHEMA", "RECORD", "STATE"]);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.succeeded).toEqual(["b"]);
			expect(result.value.failed).toEqual([{ stream: "a", error: notFound }]);
			expect(result.value.state).toEqual({ bookmarks: { b: "2024-01-08" } });
		}
	});

	it("treats a thrown exception as stream-fatal", async () => {
		const { sink } = collect();
		const broken: SyncStream = {
			definition: definition("a"),
			sync: vi.fn().mockRejectedValue(new TypeError("undefined is not a function")),
		};

		const result = await runSync({
			streams: [broken, succeeding("b", "2024-01-08")],
			sink,
			logger: silentLogger,
		});

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.failed[0]!.error.message).toBe("undefined is not a function");
			expect(result.value.succeeded).toEqual(["b"]);
		}
	});

	it("aborts the run on a connection-fatal error", async () => {
		const { messages, sink } = collect();
		const authRejected = new ConnectionError("401 Unauthorized", "QB_AUTH");
		const after = succeeding("c", "2024-01-09");
		const afterSync = vi.spyOn(after, "sync");

		const result = await runSync({
			streams: [succeeding("a", "2024-01-07"), failing("b", authRejected), after],
			sink,
			logger: silentLogger,
		});

		expect(result).toEqual({ ok: false, error: authRejected });
		expect(afterSync).not.toHaveBeenCalled();
		expect(messages.filter((m) => m.type === "STATE")).toHaveLength(1);
	});

	it("logs each failure", async () => {
		const logger = vi.fn();
		await runSync({
			streams: [failing("a", new StreamError("table not found"))],
			sink: collect().sink,
			logger,
		});

		expect(logger).toHaveBeenCalledWith("error", "Stream a failed: table not found", {
			code: "STREAM_FAILED",
		});
	});

	it("starts from an empty state by default", async () => {
		const seen: SyncState[] = [];
		const spy: SyncStream = {
			definition: definition("a"),
			async sync(_sink, state) {
				seen.push(state);
				return Ok({ stream: "a", recordCount: 0, bookmark: undefined, state });
			},
		};

		await runSync({ streams: [spy], sink: collect().sink, logger: silentLogger });
		expect(seen).toEqual([{ bookmarks: {} }]);
	});
});
