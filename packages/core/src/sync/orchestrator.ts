// ---------------------------------------------------------------------------
// Sync orchestrator: runs every selected stream in sequence
// ---------------------------------------------------------------------------

import { defaultLogger, type Logger } from "../logger";
import type { MessageSink } from "../messages/sink";
import { type ConnectionError, isConnectionFatal, TaplineError } from "../result/errors";
import { Err, fromPromise, Ok, type Result } from "../result/result";
import { emptyState } from "../state/bookmarks";
import type { SyncState } from "../state/types";
import type { StreamDefinition, StreamSyncResult } from "../stream/types";

/** Anything that can run a single stream pass. Implemented by `BaseTableStream`. */
export interface SyncStream {
	readonly definition: StreamDefinition;
	sync(sink: MessageSink, state: SyncState): Promise<Result<StreamSyncResult, TaplineError>>;
}

/** Options for {@link runSync}. */
export interface SyncOptions {
	streams: ReadonlyArray<SyncStream>;
	sink: MessageSink;
	/** State from the previous run (default: no bookmarks). */
	state?: SyncState;
	logger?: Logger;
}

/** A stream whose pass failed without aborting the run. */
export interface StreamFailure {
	stream: string;
	error: Error;
}

/** Outcome of a run that was not aborted. */
export interface SyncSummary {
	succeeded: string[];
	failed: StreamFailure[];
	recordCount: number;
	/** State after the last successful stream. */
	state: SyncState;
}

/**
 * Run each stream to completion, one after another.
 *
 * A stream-fatal error is logged and the next stream runs; that stream's
 * bookmark stays where it was. A connection-fatal error (see
 * {@link isConnectionFatal}) stops the run at once and is returned as `Err`.
 * Exceptions thrown by a stream are treated as stream-fatal unless they are
 * connection errors.
 */
export async function runSync(options: SyncOptions): Promise<Result<SyncSummary, ConnectionError>> {
	const logger = options.logger ?? defaultLogger;
	let state = options.state ?? emptyState();
	const succeeded: string[] = [];
	const failed: StreamFailure[] = [];
	let recordCount = 0;

	logger("info", `Sync started for ${options.streams.length} stream(s)`);

	for (const stream of options.streams) {
		const name = stream.definition.name;
		const outcome = await fromPromise(stream.sync(options.sink, state));
		const result: Result<StreamSyncResult, Error> = outcome.ok ? outcome.value : outcome;

		if (!result.ok) {
			const error = result.error;
			if (isConnectionFatal(error)) {
				logger("error", `Stream ${name}: connection failure, aborting run: ${error.message}`);
				return Err(error);
			}
			logger("error", `Stream ${name} failed: ${error.message}`, {
				code: error instanceof TaplineError ? error.code : undefined,
			});
			failed.push({ stream: name, error });
			continue;
		}

		state = result.value.state;
		recordCount += result.value.recordCount;
		succeeded.push(name);
	}

	logger("info", "Sync finished", {
		succeeded: succeeded.length,
		failed: failed.length,
		records: recordCount,
	});

	return Ok({ succeeded, failed, recordCount, state });
}
