import {
	type Catalog,
	type ConnectionError,
	defaultLogger,
	type Logger,
	type MessageSink,
	resolveStreamDefinitions,
	type Result,
	runSync,
	type SyncState,
	type SyncSummary,
	type TaplineError,
} from "@tapline/core";
import { QuickbaseClient, type QuickbaseQueryService } from "./client";
import { discoverCatalog } from "./discover";
import { QuickbaseTableStream } from "./stream";
import type { QuickbaseConfig } from "./types";

/** Options for {@link syncQuickbase}. */
export interface QuickbaseSyncOptions {
	config: QuickbaseConfig;
	sink: MessageSink;
	/** Streams to run. Discovered (every stream and field selected) when omitted. */
	catalog?: Catalog;
	state?: SyncState;
	logger?: Logger;
	/** Overrides the HTTP client; mainly for tests. */
	client?: QuickbaseQueryService;
	/** Source of `time_extracted`; `null` leaves it out. */
	clock?: (() => Date) | null;
}

/**
 * Sync every selected stream of a Quickbase app.
 *
 * Returns `Err` for an invalid catalog or when the run is aborted by a
 * connection failure; stream-level failures are reported in the summary.
 */
export async function syncQuickbase(
	options: QuickbaseSyncOptions,
): Promise<Result<SyncSummary, TaplineError | ConnectionError>> {
	const { config, sink, state } = options;
	const logger = options.logger ?? defaultLogger;
	const client = options.client ?? new QuickbaseClient(config, { logger });

	let catalog = options.catalog;
	if (!catalog) {
		const discovered = await discoverCatalog(client, config, logger);
		if (!discovered.ok) return discovered;
		catalog = discovered.value;
	}

	const definitions = resolveStreamDefinitions(catalog);
	if (!definitions.ok) return definitions;

	const streams = definitions.value.map(
		(definition) =>
			new QuickbaseTableStream({
				definition,
				client,
				logger,
				startDate: config.startDate,
				clock: options.clock,
			}),
	);

	return runSync({ streams, sink, state, logger });
}
