// ---------------------------------------------------------------------------
// Catalog: discovered streams plus selection metadata
// ---------------------------------------------------------------------------

import type { StreamSchema } from "../messages/types";

/** How a field participates in selection. */
export type Inclusion = "automatic" | "available" | "unsupported";

/**
 * Metadata attached to a stream (`breadcrumb: []`) or to one of its
 * properties (`breadcrumb: ["properties", name]`).
 */
export interface MetadataEntry {
	breadcrumb: string[];
	metadata: Record<string, unknown>;
}

/** One discoverable stream. */
export interface CatalogEntry {
	/** Remote table identifier. */
	tap_stream_id: string;
	/** Stream name. */
	stream: string;
	schema: StreamSchema;
	key_properties: string[];
	metadata: MetadataEntry[];
}

/** The full catalog written by `--discover` and read by `--catalog`. */
export interface Catalog {
	streams: CatalogEntry[];
}
