// ---------------------------------------------------------------------------
// QuickbaseClient: HTTP wrapper for the Quickbase JSON API v1
// ---------------------------------------------------------------------------

import { defaultLogger, Err, type Logger, Ok, type Result, toError } from "@tapline/core";
import {
	QuickbaseApiError,
	QuickbaseAuthError,
	QuickbaseConnectionError,
	QuickbaseRateLimitError,
} from "./errors";
import { toCatalogEntries } from "./schemas";
import type {
	FieldCatalogEntry,
	QueryRowsRequest,
	QuickbaseConfig,
	QuickbaseField,
	QuickbaseQueryResponse,
	QuickbaseTable,
	RowPageResponse,
} from "./types";

const DEFAULT_BASE_URL = "https://api.quickbase.com/v1";
const MAX_RATE_LIMIT_RETRIES = 3;
const DEFAULT_RETRY_AFTER_MS = 10_000;

/** Any error a Quickbase request can produce. */
export type QuickbaseError =
	| QuickbaseApiError
	| QuickbaseAuthError
	| QuickbaseConnectionError
	| QuickbaseRateLimitError;

/** The remote operations a table stream and discovery rely on. */
export interface QuickbaseQueryService {
	listTables(): Promise<Result<QuickbaseTable[], QuickbaseError>>;
	fetchFieldCatalog(tableId: string): Promise<Result<FieldCatalogEntry[], QuickbaseError>>;
	queryRows(request: QueryRowsRequest): Promise<Result<RowPageResponse, QuickbaseError>>;
}

/** Optional collaborators for {@link QuickbaseClient}. */
export interface QuickbaseClientOptions {
	logger?: Logger;
	/** API root (default `https://api.quickbase.com/v1`). */
	baseUrl?: string;
	/** Wait used between rate-limit retries. */
	sleep?: (ms: number) => Promise<void>;
}

/**
 * HTTP client for the Quickbase JSON API.
 *
 * Authenticates with a user token and uses global `fetch`.
 * All public methods return `Result<T, QuickbaseError>`; 401/403 and
 * transport failures are connection errors, every other failure is scoped
 * to the request that caused it.
 */
export class QuickbaseClient implements QuickbaseQueryService {
	private readonly config: QuickbaseConfig;
	private readonly baseUrl: string;
	private readonly logger: Logger;
	private readonly sleep: (ms: number) => Promise<void>;

	/** Field catalogs fetched during this client's lifetime, keyed by table id. */
	private readonly fieldCache = new Map<string, FieldCatalogEntry[]>();

	constructor(config: QuickbaseConfig, options: QuickbaseClientOptions = {}) {
		this.config = config;
		this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
		this.logger = options.logger ?? defaultLogger;
		this.sleep = options.sleep ?? sleep;
	}

	/** List every table of the configured app. */
	async listTables(): Promise<Result<QuickbaseTable[], QuickbaseError>> {
		return this.request<QuickbaseTable[]>(
			`/tables?appId=${encodeURIComponent(this.config.appId)}`,
			"GET",
		);
	}

	/**
	 * Fetch a table's fields with their property names.
	 *
	 * Cached per client, so discovery and the sync pass of one run share a
	 * single request per table.
	 */
	async fetchFieldCatalog(tableId: string): Promise<Result<FieldCatalogEntry[], QuickbaseError>> {
		const cached = this.fieldCache.get(tableId);
		if (cached) return Ok(cached);

		const result = await this.request<QuickbaseField[]>(
			`/fields?tableId=${encodeURIComponent(tableId)}&includeFieldPerms=false`,
			"GET",
		);
		if (!result.ok) return result;

		const entries = toCatalogEntries(result.value);
		this.fieldCache.set(tableId, entries);
		return Ok(entries);
	}

	/**
	 * Fetch one page of records.
	 *
	 * The page token is the `skip` offset; the next token is absent once
	 * `totalRecords` have been read or Quickbase returns an empty page.
	 */
	async queryRows(request: QueryRowsRequest): Promise<Result<RowPageResponse, QuickbaseError>> {
		const skip = request.pageToken ?? 0;
		const body: Record<string, unknown> = {
			from: request.tableId,
			select: request.fieldIds,
			options: { skip },
		};
		if (request.where) body.where = request.where;
		if (request.sortBy) body.sortBy = request.sortBy;

		this.logger("debug", "Sending record query to Quickbase", body);

		const result = await this.request<QuickbaseQueryResponse>("/records/query", "POST", body);
		if (!result.ok) return result;

		const { data, metadata } = result.value;
		const next = skip + metadata.numRecords;
		return Ok({
			rows: data,
			nextPageToken: metadata.numRecords > 0 && next < metadata.totalRecords ? next : undefined,
			totalRecords: metadata.totalRecords,
		});
	}

	// -----------------------------------------------------------------------
	// Internal HTTP helpers
	// -----------------------------------------------------------------------

	private headers(): Record<string, string> {
		const headers: Record<string, string> = {
			"QB-Realm-Hostname": this.config.hostname,
			Authorization: `QB-USER-TOKEN ${this.config.userToken}`,
			Accept: "application/json",
		};
		if (this.config.userAgent) {
			headers["User-Agent"] = this.config.userAgent;
		}
		return headers;
	}

	/** Make an HTTP request with rate-limit retry logic. */
	private async request<T>(
		path: string,
		method: "GET" | "POST",
		body?: unknown,
	): Promise<Result<T, QuickbaseError>> {
		for (let attempt = 0; ; attempt++) {
			const headers = this.headers();
			const init: RequestInit = { method, headers };

			if (body !== undefined) {
				headers["Content-Type"] = "application/json";
				init.body = JSON.stringify(body);
			}

			let response: Response;
			try {
				response = await fetch(`${this.baseUrl}${path}`, init);
			} catch (err) {
				const cause = toError(err);
				return Err(
					new QuickbaseConnectionError(`Failed to reach Quickbase: ${cause.message}`, cause),
				);
			}

			if (response.ok) {
				const text = await readBody(response);
				if (!text.ok) return text;
				try {
					return Ok(JSON.parse(text.value) as T);
				} catch (err) {
					return Err(new QuickbaseApiError(response.status, `Malformed JSON: ${toError(err).message}`));
				}
			}

			if (response.status === 429) {
				const retryAfter = Number.parseInt(response.headers.get("Retry-After") ?? "", 10);
				const waitMs = Number.isFinite(retryAfter) ? retryAfter * 1000 : DEFAULT_RETRY_AFTER_MS;

				if (attempt < MAX_RATE_LIMIT_RETRIES) {
					this.logger("warn", `Quickbase rate limited, retrying in ${waitMs}ms`, { path });
					await this.sleep(waitMs);
					continue;
				}

				return Err(new QuickbaseRateLimitError(waitMs));
			}

			const responseBody = await readBody(response);
			if (!responseBody.ok) return responseBody;
			if (response.status === 401 || response.status === 403) {
				return Err(new QuickbaseAuthError(response.status, responseBody.value));
			}
			return Err(new QuickbaseApiError(response.status, responseBody.value));
		}
	}
}

/** Read a response body. A connection dropped mid-body is a connection error. */
async function readBody(response: Response): Promise<Result<string, QuickbaseConnectionError>> {
	try {
		return Ok(await response.text());
	} catch (err) {
		const cause = toError(err);
		return Err(
			new QuickbaseConnectionError(`Failed to read Quickbase response: ${cause.message}`, cause),
		);
	}
}

/** Sleep for the given number of milliseconds. */
function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
