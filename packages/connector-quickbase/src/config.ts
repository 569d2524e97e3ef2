import { ConfigValidationError, Err, Ok, type Result, toBookmarkDate } from "@tapline/core";
import type { QuickbaseConfig } from "./types";

/** Environment variable consulted when the config file carries no `userToken`. */
export const USER_TOKEN_ENV = "QB_USER_TOKEN";

/**
 * Validate a raw Quickbase configuration document.
 *
 * `hostname` and `appId` are required; `userToken` may come from the
 * `QB_USER_TOKEN` environment variable instead. `startDate` must parse as
 * a date or date-time and `tables`, when given, must be a non-empty list of
 * table names.
 */
export function validateQuickbaseConfig(
	input: unknown,
	env: Record<string, string | undefined> = process.env,
): Result<QuickbaseConfig, ConfigValidationError> {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		return Err(new ConfigValidationError("Quickbase config must be an object"));
	}

	const obj = input as Record<string, unknown>;

	// --- required strings ---
	if (typeof obj.hostname !== "string" || obj.hostname.length === 0) {
		return Err(new ConfigValidationError("Quickbase config requires a non-empty hostname"));
	}
	if (typeof obj.appId !== "string" || obj.appId.length === 0) {
		return Err(new ConfigValidationError("Quickbase config requires a non-empty appId"));
	}

	const userToken =
		typeof obj.userToken === "string" && obj.userToken.length > 0
			? obj.userToken
			: env[USER_TOKEN_ENV];
	if (userToken === undefined || userToken.length === 0) {
		return Err(
			new ConfigValidationError(
				`Quickbase config requires a userToken (or the ${USER_TOKEN_ENV} environment variable)`,
			),
		);
	}

	const config: QuickbaseConfig = { hostname: obj.hostname, appId: obj.appId, userToken };

	// --- optional fields ---
	if (obj.startDate !== undefined) {
		if (typeof obj.startDate !== "string" || toBookmarkDate(obj.startDate) === undefined) {
			return Err(
				new ConfigValidationError("Quickbase startDate must be an ISO date or date-time string"),
			);
		}
		config.startDate = obj.startDate;
	}

	if (obj.userAgent !== undefined) {
		if (typeof obj.userAgent !== "string") {
			return Err(new ConfigValidationError("Quickbase userAgent must be a string"));
		}
		config.userAgent = obj.userAgent;
	}

	if (obj.tables !== undefined) {
		const tables = obj.tables;
		if (
			!Array.isArray(tables) ||
			tables.length === 0 ||
			!tables.every((t): t is string => typeof t === "string" && t.length > 0)
		) {
			return Err(
				new ConfigValidationError("Quickbase tables must be a non-empty array of table names"),
			);
		}
		config.tables = tables;
	}

	return Ok(config);
}
