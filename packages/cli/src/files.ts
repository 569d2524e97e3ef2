import { readFileSync } from "node:fs";
import { type QuickbaseConfig, validateQuickbaseConfig } from "@tapline/connector-quickbase";
import {
	type Catalog,
	CatalogError,
	ConfigValidationError,
	Err,
	Ok,
	parseState,
	type Result,
	StateError,
	type SyncState,
	toError,
	validateCatalog,
} from "@tapline/core";

/** Read and parse a JSON file, or describe why it could not be. */
function readJson(path: string, label: string): Result<unknown, string> {
	let raw: string;
	try {
		raw = readFileSync(path, "utf-8");
	} catch (err) {
		return Err(`Cannot read ${label} file ${path}: ${toError(err).message}`);
	}
	try {
		return Ok(JSON.parse(raw));
	} catch (err) {
		return Err(`Invalid JSON in ${label} file ${path}: ${toError(err).message}`);
	}
}

/** Load and validate the connector configuration (`--config`). */
export function loadConfigFile(
	path: string,
	env: Record<string, string | undefined> = process.env,
): Result<QuickbaseConfig, ConfigValidationError> {
	const json = readJson(path, "config");
	if (!json.ok) return Err(new ConfigValidationError(json.error));
	return validateQuickbaseConfig(json.value, env);
}

/** Load the state of a previous run (`--state`). */
export function loadStateFile(path: string): Result<SyncState, StateError> {
	const json = readJson(path, "state");
	if (!json.ok) return Err(new StateError(json.error));
	return parseState(json.value);
}

/** Load a catalog written by `--discover` (`--catalog`). */
export function loadCatalogFile(path: string): Result<Catalog, CatalogError> {
	const json = readJson(path, "catalog");
	if (!json.ok) return Err(new CatalogError(json.error));
	return validateCatalog(json.value);
}
