export {
	CatalogError,
	ConfigValidationError,
	ConnectionError,
	isConnectionFatal,
	SchemaError,
	StateError,
	StreamError,
	TaplineError,
	toError,
} from "./errors";
export { Err, fromPromise, Ok, type Result } from "./result";
