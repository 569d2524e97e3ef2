/** Print a message to stdout. */
export function print(message: string): void {
	process.stdout.write(`${message}\n`);
}

/** Print a value as indented JSON to stdout. */
export function printJson(value: unknown): void {
	print(JSON.stringify(value, null, 2));
}

/** Print an error to stderr. */
export function printError(message: string): void {
	process.stderr.write(`Error: ${message}\n`);
}

/** Print a warning to stderr. */
export function warn(message: string): void {
	process.stderr.write(`Warning: ${message}\n`);
}
