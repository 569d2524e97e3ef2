/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** Named flags (e.g. --config becomes { config: "value" }) */
	flags: Record<string, string>;
	/** Arguments that are neither flags nor flag values */
	positional: string[];
}

/** Flags that never take a value, so the word after them is not consumed. */
const BOOLEAN_FLAGS = new Set(["discover", "test", "help", "h", "version", "v"]);

/**
 * Parse process.argv into flags and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - Boolean switches (`--discover`, `--test`, `--help`, `-h`, `--version`, `-v`)
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const flags: Record<string, string> = {};
	const positional: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i]!;

		let key: string | undefined;
		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				// --flag=value
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
				continue;
			}
			key = arg.slice(2);
		} else if (arg.startsWith("-") && arg.length === 2) {
			key = arg.slice(1);
		}

		if (key === undefined) {
			positional.push(arg);
			continue;
		}

		const nextArg = args[i + 1];
		if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith("-")) {
			flags[key] = nextArg;
			i++;
		} else {
			flags[key] = "true";
		}
	}

	return { flags, positional };
}

/** Whether any of the named boolean switches was given. */
export function hasFlag(flags: Record<string, string>, ...names: string[]): boolean {
	return names.some((name) => flags[name] === "true");
}

/** Value of a flag that takes an argument; `undefined` when absent or given bare. */
export function flagValue(flags: Record<string, string>, name: string): string | undefined {
	const value = flags[name];
	return value === undefined || value === "true" ? undefined : value;
}
