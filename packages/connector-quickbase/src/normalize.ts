const SYMBOL_WORDS: ReadonlyArray<[string, string]> = [
	["#", " nbr "],
	["&", " and "],
	["@", " at "],
	["*", " star "],
	["$", " dollar "],
	["?", " q "],
];

const MAX_NAME_LENGTH = 255;

/**
 * Turn a Quickbase table or field label into a lowercase snake_case name
 * that most warehouses accept as an identifier.
 *
 * Common symbols become words (`#` → `nbr`, `&` → `and`), every other run of
 * non-alphanumerics becomes one underscore, and a leading digit gets an `n`
 * prefix: `"# of Items"` → `"nbr_of_items"`, `"2nd Phase"` → `"n2nd_phase"`.
 */
export function normalizeName(label: string): string {
	let name = label.toLowerCase();
	for (const [symbol, word] of SYMBOL_WORDS) {
		name = name.split(symbol).join(word);
	}

	name = name
		.replace(/[^a-z0-9]+/g, " ")
		.trim()
		.replace(/\s+/g, "_")
		.replace(/^([0-9])/, "n$1");

	return name.slice(0, MAX_NAME_LENGTH);
}

/**
 * Reserve `name` in `taken`, appending `_<suffix>` until it no longer
 * collides: `status`, `status_12`, `status_12_12`.
 */
export function claimUniqueName(name: string, suffix: string, taken: Set<string>): string {
	let candidate = name;
	while (taken.has(candidate)) {
		candidate = `${candidate}_${suffix}`;
	}
	taken.add(candidate);
	return candidate;
}
