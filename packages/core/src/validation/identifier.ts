/** Valid SQL identifier: starts with letter or underscore, alphanumeric + underscore, max 128 chars. */
const IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]{0,127}$/;

/**
 * Check whether a string is a valid SQL identifier.
 *
 * Table, column and dataset names from configuration are spliced into
 * generated SQL, so every one of them must pass this check first.
 */
export function isValidIdentifier(name: string): boolean {
	return IDENTIFIER_RE.test(name);
}

/**
 * Quote a SQL identifier using double quotes (SQLite / standard SQL).
 * Embedded double quotes are doubled.
 */
export function quoteIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Quote a BigQuery identifier or path using backticks.
 * Embedded backticks are escaped with a backslash.
 */
export function quoteBacktick(name: string): string {
	return `\`${name.replace(/`/g, "\\`")}\``;
}
