/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command path (e.g. ["ingest"]) */
	command: string[];
	/** Named flags (e.g. --date becomes { date: "value" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` and `--flag=value` style options
 * - `-h` style short flags
 * - a single command word before flags
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const command: string[] = [];
	const flags: Record<string, string> = {};
	const positional: string[] = [];

	const first = args[0];
	let i = 0;
	if (first !== undefined && !first.startsWith("-")) {
		command.push(first);
		i++;
	}

	while (i < args.length) {
		const arg = args[i] ?? "";
		const next = args[i + 1];
		const takesNext = next !== undefined && !next.startsWith("-");

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else if (takesNext) {
				flags[arg.slice(2)] = next;
				i++;
			} else {
				flags[arg.slice(2)] = "true";
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			if (takesNext) {
				flags[arg.slice(1)] = next;
				i++;
			} else {
				flags[arg.slice(1)] = "true";
			}
		} else {
			positional.push(arg);
		}
		i++;
	}

	return { command, flags, positional };
}

/** Split a comma-separated flag value, dropping blanks. Undefined when the flag is absent. */
export function listFlag(flags: Record<string, string>, name: string): string[] | undefined {
	const value = flags[name];
	if (value === undefined || value === "true") return undefined;
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}
