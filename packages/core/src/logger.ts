// ---------------------------------------------------------------------------
// Structured Logger: JSON-lines output with bound context
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Narrow an arbitrary string (env var, config value) to a LogLevel. */
export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && Object.hasOwn(LEVEL_VALUE, value);
}

/**
 * Error values are written as `{ name, message, code?, cause? }`;
 * JSON.stringify would otherwise render them as `{}`.
 */
function serialiseValue(value: unknown): unknown {
	if (!(value instanceof Error)) return value;
	const out: Record<string, unknown> = { name: value.name, message: value.message };
	if ("code" in value && typeof value.code === "string") out.code = value.code;
	if (value.cause instanceof Error) out.cause = serialiseValue(value.cause);
	return out;
}

/**
 * Structured logger that writes one JSON object per line.
 *
 * Child loggers carry bound context, so per-table log lines always include
 * the table, logical date and run id without repeating them at each call.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const tableLogger = logger.child({ table: "orders", logicalDate: "2025-08-18" });
 * tableLogger.info("staging loaded", { rows: 120 });
 * // => {"level":"info","msg":"staging loaded","ts":"...","table":"orders","logicalDate":"2025-08-18","rows":120}
 * ```
 */
export class Logger {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function; defaults to stdout, overridable for testing. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	/** Log at debug level. */
	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	/** Log at info level. */
	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	/** Log at warn level. */
	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	/** Log at error level. */
	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 * Parent bindings are kept; keys in `bindings` override them.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
		};
		if (data) {
			for (const [key, value] of Object.entries(data)) {
				entry[key] = serialiseValue(value);
			}
		}

		this.writeFn(JSON.stringify(entry));
	}
}

/** Logger that drops everything. Handy default for library callers that pass none. */
export const silentLogger = new Logger("error", {}, () => {});
