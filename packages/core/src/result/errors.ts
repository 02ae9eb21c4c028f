/** Base error class for all Silverline errors */
export class SilverlineError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Strategy descriptor is missing a field its kind requires, or names an unknown kind */
export class InvalidStrategyError extends SilverlineError {
	/** Table whose descriptor was rejected, when known */
	readonly tableName?: string;

	constructor(message: string, tableName?: string, cause?: Error) {
		super(message, "INVALID_STRATEGY", cause);
		this.tableName = tableName;
	}
}

/** Table has no entry in the strategy registry */
export class NotConfiguredError extends SilverlineError {
	readonly tableName: string;

	constructor(tableName: string) {
		super(`No strategy configured for table "${tableName}"`, "NOT_CONFIGURED");
		this.tableName = tableName;
	}
}

/** Bronze partition listing could not be performed */
export class SourceUnavailableError extends SilverlineError {
	constructor(message: string, cause?: Error) {
		super(message, "SOURCE_UNAVAILABLE", cause);
	}
}

/** Files of one partition carry incompatible column types */
export class SchemaConflictError extends SilverlineError {
	/** The two files whose schemas disagree, in arrival order */
	readonly files: string[];
	/** The column both files define with different types */
	readonly column: string;

	constructor(message: string, files: string[], column: string) {
		super(message, "SCHEMA_CONFLICT");
		this.files = files;
		this.column = column;
	}
}

/**
 * Replace-partition deleted the target partition but the insert did not complete.
 * The partition is empty until the table is re-run for the same date.
 */
export class PartialReplaceError extends SilverlineError {
	constructor(message: string, cause?: Error) {
		super(message, "PARTIAL_REPLACE", cause);
	}
}

/** A pipeline step ran past its time budget */
export class TimeoutExceededError extends SilverlineError {
	readonly step: string;
	readonly timeoutMs: number;

	constructor(step: string, timeoutMs: number) {
		super(`Step "${step}" exceeded its ${timeoutMs}ms budget`, "TIMEOUT_EXCEEDED");
		this.step = step;
		this.timeoutMs = timeoutMs;
	}
}

/** The run was cancelled by its caller */
export class CancelledError extends SilverlineError {
	constructor(message = "Run cancelled") {
		super(message, "CANCELLED");
	}
}

/** Another ingestion for the same table and date is still active */
export class RunInProgressError extends SilverlineError {
	constructor(message: string) {
		super(message, "RUN_IN_PROGRESS");
	}
}

/** Object store or warehouse operation failure */
export class AdapterError extends SilverlineError {
	constructor(message: string, cause?: Error) {
		super(message, "ADAPTER_ERROR", cause);
	}
}

/** Parquet bytes could not be decoded or encoded */
export class ParquetError extends SilverlineError {
	constructor(message: string, cause?: Error) {
		super(message, "PARQUET_ERROR", cause);
	}
}

/** Configuration document is structurally invalid */
export class ConfigError extends SilverlineError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
	}
}

/** Logical date is not a real `YYYY-MM-DD` calendar date */
export class InvalidDateError extends SilverlineError {
	constructor(message: string) {
		super(message, "INVALID_DATE");
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
