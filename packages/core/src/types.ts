import type { LogicalDate } from "./logical-date";
import type { StrategyKind } from "./strategy/types";

/** Column types carried from Parquet through staging into the silver layer */
export type ColumnType = "string" | "int64" | "float64" | "bool" | "timestamp" | "date" | "json";

/** A named, typed column */
export interface ColumnSpec {
	name: string;
	type: ColumnType;
}

/**
 * A scalar cell value as it travels between the bronze reader and the warehouse.
 * Timestamps are ISO-8601 strings, dates are `YYYY-MM-DD`, JSON is serialised text,
 * and int64 values outside the safe integer range are decimal strings.
 */
export type SqlValue = string | number | boolean | null;

/** One row keyed by column name */
export type Row = Record<string, SqlValue>;

/** Column-typed rows decoded from one bronze file */
export interface RecordBatch {
	columns: ColumnSpec[];
	rows: Row[];
}

/** A dataset-qualified warehouse relation */
export interface RelationRef {
	dataset: string;
	table: string;
}

/** Files that make up one table's partition for one logical date */
export interface PartitionRef {
	tableName: string;
	logicalDate: LogicalDate;
	/** Object keys in arrival order; empty means nothing to ingest */
	files: string[];
}

/** Staging column holding the file's position in {@link PartitionRef.files} */
export const FILE_SEQ_COLUMN = "_ingest_file_seq";

/** Staging column holding the row's position within its file */
export const ROW_SEQ_COLUMN = "_ingest_row_seq";

/** Columns the staging loader adds; never copied into the silver layer */
export const INTERNAL_COLUMNS: ReadonlySet<string> = new Set([FILE_SEQ_COLUMN, ROW_SEQ_COLUMN]);

/**
 * Transient, table-scoped relation holding one partition's rows.
 * Owned by a single ingestion attempt and dropped when it ends.
 */
export interface StagingRelation {
	owningTable: string;
	/** Where the rows live; for an empty partition nothing was created here */
	transientName: RelationRef;
	/** Unified user schema across all files (internal columns excluded) */
	schema: ColumnSpec[];
	rowCount: number;
	files: string[];
	/** True when the partition had no files and no relation was created */
	empty: boolean;
}

/** How a silver relation is partitioned */
export type PartitionSpec =
	| { type: "none" }
	| { type: "column"; column: string }
	| { type: "date_of"; column: string };

/** A silver-layer relation as ensured by the target relation manager */
export interface TargetRelation {
	tableName: string;
	relation: RelationRef;
	physicalSchema: ColumnSpec[];
	partitionSpec: PartitionSpec;
	clusterSpec: string[];
}

/** Final status of one table in a run */
export type OutcomeStatus = "success" | "skipped" | "failed";

/** Why a table was skipped */
export type SkipReason = "no_files" | "not_configured";

/** Error details recorded on a failed outcome */
export interface OutcomeError {
	code: string;
	message: string;
	/** Offending files, for schema conflicts */
	files?: string[];
}

/** Per-table result of one coordinator run */
export interface IngestionOutcome {
	tableName: string;
	logicalDate: LogicalDate;
	status: OutcomeStatus;
	rowsAffected: number;
	strategy?: StrategyKind;
	filesProcessed: number;
	durationMs: number;
	skipReason?: SkipReason;
	/** Present exactly when `status` is `"failed"` */
	error?: OutcomeError;
}

/** Aggregate counts over a run's outcomes */
export interface RunSummary {
	logicalDate: LogicalDate;
	total: number;
	succeeded: number;
	skipped: number;
	failed: number;
	rowsAffected: number;
}
