export { isLogLevel, type LogEntry, Logger, type LogLevel, silentLogger } from "./logger";
export {
	compactLogicalDate,
	type DateComponents,
	type LogicalDate,
	logicalDateInTimeZone,
	parseLogicalDate,
	partitionComponents,
	previousLogicalDate,
} from "./logical-date";
export * from "./result";
export * from "./strategy";
export {
	type ColumnSpec,
	type ColumnType,
	FILE_SEQ_COLUMN,
	type IngestionOutcome,
	INTERNAL_COLUMNS,
	type OutcomeError,
	type OutcomeStatus,
	type PartitionRef,
	type PartitionSpec,
	type RecordBatch,
	type RelationRef,
	ROW_SEQ_COLUMN,
	type Row,
	type RunSummary,
	type SkipReason,
	type SqlValue,
	type StagingRelation,
	type TargetRelation,
} from "./types";
export { isValidIdentifier, quoteBacktick, quoteIdentifier } from "./validation/identifier";
