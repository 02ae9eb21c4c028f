import {
	type AdapterError,
	type ColumnSpec,
	FILE_SEQ_COLUMN,
	type LogicalDate,
	type PartitionSpec,
	type RelationRef,
	type Result,
	ROW_SEQ_COLUMN,
	type Row,
	type SqlValue,
} from "@silverline/core";

/** A parameterised SQL statement. Placeholders are written `@name`. */
export interface SqlStatement {
	sql: string;
	params: Record<string, SqlValue>;
	/** Declared parameter types, for warehouses that cannot infer the type of a null */
	types?: Record<string, string>;
}

/** How two rows of the same key are reconciled by {@link WarehouseDialect.mergeLatest} */
export type MergeMode = "merge" | "upsert";

/** Everything the dialect needs to render a latest-wins merge of staging into target */
export interface MergePlan {
	mode: MergeMode;
	target: RelationRef;
	staging: RelationRef;
	/** User columns present in staging, in staging order */
	columns: ColumnSpec[];
	keyColumns: readonly string[];
	orderingColumn: string;
}

/** Replace-partition write of staging rows into one date partition of the target */
export interface PartitionWrite {
	target: RelationRef;
	staging: RelationRef;
	/** Staging columns copied into the target; excludes the partition field */
	columns: ColumnSpec[];
	partitionField: string;
	logicalDate: LogicalDate;
}

/** Target table definition for {@link WarehouseDialect.createTarget} */
export interface TargetDefinition {
	relation: RelationRef;
	columns: ColumnSpec[];
	partitionSpec: PartitionSpec;
	clusterColumns: readonly string[];
}

/**
 * SQL dialect interface: encapsulates the syntactic differences between
 * BigQuery and SQLite for staging, target creation and the three strategies.
 */
export interface WarehouseDialect {
	/** Most bound parameters a single statement may carry */
	readonly maxParameters: number;

	/** CREATE TABLE for a transient staging relation. */
	createStaging(relation: RelationRef, columns: ColumnSpec[]): SqlStatement;

	/** Multi-row INSERT of `rows` into `relation`; missing cells bind as null. */
	insertRows(relation: RelationRef, columns: ColumnSpec[], rows: Row[]): SqlStatement;

	/** DROP TABLE IF EXISTS. */
	dropRelation(relation: RelationRef): SqlStatement;

	/** CREATE TABLE IF NOT EXISTS for a silver relation. */
	createTarget(definition: TargetDefinition): SqlStatement;

	/**
	 * Deduplicate staging per key (latest ordering value, then latest file,
	 * then latest row) and apply it to the target. Statements run in order;
	 * their affected-row counts add up to the rows written.
	 */
	mergeLatest(plan: MergePlan): SqlStatement[];

	/** DELETE every target row of the logical date's partition. */
	deletePartition(write: PartitionWrite): SqlStatement;

	/** INSERT all staging rows into the partition, stamping the partition field. */
	insertPartition(write: PartitionWrite): SqlStatement;
}

/**
 * A SQL warehouse the silver layer lives in.
 * All methods return `Result` and never throw.
 */
export interface Warehouse {
	readonly dialect: WarehouseDialect;

	/** Run a statement and return the number of rows it changed (0 for DDL). */
	execute(statement: SqlStatement, signal?: AbortSignal): Promise<Result<number, AdapterError>>;

	/** Run a query and return its rows. */
	query(statement: SqlStatement, signal?: AbortSignal): Promise<Result<Row[], AdapterError>>;

	/** Create any of the named datasets that do not exist yet. */
	ensureDatasets(datasets: string[]): Promise<Result<void, AdapterError>>;

	/** Release resources; local warehouses persist their state here. */
	close(): Promise<Result<void, AdapterError>>;
}

/** Render a relation with the dialect's identifier quoting. */
export type RelationQuoter = (relation: RelationRef) => string;

/**
 * Subquery keeping one staging row per key: greatest ordering value, then
 * greatest file sequence, then greatest row sequence. Shared by both dialects.
 */
export function latestPerKeySubquery(
	plan: MergePlan,
	quote: (name: string) => string,
	relation: RelationQuoter,
): string {
	const cols = plan.columns.map((c) => quote(c.name)).join(", ");
	const partitionBy = plan.keyColumns.map(quote).join(", ");
	const orderBy = [
		`${quote(plan.orderingColumn)} DESC`,
		`${quote(FILE_SEQ_COLUMN)} DESC`,
		`${quote(ROW_SEQ_COLUMN)} DESC`,
	].join(", ");
	return `SELECT ${cols} FROM (
	SELECT ${cols}, ROW_NUMBER() OVER (PARTITION BY ${partitionBy} ORDER BY ${orderBy}) AS ${quote("_ingest_rank")}
	FROM ${relation(plan.staging)}
) WHERE ${quote("_ingest_rank")} = 1`;
}

/** Parameter name for the cell at (row, column) of a multi-row insert */
export function cellParam(rowIndex: number, columnIndex: number): string {
	return `r${rowIndex}_c${columnIndex}`;
}
