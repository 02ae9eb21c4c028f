import type { LakeAdapter, Warehouse } from "@silverline/adapter";
import {
	type AdapterError,
	CancelledError,
	type ColumnSpec,
	Err,
	FILE_SEQ_COLUMN,
	Ok,
	type PartitionRef,
	ParquetError,
	type RecordBatch,
	type RelationRef,
	type Result,
	ROW_SEQ_COLUMN,
	type Row,
	type SchemaConflictError,
	type StagingRelation,
} from "@silverline/core";
import { readParquetBatch } from "@silverline/parquet";
import { checkColumnNames, unifySchemas } from "./schema";

/** Errors {@link StagingLoader.load} can return */
export type StagingError = SchemaConflictError | ParquetError | AdapterError | CancelledError;

export interface StagingLoaderConfig {
	/** Rows per INSERT statement; lowered further to respect the dialect's parameter cap */
	insertBatchSize: number;
}

interface DecodedFile {
	file: string;
	batch: RecordBatch;
}

const SEQUENCE_COLUMNS: ColumnSpec[] = [
	{ name: FILE_SEQ_COLUMN, type: "int64" },
	{ name: ROW_SEQ_COLUMN, type: "int64" },
];

/**
 * Materialises a partition's files into a transient staging relation.
 *
 * Files are read from the bronze store one at a time and decoded with the
 * parquet package; their schemas are unified before the relation is created.
 * Each staged row carries its file's position in the partition and its own
 * position in the file, so executors can break ordering ties by arrival.
 */
export class StagingLoader {
	private readonly lake: LakeAdapter;
	private readonly warehouse: Warehouse;
	private readonly config: StagingLoaderConfig;

	constructor(lake: LakeAdapter, warehouse: Warehouse, config: StagingLoaderConfig) {
		this.lake = lake;
		this.warehouse = warehouse;
		this.config = config;
	}

	/**
	 * Load every file of `partition` into a new relation at `transientName`.
	 *
	 * A partition without files creates nothing and comes back marked `empty`.
	 * The caller owns the relation once this returns, successful or not, and
	 * must drop it.
	 */
	async load(
		partition: PartitionRef,
		transientName: RelationRef,
		signal?: AbortSignal,
	): Promise<Result<StagingRelation, StagingError>> {
		if (partition.files.length === 0) {
			return Ok({
				owningTable: partition.tableName,
				transientName,
				schema: [],
				rowCount: 0,
				files: [],
				empty: true,
			});
		}

		const decoded = await this.readFiles(partition.files, signal);
		if (!decoded.ok) return decoded;

		const unified = unifySchemas(
			decoded.value.map(({ file, batch }) => ({ file, columns: batch.columns })),
		);
		if (!unified.ok) return unified;
		const schema = unified.value;

		const stagingColumns = [...schema, ...SEQUENCE_COLUMNS];
		const created = await this.warehouse.execute(
			this.warehouse.dialect.createStaging(transientName, stagingColumns),
			signal,
		);
		if (!created.ok) return created;

		const inserted = await this.insertAll(transientName, stagingColumns, decoded.value, signal);
		if (!inserted.ok) return inserted;

		return Ok({
			owningTable: partition.tableName,
			transientName,
			schema,
			rowCount: inserted.value,
			files: [...partition.files],
			empty: false,
		});
	}

	private async readFiles(
		files: string[],
		signal?: AbortSignal,
	): Promise<Result<DecodedFile[], ParquetError | AdapterError | CancelledError>> {
		const decoded: DecodedFile[] = [];
		for (const file of files) {
			if (signal?.aborted) return Err(new CancelledError());

			const bytes = await this.lake.getObject(file, signal);
			if (!bytes.ok) return bytes;

			const batch = await readParquetBatch(bytes.value);
			if (!batch.ok) {
				return Err(new ParquetError(`${file}: ${batch.error.message}`, batch.error));
			}

			const named = checkColumnNames({ file, columns: batch.value.columns });
			if (!named.ok) return named;

			decoded.push({ file, batch: batch.value });
		}
		return Ok(decoded);
	}

	/** Insert all rows in statements of at most `rowsPerStatement` rows; returns the row count. */
	private async insertAll(
		relation: RelationRef,
		columns: ColumnSpec[],
		files: DecodedFile[],
		signal?: AbortSignal,
	): Promise<Result<number, AdapterError>> {
		const dialect = this.warehouse.dialect;
		const rowsPerStatement = Math.max(
			1,
			Math.min(this.config.insertBatchSize, Math.floor(dialect.maxParameters / columns.length)),
		);

		let total = 0;
		let pending: Row[] = [];
		const flush = async (): Promise<Result<void, AdapterError>> => {
			if (pending.length === 0) return Ok(undefined);
			const statement = dialect.insertRows(relation, columns, pending);
			pending = [];
			const result = await this.warehouse.execute(statement, signal);
			return result.ok ? Ok(undefined) : result;
		};

		for (let fileSeq = 0; fileSeq < files.length; fileSeq++) {
			const rows = files[fileSeq]?.batch.rows ?? [];
			for (let rowSeq = 0; rowSeq < rows.length; rowSeq++) {
				pending.push({ ...rows[rowSeq], [FILE_SEQ_COLUMN]: fileSeq, [ROW_SEQ_COLUMN]: rowSeq });
				total++;
				if (pending.length >= rowsPerStatement) {
					const flushed = await flush();
					if (!flushed.ok) return flushed;
				}
			}
		}

		const flushed = await flush();
		if (!flushed.ok) return flushed;
		return Ok(total);
	}
}
