import { type LakeAdapter, type ObjectInfo, SqliteWarehouse, type SqlStatement, type Warehouse } from "@silverline/adapter";
import {
	AdapterError,
	type ColumnSpec,
	Err,
	type LogicalDate,
	Ok,
	parseLogicalDate,
	type RecordBatch,
	type Result,
	type Row,
	type StagingRelation,
	unwrapOrThrow,
} from "@silverline/core";
import { writeBatchToParquet } from "@silverline/parquet";
import { partitionPrefix } from "../locator";
import { StagingLoader } from "../staging-loader";

export const DATE: LogicalDate = unwrapOrThrow(parseLogicalDate("2025-08-18"));
export const PREVIOUS_DATE: LogicalDate = unwrapOrThrow(parseLogicalDate("2025-08-17"));

export const LAYOUT = { prefix: "bronze", sourceDatabase: "erp" };

interface StoredObject {
	data: Uint8Array;
	lastModified: Date;
}

/** In-memory bronze store; objects arrive one second apart unless a time is given. */
export function createMemoryLake(): LakeAdapter & {
	stored: Map<string, StoredObject>;
	put(key: string, data: Uint8Array, lastModified?: Date): void;
} {
	const stored = new Map<string, StoredObject>();
	let clock = Date.UTC(2025, 7, 18, 6, 0, 0);
	const put = (key: string, data: Uint8Array, lastModified?: Date): void => {
		clock += 1000;
		stored.set(key, { data, lastModified: lastModified ?? new Date(clock) });
	};
	return {
		stored,
		put,
		async putObject(path: string, data: Uint8Array): Promise<Result<void, AdapterError>> {
			put(path, data);
			return Ok(undefined);
		},
		async getObject(path: string): Promise<Result<Uint8Array, AdapterError>> {
			const object = stored.get(path);
			return object ? Ok(object.data) : Err(new AdapterError(`Object not found: ${path}`));
		},
		async listObjects(prefix: string): Promise<Result<ObjectInfo[], AdapterError>> {
			return Ok(
				[...stored.entries()]
					.filter(([key]) => key.startsWith(prefix))
					.map(([key, object]) => ({ key, size: object.data.length, lastModified: object.lastModified })),
			);
		},
	};
}

/** Encode `batch` as Parquet and store it under the table's partition for `date`. */
export async function putBatch(
	lake: ReturnType<typeof createMemoryLake>,
	tableName: string,
	fileName: string,
	batch: RecordBatch,
	date: LogicalDate = DATE,
	lastModified?: Date,
): Promise<string> {
	const encoded = await writeBatchToParquet(batch);
	if (!encoded.ok) throw encoded.error;
	const key = `${partitionPrefix(LAYOUT, tableName, date)}${fileName}`;
	lake.put(key, encoded.value, lastModified);
	return key;
}

export async function openWarehouse(): Promise<SqliteWarehouse> {
	const opened = await SqliteWarehouse.open();
	if (!opened.ok) throw opened.error;
	return opened.value;
}

/** Warehouse wrapper that records every statement and fails the ones matching `failOn`. */
export function recordingWarehouse(
	inner: Warehouse,
	failOn?: RegExp,
): Warehouse & { statements: SqlStatement[] } {
	const statements: SqlStatement[] = [];
	return {
		statements,
		dialect: inner.dialect,
		async execute(statement: SqlStatement, signal?: AbortSignal): Promise<Result<number, AdapterError>> {
			statements.push(statement);
			if (failOn?.test(statement.sql)) {
				return Err(new AdapterError("Simulated warehouse failure"));
			}
			return inner.execute(statement, signal);
		},
		query: (statement: SqlStatement, signal?: AbortSignal) => inner.query(statement, signal),
		ensureDatasets: (datasets: string[]) => inner.ensureDatasets(datasets),
		close: () => inner.close(),
	};
}

/** `SELECT *` from a `dataset.table` relation of the SQLite warehouse. */
export async function selectAll(warehouse: Warehouse, relation: string, orderBy: string): Promise<Row[]> {
	const result = await warehouse.query({ sql: `SELECT * FROM "${relation}" ORDER BY ${orderBy}`, params: {} });
	if (!result.ok) throw result.error;
	return result.value;
}

/** Whether a `dataset.table` relation exists in the SQLite warehouse. */
export async function relationExists(warehouse: Warehouse, relation: string): Promise<boolean> {
	const result = await warehouse.query({
		sql: "SELECT name FROM sqlite_master WHERE type = 'table' AND name = @name",
		params: { name: relation },
	});
	if (!result.ok) throw result.error;
	return result.value.length > 0;
}

/** A batch with the given columns; rows may omit columns. */
export function batch(columns: ColumnSpec[], rows: Row[]): RecordBatch {
	return { columns, rows };
}

let stagingCounter = 0;

/**
 * Load one Parquet file per batch into a fresh staging relation,
 * the way the coordinator does before an executor runs.
 */
export async function stage(
	warehouse: Warehouse,
	tableName: string,
	batches: RecordBatch[],
	date: LogicalDate = DATE,
): Promise<StagingRelation> {
	const lake = createMemoryLake();
	const files: string[] = [];
	for (let i = 0; i < batches.length; i++) {
		const current = batches[i];
		if (current) files.push(await putBatch(lake, tableName, `part-${i}.parquet`, current, date));
	}

	stagingCounter++;
	const loader = new StagingLoader(lake, warehouse, { insertBatchSize: 500 });
	const loaded = await loader.load(
		{ tableName, logicalDate: date, files },
		{ dataset: "staging", table: `${tableName}__stg_${stagingCounter}` },
	);
	if (!loaded.ok) throw loaded.error;
	return loaded.value;
}
