export type { BigQueryWarehouseConfig } from "./bigquery";
export { affectedRowsFrom, BigQueryWarehouse, fromBigQueryValue } from "./bigquery";
export { BigQueryDialect, columnTypeToBigQuery } from "./bigquery-dialect";
export { S3LakeAdapter } from "./s3";
export { throwIfAborted, toCause, wrapAsync } from "./shared";
export type { SqliteWarehouseConfig } from "./sqlite";
export { SqliteWarehouse } from "./sqlite";
export { columnTypeToSqlite, SqliteDialect } from "./sqlite-dialect";
export type { LakeStoreConfig, LakeAdapter, ObjectInfo } from "./types";
export type {
	MergeMode,
	MergePlan,
	PartitionWrite,
	SqlStatement,
	TargetDefinition,
	Warehouse,
	WarehouseDialect,
} from "./warehouse";
export { cellParam, latestPerKeySubquery } from "./warehouse";
