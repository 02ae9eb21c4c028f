export {
	arrowTypeToColumnType,
	COLUMN_TYPES_METADATA_KEY,
	normaliseCell,
} from "./arrow-schema";
export { readParquetBatch } from "./reader";
export { writeBatchToParquet } from "./writer";
