import {
	Err,
	Ok,
	ParquetError,
	type RecordBatch,
	type Result,
	toError,
} from "@silverline/core";
import * as arrow from "apache-arrow";
import {
	Compression,
	Table as WasmTable,
	WriterPropertiesBuilder,
	writeParquet,
} from "parquet-wasm/esm";
import { buildVector, COLUMN_TYPES_METADATA_KEY, needsTypeMetadata } from "./arrow-schema";
import { ensureWasmInitialised } from "./wasm";

/**
 * Encodes a {@link RecordBatch} as Parquet bytes with Snappy compression.
 *
 * Each column becomes one Arrow vector (see `buildVector`); columns whose
 * physical type differs from their logical type are listed in the
 * `silverline:column_types` key-value metadata so {@link readParquetBatch}
 * restores them.
 *
 * Used to produce bronze fixtures and local exports.
 */
export async function writeBatchToParquet(
	batch: RecordBatch,
): Promise<Result<Uint8Array, ParquetError>> {
	try {
		ensureWasmInitialised();

		const vectors: Record<string, arrow.Vector> = {};
		const logicalTypes: Record<string, string> = {};
		for (const column of batch.columns) {
			vectors[column.name] = buildVector(
				column,
				batch.rows.map((row) => row[column.name] ?? null),
			);
			if (needsTypeMetadata(column.type)) {
				logicalTypes[column.name] = column.type;
			}
		}

		const ipcBytes = arrow.tableToIPC(new arrow.Table(vectors), "stream");
		const wasmTable = WasmTable.fromIPCStream(ipcBytes);

		// Each builder method consumes the previous instance.
		let builder = new WriterPropertiesBuilder();
		builder = builder.setCompression(Compression.SNAPPY);
		if (Object.keys(logicalTypes).length > 0) {
			const metadata = new Map<string, string>();
			metadata.set(COLUMN_TYPES_METADATA_KEY, JSON.stringify(logicalTypes));
			builder = builder.setKeyValueMetadata(metadata);
		}

		return Ok(writeParquet(wasmTable, builder.build()));
	} catch (err) {
		const cause = toError(err);
		return Err(new ParquetError(`Failed to write Parquet data: ${cause.message}`, cause));
	}
}
