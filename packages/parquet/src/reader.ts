import {
	type ColumnSpec,
	type ColumnType,
	Err,
	Ok,
	ParquetError,
	type RecordBatch,
	type Result,
	type Row,
	toError,
} from "@silverline/core";
import { tableFromIPC } from "apache-arrow";
import { readParquet } from "parquet-wasm/esm";
import { arrowTypeToColumnType, COLUMN_TYPES_METADATA_KEY, normaliseCell } from "./arrow-schema";
import { ensureWasmInitialised } from "./wasm";

const COLUMN_TYPE_NAMES: ReadonlySet<string> = new Set([
	"string",
	"int64",
	"float64",
	"bool",
	"timestamp",
	"date",
	"json",
]);

function isColumnType(value: unknown): value is ColumnType {
	return typeof value === "string" && COLUMN_TYPE_NAMES.has(value);
}

/** Parse the logical-type metadata written by {@link writeBatchToParquet}, ignoring unknown entries. */
function parseColumnTypes(raw: string | undefined): Map<string, ColumnType> {
	const types = new Map<string, ColumnType>();
	if (!raw) return types;

	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return types;

	for (const [name, type] of Object.entries(parsed)) {
		if (isColumnType(type)) types.set(name, type);
	}
	return types;
}

/**
 * Decodes Parquet bytes into a column-typed {@link RecordBatch}.
 *
 * Reads the Parquet data using parquet-wasm, converts to an Apache Arrow Table
 * via IPC stream, then maps every cell to a scalar SQL value. Columns written by
 * this package carry their logical type in metadata; files from other writers are
 * typed from their native Arrow types.
 *
 * @param data - The Parquet file bytes to decode
 * @returns The decoded batch, or a ParquetError when the bytes are not valid Parquet
 */
export async function readParquetBatch(data: Uint8Array): Promise<Result<RecordBatch, ParquetError>> {
	try {
		ensureWasmInitialised();

		const wasmTable = readParquet(data);
		const arrowTable = tableFromIPC(wasmTable.intoIPCStream());

		const declared = parseColumnTypes(arrowTable.schema.metadata.get(COLUMN_TYPES_METADATA_KEY));
		const columns: ColumnSpec[] = arrowTable.schema.fields.map((field) => ({
			name: field.name,
			type: declared.get(field.name) ?? arrowTypeToColumnType(field.type),
		}));

		const vectors = columns.map((column) => arrowTable.getChild(column.name));
		const rows: Row[] = [];
		for (let i = 0; i < arrowTable.numRows; i++) {
			const row: Row = {};
			for (let c = 0; c < columns.length; c++) {
				const column = columns[c];
				const vector = vectors[c];
				if (!column) continue;
				const raw: unknown = vector ? vector.get(i) : null;
				row[column.name] = normaliseCell(raw, column.type);
			}
			rows.push(row);
		}

		return Ok({ columns, rows });
	} catch (err) {
		const cause = toError(err);
		return Err(new ParquetError(`Failed to read Parquet data: ${cause.message}`, cause));
	}
}
