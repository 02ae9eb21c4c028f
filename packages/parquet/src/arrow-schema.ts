import type { ColumnSpec, ColumnType, SqlValue } from "@silverline/core";
import * as arrow from "apache-arrow";

/**
 * Metadata key listing columns whose logical type differs from the physical
 * Arrow type they were stored with (booleans as Int8, timestamps, dates and
 * JSON as Utf8). Value: JSON object of column name → {@link ColumnType}.
 */
export const COLUMN_TYPES_METADATA_KEY = "silverline:column_types";

/**
 * Physical Arrow type used when writing a column of the given type.
 *
 * Booleans are stored as Int8 to work around an Arrow JS IPC serialisation
 * issue where all-null boolean columns produce a 0-byte data buffer that
 * parquet-wasm rejects. Timestamps, dates and JSON are stored as Utf8.
 */
const ARROW_WRITE_TYPE: Record<ColumnType, () => arrow.DataType> = {
	string: () => new arrow.Utf8(),
	int64: () => new arrow.Int64(),
	float64: () => new arrow.Float64(),
	bool: () => new arrow.Int8(),
	timestamp: () => new arrow.Utf8(),
	date: () => new arrow.Utf8(),
	json: () => new arrow.Utf8(),
};

/** Whether the physical write type differs from the logical column type. */
export function needsTypeMetadata(type: ColumnType): boolean {
	return type === "bool" || type === "timestamp" || type === "date" || type === "json";
}

export function arrowWriteType(type: ColumnType): arrow.DataType {
	return ARROW_WRITE_TYPE[type]();
}

/**
 * Map a native Arrow field type to a column type.
 * Anything without a scalar mapping (structs, lists, decimals, maps) becomes `json`.
 */
export function arrowTypeToColumnType(type: arrow.DataType): ColumnType {
	if (arrow.DataType.isUtf8(type) || arrow.DataType.isLargeUtf8(type)) return "string";
	if (arrow.DataType.isInt(type)) return "int64";
	if (arrow.DataType.isFloat(type)) return "float64";
	if (arrow.DataType.isBool(type)) return "bool";
	if (arrow.DataType.isTimestamp(type)) return "timestamp";
	if (arrow.DataType.isDate(type)) return "date";
	return "json";
}

function bigintReplacer(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value;
}

function toIsoString(raw: unknown): string | null {
	if (raw instanceof Date) return raw.toISOString();
	if (typeof raw === "number") return new Date(raw).toISOString();
	if (typeof raw === "bigint") return new Date(Number(raw)).toISOString();
	if (typeof raw === "string") return raw;
	return null;
}

/**
 * Convert a raw Arrow cell into a {@link SqlValue} for the given column type.
 *
 * - int64: safe integers become numbers, larger values decimal strings
 * - timestamp: ISO-8601 string; date: `YYYY-MM-DD`
 * - bool: Int8 cells (see {@link ARROW_WRITE_TYPE}) are mapped back to true/false
 * - json: strings pass through, anything else is serialised
 */
export function normaliseCell(raw: unknown, type: ColumnType): SqlValue {
	if (raw === null || raw === undefined) return null;

	switch (type) {
		case "string":
			return String(raw);
		case "int64": {
			if (typeof raw === "bigint") {
				return raw >= BigInt(Number.MIN_SAFE_INTEGER) && raw <= BigInt(Number.MAX_SAFE_INTEGER)
					? Number(raw)
					: raw.toString();
			}
			return typeof raw === "number" ? raw : String(raw);
		}
		case "float64":
			return typeof raw === "number" ? raw : Number(raw);
		case "bool":
			return typeof raw === "number" ? raw !== 0 : Boolean(raw);
		case "timestamp":
			return toIsoString(raw);
		case "date": {
			if (typeof raw === "string") return raw;
			const iso = toIsoString(raw);
			return iso === null ? null : iso.slice(0, 10);
		}
		case "json":
			return typeof raw === "string" ? raw : JSON.stringify(raw, bigintReplacer);
	}
}

/**
 * Build the Arrow vector for one column from row values.
 * int64 values are passed to Arrow as bigints; bools as 1/0.
 */
export function buildVector(column: ColumnSpec, values: SqlValue[]): arrow.Vector {
	const type = arrowWriteType(column.type);
	switch (column.type) {
		case "int64":
			return arrow.vectorFromArray(
				values.map((v) => (v === null ? null : BigInt(typeof v === "boolean" ? Number(v) : v))),
				type,
			);
		case "float64":
			return arrow.vectorFromArray(
				values.map((v) => (v === null ? null : Number(v))),
				type,
			);
		case "bool":
			return arrow.vectorFromArray(
				values.map((v) => (v === null ? null : v ? 1 : 0)),
				type,
			);
		default:
			return arrow.vectorFromArray(
				values.map((v) => (v === null ? null : String(v))),
				type,
			);
	}
}
