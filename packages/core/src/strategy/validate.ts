import { InvalidStrategyError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { isValidIdentifier } from "../validation/identifier";
import {
	MAX_CLUSTER_COLUMNS,
	STRATEGY_KINDS,
	type StrategyDescriptor,
	type StrategyKind,
} from "./types";

/** Untyped descriptor fields, as read from configuration or a typed descriptor */
interface RawFields {
	strategy: unknown;
	keyColumns: unknown;
	orderingColumn: unknown;
	partitionField: unknown;
	clusterColumns: unknown;
}

function isStrategyKind(value: unknown): value is StrategyKind {
	return typeof value === "string" && (STRATEGY_KINDS as readonly string[]).includes(value);
}

function checkColumnName(
	tableName: string,
	field: string,
	value: unknown,
): Result<string, InvalidStrategyError> {
	if (typeof value !== "string" || value.length === 0) {
		return Err(
			new InvalidStrategyError(`Table "${tableName}": ${field} must be a non-empty string`, tableName),
		);
	}
	if (!isValidIdentifier(value)) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": ${field} "${value}" is not a valid column name`,
				tableName,
			),
		);
	}
	return Ok(value);
}

function checkColumnList(
	tableName: string,
	field: string,
	value: unknown,
	requireNonEmpty: boolean,
): Result<string[], InvalidStrategyError> {
	if (value === undefined && !requireNonEmpty) {
		return Ok([]);
	}
	if (!Array.isArray(value)) {
		return Err(new InvalidStrategyError(`Table "${tableName}": ${field} must be an array`, tableName));
	}
	if (requireNonEmpty && value.length === 0) {
		return Err(
			new InvalidStrategyError(`Table "${tableName}": ${field} must not be empty`, tableName),
		);
	}

	const columns: string[] = [];
	for (const entry of value) {
		const checked = checkColumnName(tableName, field, entry);
		if (!checked.ok) return checked;
		if (columns.includes(checked.value)) {
			return Err(
				new InvalidStrategyError(
					`Table "${tableName}": ${field} lists "${checked.value}" twice`,
					tableName,
				),
			);
		}
		columns.push(checked.value);
	}
	return Ok(columns);
}

function buildDescriptor(
	tableName: string,
	raw: RawFields,
): Result<StrategyDescriptor, InvalidStrategyError> {
	if (!isValidIdentifier(tableName)) {
		return Err(new InvalidStrategyError(`"${tableName}" is not a valid table name`, tableName));
	}

	if (!isStrategyKind(raw.strategy)) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": strategy must be one of ${STRATEGY_KINDS.join(", ")}, got ${JSON.stringify(raw.strategy)}`,
				tableName,
			),
		);
	}

	const cluster = checkColumnList(tableName, "clusterColumns", raw.clusterColumns, false);
	if (!cluster.ok) return cluster;
	if (cluster.value.length > MAX_CLUSTER_COLUMNS) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": at most ${MAX_CLUSTER_COLUMNS} clusterColumns are allowed`,
				tableName,
			),
		);
	}
	const clusterColumns = Object.freeze(cluster.value);

	if (raw.strategy === "replace_partition") {
		const partitionField = checkColumnName(tableName, "partitionField", raw.partitionField);
		if (!partitionField.ok) return partitionField;
		return Ok(
			Object.freeze({
				tableName,
				kind: raw.strategy,
				partitionField: partitionField.value,
				clusterColumns,
			}),
		);
	}

	const keys = checkColumnList(tableName, "keyColumns", raw.keyColumns, true);
	if (!keys.ok) return keys;

	const ordering = checkColumnName(tableName, "orderingColumn", raw.orderingColumn);
	if (!ordering.ok) return ordering;

	if (keys.value.includes(ordering.value)) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": orderingColumn "${ordering.value}" cannot also be a key column`,
				tableName,
			),
		);
	}

	return Ok(
		Object.freeze({
			tableName,
			kind: raw.strategy,
			keyColumns: Object.freeze(keys.value),
			orderingColumn: ordering.value,
			clusterColumns,
		}),
	);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate one `tableStrategies` configuration entry and build its descriptor.
 *
 * Checks:
 * - `strategy` is one of `incremental_merge`, `replace_partition`, `upsert_scd1`
 * - merge / upsert: non-empty, duplicate-free `keyColumns` and an `orderingColumn` outside them
 * - replace: a `partitionField`
 * - every name is a valid SQL identifier; at most four `clusterColumns`
 *
 * @param tableName - Key of the entry in `tableStrategies`.
 * @param input - Raw entry to validate.
 */
export function validateStrategyConfig(
	tableName: string,
	input: unknown,
): Result<StrategyDescriptor, InvalidStrategyError> {
	if (!isPlainObject(input)) {
		return Err(
			new InvalidStrategyError(`Table "${tableName}": strategy config must be an object`, tableName),
		);
	}

	const obj = input;
	return buildDescriptor(tableName, {
		strategy: obj.strategy,
		keyColumns: obj.keyColumns,
		orderingColumn: obj.orderingColumn,
		partitionField: obj.partitionField,
		clusterColumns: obj.clusterColumns,
	});
}

/**
 * Re-check a descriptor that did not come through {@link validateStrategyConfig}.
 * Executors call this before touching any relation.
 */
export function validateDescriptor(
	descriptor: StrategyDescriptor,
): Result<StrategyDescriptor, InvalidStrategyError> {
	const keyed = descriptor.kind !== "replace_partition";
	return buildDescriptor(descriptor.tableName, {
		strategy: descriptor.kind,
		keyColumns: keyed ? descriptor.keyColumns : undefined,
		orderingColumn: keyed ? descriptor.orderingColumn : undefined,
		partitionField: keyed ? undefined : descriptor.partitionField,
		clusterColumns: descriptor.clusterColumns,
	});
}
