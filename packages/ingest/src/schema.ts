import {
	type ColumnSpec,
	Err,
	INTERNAL_COLUMNS,
	isValidIdentifier,
	Ok,
	ParquetError,
	type Result,
	SchemaConflictError,
} from "@silverline/core";

/** The columns one bronze file declares */
export interface FileSchema {
	file: string;
	columns: ColumnSpec[];
}

/**
 * Check that every column name of a file can be used as a SQL identifier
 * and does not collide with the loader's internal columns.
 */
export function checkColumnNames(schema: FileSchema): Result<void, ParquetError> {
	for (const column of schema.columns) {
		if (!isValidIdentifier(column.name)) {
			return Err(new ParquetError(`${schema.file}: column "${column.name}" is not a valid column name`));
		}
		if (INTERNAL_COLUMNS.has(column.name)) {
			return Err(new ParquetError(`${schema.file}: column "${column.name}" is reserved`));
		}
	}
	return Ok(undefined);
}

/**
 * Union of the files' columns in first-seen order.
 *
 * A column keeps one type across files, except that `int64` and `float64`
 * widen to `float64`. Any other disagreement is a SchemaConflictError naming
 * the file that introduced the column and the file that contradicts it.
 * Columns absent from a file load as NULL for that file's rows.
 */
export function unifySchemas(schemas: FileSchema[]): Result<ColumnSpec[], SchemaConflictError> {
	const unified: ColumnSpec[] = [];
	const introducedBy = new Map<string, { index: number; file: string }>();

	for (const { file, columns } of schemas) {
		for (const column of columns) {
			const seen = introducedBy.get(column.name);
			if (!seen) {
				introducedBy.set(column.name, { index: unified.length, file });
				unified.push({ name: column.name, type: column.type });
				continue;
			}

			const current = unified[seen.index];
			if (!current || current.type === column.type) continue;

			const numeric = new Set([current.type, column.type]);
			if (numeric.size === 2 && numeric.has("int64") && numeric.has("float64")) {
				current.type = "float64";
				continue;
			}

			return Err(
				new SchemaConflictError(
					`Column "${column.name}" is ${current.type} in ${seen.file} but ${column.type} in ${file}`,
					[seen.file, file],
					column.name,
				),
			);
		}
	}

	return Ok(unified);
}
