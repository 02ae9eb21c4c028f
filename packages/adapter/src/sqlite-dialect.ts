import {
	type ColumnSpec,
	type ColumnType,
	quoteIdentifier,
	type RelationRef,
	type Row,
} from "@silverline/core";
import {
	cellParam,
	latestPerKeySubquery,
	type MergePlan,
	type PartitionWrite,
	type SqlStatement,
	type TargetDefinition,
	type WarehouseDialect,
} from "./warehouse";

/** SQLite storage class for each column type; timestamps and dates stay ISO text */
export function columnTypeToSqlite(type: ColumnType): string {
	switch (type) {
		case "int64":
		case "bool":
			return "INTEGER";
		case "float64":
			return "REAL";
		default:
			return "TEXT";
	}
}

const q = quoteIdentifier;

/** SQLite has no datasets; `dataset.table` becomes a single quoted name */
function relation(ref: RelationRef): string {
	return q(`${ref.dataset}.${ref.table}`);
}

function columnDefinitions(columns: ColumnSpec[]): string {
	return columns.map((c) => `\t${q(c.name)} ${columnTypeToSqlite(c.type)}`).join(",\n");
}

/** SQLite's historical SQLITE_MAX_VARIABLE_NUMBER */
const SQLITE_MAX_PARAMETERS = 999;

/**
 * SQLite rendering of the warehouse statements, for local runs and tests.
 * No partitioning or clustering; merges become UPDATE ... FROM plus
 * INSERT ... WHERE NOT EXISTS.
 */
export class SqliteDialect implements WarehouseDialect {
	readonly maxParameters = SQLITE_MAX_PARAMETERS;

	createStaging(ref: RelationRef, columns: ColumnSpec[]): SqlStatement {
		return { sql: `CREATE TABLE ${relation(ref)} (\n${columnDefinitions(columns)}\n)`, params: {} };
	}

	insertRows(ref: RelationRef, columns: ColumnSpec[], rows: Row[]): SqlStatement {
		const params: SqlStatement["params"] = {};
		const tuples: string[] = [];
		for (let r = 0; r < rows.length; r++) {
			const row = rows[r] ?? {};
			const cells: string[] = [];
			for (let c = 0; c < columns.length; c++) {
				const column = columns[c];
				if (!column) continue;
				const name = cellParam(r, c);
				params[name] = row[column.name] ?? null;
				cells.push(`@${name}`);
			}
			tuples.push(`(${cells.join(", ")})`);
		}
		const cols = columns.map((c) => q(c.name)).join(", ");
		return {
			sql: `INSERT INTO ${relation(ref)} (${cols}) VALUES\n${tuples.join(",\n")}`,
			params,
		};
	}

	dropRelation(ref: RelationRef): SqlStatement {
		return { sql: `DROP TABLE IF EXISTS ${relation(ref)}`, params: {} };
	}

	createTarget(definition: TargetDefinition): SqlStatement {
		return {
			sql: `CREATE TABLE IF NOT EXISTS ${relation(definition.relation)} (\n${columnDefinitions(definition.columns)}\n)`,
			params: {},
		};
	}

	mergeLatest(plan: MergePlan): SqlStatement[] {
		const target = relation(plan.target);
		const latest = latestPerKeySubquery(plan, q, relation);
		const ord = q(plan.orderingColumn);
		const keyMatch = plan.keyColumns.map((k) => `T.${q(k)} IS S.${q(k)}`).join(" AND ");
		const newer =
			plan.mode === "upsert" ? `(T.${ord} IS NULL OR T.${ord} < S.${ord})` : `T.${ord} < S.${ord}`;
		const updated =
			plan.mode === "upsert"
				? plan.columns
				: plan.columns.filter((c) => !plan.keyColumns.includes(c.name));
		const set = updated.map((c) => `${q(c.name)} = S.${q(c.name)}`).join(", ");
		const cols = plan.columns.map((c) => q(c.name)).join(", ");

		return [
			{
				sql: `UPDATE ${target} AS T SET ${set}
FROM (
${latest}
) AS S
WHERE ${keyMatch} AND ${newer}`,
				params: {},
			},
			{
				sql: `INSERT INTO ${target} (${cols})
SELECT ${cols} FROM (
${latest}
) AS S
WHERE NOT EXISTS (SELECT 1 FROM ${target} AS T WHERE ${keyMatch})`,
				params: {},
			},
		];
	}

	deletePartition(write: PartitionWrite): SqlStatement {
		return {
			sql: `DELETE FROM ${relation(write.target)} WHERE ${q(write.partitionField)} = @logical_date`,
			params: { logical_date: write.logicalDate },
		};
	}

	insertPartition(write: PartitionWrite): SqlStatement {
		const cols = write.columns.map((c) => q(c.name));
		const targetCols = [...cols, q(write.partitionField)].join(", ");
		return {
			sql: `INSERT INTO ${relation(write.target)} (${targetCols})
SELECT ${[...cols, "@logical_date"].join(", ")} FROM ${relation(write.staging)}`,
			params: { logical_date: write.logicalDate },
		};
	}
}
