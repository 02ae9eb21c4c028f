import { type ColumnSpec, type ColumnType, quoteBacktick, type RelationRef, type Row } from "@silverline/core";
import {
	cellParam,
	latestPerKeySubquery,
	type MergePlan,
	type PartitionWrite,
	type SqlStatement,
	type TargetDefinition,
	type WarehouseDialect,
} from "./warehouse";

/** BigQuery column type for each column type */
export function columnTypeToBigQuery(type: ColumnType): string {
	switch (type) {
		case "string":
			return "STRING";
		case "int64":
			return "INT64";
		case "float64":
			return "FLOAT64";
		case "bool":
			return "BOOL";
		case "timestamp":
			return "TIMESTAMP";
		case "date":
			return "DATE";
		case "json":
			return "JSON";
	}
}

/**
 * Parameter type a cell is bound with. Timestamps, dates and JSON travel
 * as strings and are converted in SQL (see {@link cellExpression}).
 */
function parameterType(type: ColumnType): string {
	switch (type) {
		case "int64":
			return "INT64";
		case "float64":
			return "FLOAT64";
		case "bool":
			return "BOOL";
		default:
			return "STRING";
	}
}

function cellExpression(param: string, type: ColumnType): string {
	switch (type) {
		case "timestamp":
			return `CAST(@${param} AS TIMESTAMP)`;
		case "date":
			return `CAST(@${param} AS DATE)`;
		case "json":
			return `PARSE_JSON(@${param})`;
		default:
			return `@${param}`;
	}
}

const q = quoteBacktick;

function relation(ref: RelationRef): string {
	return q(`${ref.dataset}.${ref.table}`);
}

function columnDefinitions(columns: ColumnSpec[]): string {
	return columns.map((c) => `\t${q(c.name)} ${columnTypeToBigQuery(c.type)}`).join(",\n");
}

/** Staging tables expire on their own if a run dies before dropping them */
const STAGING_EXPIRY = "OPTIONS (expiration_timestamp = TIMESTAMP_ADD(CURRENT_TIMESTAMP(), INTERVAL 1 DAY))";

/** BigQuery caps the number of query parameters per statement */
const BIGQUERY_MAX_PARAMETERS = 10_000;

/** GoogleSQL rendering of the warehouse statements. */
export class BigQueryDialect implements WarehouseDialect {
	readonly maxParameters = BIGQUERY_MAX_PARAMETERS;

	createStaging(ref: RelationRef, columns: ColumnSpec[]): SqlStatement {
		return {
			sql: `CREATE TABLE ${relation(ref)} (\n${columnDefinitions(columns)}\n)\n${STAGING_EXPIRY}`,
			params: {},
		};
	}

	insertRows(ref: RelationRef, columns: ColumnSpec[], rows: Row[]): SqlStatement {
		const params: SqlStatement["params"] = {};
		const types: Record<string, string> = {};
		const tuples: string[] = [];

		for (let r = 0; r < rows.length; r++) {
			const row = rows[r] ?? {};
			const cells: string[] = [];
			for (let c = 0; c < columns.length; c++) {
				const column = columns[c];
				if (!column) continue;
				const name = cellParam(r, c);
				params[name] = row[column.name] ?? null;
				types[name] = parameterType(column.type);
				cells.push(cellExpression(name, column.type));
			}
			tuples.push(`(${cells.join(", ")})`);
		}

		const cols = columns.map((c) => q(c.name)).join(", ");
		return {
			sql: `INSERT INTO ${relation(ref)} (${cols}) VALUES\n${tuples.join(",\n")}`,
			params,
			types,
		};
	}

	dropRelation(ref: RelationRef): SqlStatement {
		return { sql: `DROP TABLE IF EXISTS ${relation(ref)}`, params: {} };
	}

	createTarget(definition: TargetDefinition): SqlStatement {
		const clauses = [
			`CREATE TABLE IF NOT EXISTS ${relation(definition.relation)} (\n${columnDefinitions(definition.columns)}\n)`,
		];
		const spec = definition.partitionSpec;
		if (spec.type === "column") {
			clauses.push(`PARTITION BY ${q(spec.column)}`);
		} else if (spec.type === "date_of") {
			clauses.push(`PARTITION BY DATE(${q(spec.column)})`);
		}
		if (definition.clusterColumns.length > 0) {
			clauses.push(`CLUSTER BY ${definition.clusterColumns.map(q).join(", ")}`);
		}
		return { sql: clauses.join("\n"), params: {} };
	}

	mergeLatest(plan: MergePlan): SqlStatement[] {
		const ord = q(plan.orderingColumn);
		const on = plan.keyColumns.map((k) => `T.${q(k)} IS NOT DISTINCT FROM S.${q(k)}`).join(" AND ");
		const newer =
			plan.mode === "upsert" ? `(T.${ord} IS NULL OR T.${ord} < S.${ord})` : `T.${ord} < S.${ord}`;
		const updated =
			plan.mode === "upsert"
				? plan.columns
				: plan.columns.filter((c) => !plan.keyColumns.includes(c.name));
		const set = updated.map((c) => `${q(c.name)} = S.${q(c.name)}`).join(", ");
		const cols = plan.columns.map((c) => q(c.name));

		const sql = `MERGE ${relation(plan.target)} AS T
USING (
${latestPerKeySubquery(plan, q, relation)}
) AS S
ON ${on}
WHEN MATCHED AND ${newer} THEN UPDATE SET ${set}
WHEN NOT MATCHED THEN INSERT (${cols.join(", ")}) VALUES (${cols.map((c) => `S.${c}`).join(", ")})`;

		return [{ sql, params: {} }];
	}

	deletePartition(write: PartitionWrite): SqlStatement {
		return {
			sql: `DELETE FROM ${relation(write.target)} WHERE ${q(write.partitionField)} = @logical_date`,
			params: { logical_date: write.logicalDate },
			types: { logical_date: "DATE" },
		};
	}

	insertPartition(write: PartitionWrite): SqlStatement {
		const cols = write.columns.map((c) => q(c.name));
		const targetCols = [...cols, q(write.partitionField)].join(", ");
		return {
			sql: `INSERT INTO ${relation(write.target)} (${targetCols})
SELECT ${[...cols, "@logical_date"].join(", ")} FROM ${relation(write.staging)}`,
			params: { logical_date: write.logicalDate },
			types: { logical_date: "DATE" },
		};
	}
}
