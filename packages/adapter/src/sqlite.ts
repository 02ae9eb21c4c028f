import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import {
	type AdapterError,
	Ok,
	type Result,
	type Row,
	type SqlValue,
} from "@silverline/core";
import type { BindParams, Database, QueryExecResult } from "sql.js";
import initSqlJs from "sql.js";
import { throwIfAborted, wrapAsync } from "./shared";
import { SqliteDialect } from "./sqlite-dialect";
import type { SqlStatement, Warehouse } from "./warehouse";

/** Configuration for the local SQLite warehouse */
export interface SqliteWarehouseConfig {
	/** Database file; loaded on open and written on close. In-memory only when omitted. */
	path?: string;
}

/** Bind `@name` parameters; sql.js has no boolean type. */
function toBindParams(params: Record<string, SqlValue>): BindParams {
	const bound: Record<string, string | number | null> = {};
	for (const [name, value] of Object.entries(params)) {
		bound[`@${name}`] = typeof value === "boolean" ? (value ? 1 : 0) : value;
	}
	return bound;
}

/** Map sql.js query results into keyed row objects */
function mapResultRows(results: QueryExecResult[]): Row[] {
	const first = results[0];
	if (!first) {
		return [];
	}
	const { columns, values } = first;
	return values.map((cells) => {
		const row: Row = {};
		for (let i = 0; i < columns.length; i++) {
			const column = columns[i];
			if (column === undefined) continue;
			const value = cells[i] ?? null;
			row[column] = value instanceof Uint8Array ? Buffer.from(value).toString("base64") : value;
		}
		return row;
	});
}

/**
 * Local warehouse backed by sql.js (SQLite compiled to WASM).
 *
 * Runs the same pipeline as BigQuery for development and in-process tests.
 * Datasets are name prefixes; partitioning and clustering are not applied.
 */
export class SqliteWarehouse implements Warehouse {
	readonly dialect = new SqliteDialect();
	readonly #db: Database;
	readonly #path: string | undefined;

	private constructor(db: Database, path: string | undefined) {
		this.#db = db;
		this.#path = path;
	}

	/**
	 * Open a warehouse, loading the database file when `path` exists.
	 */
	static async open(config: SqliteWarehouseConfig = {}): Promise<Result<SqliteWarehouse, AdapterError>> {
		return wrapAsync(async () => {
			const SQL = await initSqlJs();
			const path = config.path;
			const data = path && existsSync(path) ? await readFile(path) : null;
			const db = data ? new SQL.Database(data) : new SQL.Database();
			return new SqliteWarehouse(db, path);
		}, `Failed to open SQLite warehouse${config.path ? ` "${config.path}"` : ""}`);
	}

	async execute(statement: SqlStatement, signal?: AbortSignal): Promise<Result<number, AdapterError>> {
		return wrapAsync(async () => {
			throwIfAborted(signal, "SQLite statement");
			const before = this.#db.exec("SELECT total_changes()");
			this.#db.run(statement.sql, toBindParams(statement.params));
			const after = this.#db.exec("SELECT total_changes()");
			return Number(after[0]?.values[0]?.[0] ?? 0) - Number(before[0]?.values[0]?.[0] ?? 0);
		}, "SQLite statement failed");
	}

	async query(statement: SqlStatement, signal?: AbortSignal): Promise<Result<Row[], AdapterError>> {
		return wrapAsync(async () => {
			throwIfAborted(signal, "SQLite query");
			return mapResultRows(this.#db.exec(statement.sql, toBindParams(statement.params)));
		}, "SQLite query failed");
	}

	/** No-op: datasets are name prefixes. */
	async ensureDatasets(_datasets: string[]): Promise<Result<void, AdapterError>> {
		return Ok(undefined);
	}

	/** Write the database to its file. No-op for an in-memory warehouse. */
	async save(): Promise<Result<void, AdapterError>> {
		const path = this.#path;
		if (!path) {
			return Ok(undefined);
		}
		return wrapAsync(
			() => writeFile(path, this.#db.export()),
			`Failed to save SQLite warehouse "${path}"`,
		);
	}

	/**
	 * Persist to the database file, when configured, and close.
	 * The database is closed even when saving fails.
	 */
	async close(): Promise<Result<void, AdapterError>> {
		const saved = await this.save();
		this.#db.close();
		return saved;
	}
}
