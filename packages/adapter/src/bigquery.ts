import { BigQuery, type Job } from "@google-cloud/bigquery";
import { AdapterError, Ok, type Result, type Row, type SqlValue } from "@silverline/core";
import { BigQueryDialect } from "./bigquery-dialect";
import { throwIfAborted, toCause, wrapAsync } from "./shared";
import type { SqlStatement, Warehouse } from "./warehouse";

/**
 * Configuration for the BigQuery warehouse.
 * Unlike SQL adapters, BigQuery is HTTP-based; no connection string is needed.
 */
export interface BigQueryWarehouseConfig {
	/** GCP project ID. */
	projectId: string;
	/** Path to a service account JSON key file. Falls back to ADC if omitted. */
	keyFilename?: string;
	/** Dataset and job location (default: "US"). */
	location?: string;
}

/** Read `statistics.query.numDmlAffectedRows` from job metadata; 0 when absent. */
export function affectedRowsFrom(metadata: unknown): number {
	if (typeof metadata !== "object" || metadata === null) return 0;
	const statistics: unknown = Reflect.get(metadata, "statistics");
	if (typeof statistics !== "object" || statistics === null) return 0;
	const query: unknown = Reflect.get(statistics, "query");
	if (typeof query !== "object" || query === null) return 0;
	const affected: unknown = Reflect.get(query, "numDmlAffectedRows");
	const count = Number(affected ?? 0);
	return Number.isFinite(count) ? count : 0;
}

/**
 * Convert a value returned by the BigQuery client into a scalar.
 * TIMESTAMP, DATE, NUMERIC and large INT64 values arrive as `{ value: string }` wrappers.
 */
export function fromBigQueryValue(value: unknown): SqlValue {
	if (value === null || value === undefined) return null;
	if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		return value;
	}
	if (typeof value === "bigint") return value.toString();
	if (typeof value === "object" && "value" in value) {
		const inner: unknown = value.value;
		if (typeof inner === "string") return inner;
	}
	return JSON.stringify(value);
}

/**
 * BigQuery warehouse.
 *
 * Every statement runs as a query job so DML row counts can be read from
 * the job statistics and an aborted step can cancel its job. All public
 * methods return `Result` and never throw.
 *
 * **Note:** BigQuery DML is limited to 1,500 statements per table per day
 * on standard tables. Query latency is seconds, not milliseconds.
 */
export class BigQueryWarehouse implements Warehouse {
	/** @internal */
	readonly client: BigQuery;
	/** @internal */
	readonly location: string;
	readonly dialect = new BigQueryDialect();

	constructor(config: BigQueryWarehouseConfig) {
		this.client = new BigQuery({
			projectId: config.projectId,
			keyFilename: config.keyFilename,
		});
		this.location = config.location ?? "US";
	}

	/** Run a DML or DDL statement and return the affected row count. */
	async execute(statement: SqlStatement, signal?: AbortSignal): Promise<Result<number, AdapterError>> {
		return wrapAsync(async () => {
			const job = await this.runJob(statement, signal);
			const [metadata] = await job.getMetadata();
			return affectedRowsFrom(metadata);
		}, "BigQuery statement failed");
	}

	/** Run a query and return its rows as scalars. */
	async query(statement: SqlStatement, signal?: AbortSignal): Promise<Result<Row[], AdapterError>> {
		return wrapAsync(async () => {
			const job = await this.runJob(statement, signal);
			const [rows] = await job.getQueryResults();
			return rows.map((raw: Record<string, unknown>) => {
				const row: Row = {};
				for (const [key, value] of Object.entries(raw)) {
					row[key] = fromBigQueryValue(value);
				}
				return row;
			});
		}, "BigQuery query failed");
	}

	/** Create any of the named datasets that do not exist, in this warehouse's location. */
	async ensureDatasets(datasets: string[]): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			for (const name of new Set(datasets)) {
				const [exists] = await this.client.dataset(name).exists();
				if (!exists) {
					await this.client.createDataset(name, { location: this.location });
				}
			}
		}, "Failed to ensure datasets");
	}

	/**
	 * No-op; the BigQuery client is HTTP-based with no persistent connections.
	 */
	async close(): Promise<Result<void, AdapterError>> {
		return Ok(undefined);
	}

	/** Start a query job, wait for it, and cancel it if `signal` fires first. */
	private async runJob(statement: SqlStatement, signal?: AbortSignal): Promise<Job> {
		throwIfAborted(signal, "BigQuery statement");

		const [job] = await this.client.createQueryJob({
			query: statement.sql,
			params: statement.params,
			types: statement.types,
			location: this.location,
		});

		const cancellations: Array<Promise<Error | undefined>> = [];
		const onAbort = (): void => {
			const cancellation = job.cancel().then(
				() => undefined,
				(error: unknown) => toCause(error),
			);
			cancellations.push(cancellation);
		};
		signal?.addEventListener("abort", onAbort, { once: true });
		try {
			await job.getQueryResults({ maxResults: 0 });
		} finally {
			signal?.removeEventListener("abort", onAbort);
		}

		const [cancellation] = cancellations;
		if (cancellation) {
			throw new AdapterError(`BigQuery job ${job.id ?? ""} cancelled`, await cancellation);
		}
		throwIfAborted(signal, "BigQuery statement");
		return job;
	}
}
