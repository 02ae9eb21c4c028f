import { randomUUID } from "node:crypto";
import type { Warehouse } from "@silverline/adapter";
import {
	CancelledError,
	compactLogicalDate,
	type IngestionOutcome,
	type Logger,
	type LogicalDate,
	type OutcomeError,
	type RelationRef,
	RunInProgressError,
	SchemaConflictError,
	type SilverlineError,
	type SkipReason,
	type StrategyDescriptor,
	silentLogger,
	toError,
} from "@silverline/core";
import type { StepTimeouts } from "./config";
import { executorFor } from "./executors";
import type { PartitionLocator } from "./locator";
import { mapWithConcurrency } from "./pool";
import type { StrategyRegistry } from "./registry";
import type { StagingLoader } from "./staging-loader";
import { summariseOutcomes } from "./summary";
import type { TargetRelationManager } from "./target-manager";
import { settleWithin, withTimeout } from "./timeout";

/** Collaborators of the coordinator, built once per process */
export interface CoordinatorDeps {
	registry: StrategyRegistry;
	locator: PartitionLocator;
	loader: StagingLoader;
	targets: TargetRelationManager;
	warehouse: Warehouse;
	logger?: Logger;
}

export interface CoordinatorConfig {
	/** Dataset that holds transient staging relations */
	stagingDataset: string;
	/** Tables processed at the same time */
	parallelism: number;
	timeouts: StepTimeouts;
}

export interface RunOptions {
	/** Tables to ingest, in outcome order; defaults to every configured table */
	tables?: string[];
	/** Cancels the run: tables not yet started fail, in-flight steps stop waiting */
	signal?: AbortSignal;
}

/** Table-scoped transient relation name: `{table}__stg_{yyyymmdd}_{runId}` */
export function stagingRelationName(tableName: string, date: LogicalDate, runId: string): string {
	return `${tableName}__stg_${compactLogicalDate(date)}_${runId}`;
}

interface TableRun {
	tableName: string;
	descriptor: StrategyDescriptor;
	logicalDate: LogicalDate;
	runId: string;
	logger: Logger;
	signal?: AbortSignal;
	/** Steps that outlived their timeout or the run's cancellation and are still running */
	abandoned: Array<Promise<unknown>>;
	/** Staging relation whose drop waits for the abandoned steps */
	deferredDrop?: RelationRef;
}

/**
 * Runs one logical date across tables.
 *
 * Tables proceed independently, at most `parallelism` at a time; within a
 * table the steps are strictly sequential: locate, load, apply, cleanup.
 * Each step runs under its own timeout. A (table, date) pair already being
 * ingested by this coordinator fails with RunInProgressError.
 *
 * `run` never rejects and yields exactly one outcome per requested table,
 * in request order. Whether a failed table fails the process is the
 * caller's decision.
 */
export class IngestionCoordinator {
	private readonly deps: CoordinatorDeps;
	private readonly config: CoordinatorConfig;
	private readonly logger: Logger;
	private readonly active = new Set<string>();

	constructor(deps: CoordinatorDeps, config: CoordinatorConfig) {
		this.deps = deps;
		this.config = config;
		this.logger = deps.logger ?? silentLogger;
	}

	async run(logicalDate: LogicalDate, options: RunOptions = {}): Promise<IngestionOutcome[]> {
		const runId = randomUUID().replace(/-/g, "").slice(0, 8);
		const tables = [...new Set(options.tables ?? this.deps.registry.tables())];
		const logger = this.logger.child({ runId, logicalDate });

		logger.info("run started", { tables: tables.length, parallelism: this.config.parallelism });

		const outcomes = await mapWithConcurrency(tables, this.config.parallelism, async (tableName) => {
			const started = Date.now();
			try {
				return await this.runTable(tableName, logicalDate, runId, logger, options.signal);
			} catch (error) {
				const cause = toError(error);
				const outcome = failedOutcome(tableName, logicalDate, started, 0, {
					code: "INTERNAL_ERROR",
					message: cause.message,
				});
				logger.error("table failed", { table: tableName, code: "INTERNAL_ERROR", error: cause });
				return outcome;
			}
		});

		logger.info("run finished", { ...summariseOutcomes(logicalDate, outcomes) });
		return outcomes;
	}

	private async runTable(
		tableName: string,
		logicalDate: LogicalDate,
		runId: string,
		runLogger: Logger,
		signal?: AbortSignal,
	): Promise<IngestionOutcome> {
		const started = Date.now();
		const logger = runLogger.child({ table: tableName });

		const resolved = this.deps.registry.resolve(tableName);
		if (!resolved.ok) {
			logger.info("table skipped", { reason: "not_configured" });
			return skippedOutcome(tableName, logicalDate, started, "not_configured");
		}
		const descriptor = resolved.value;

		if (signal?.aborted) {
			return this.reportFailure(logger, descriptor, logicalDate, started, 0, new CancelledError());
		}

		const key = `${tableName}@${logicalDate}`;
		if (this.active.has(key)) {
			const error = new RunInProgressError(
				`Table "${tableName}" is already being ingested for ${logicalDate}`,
			);
			return this.reportFailure(logger, descriptor, logicalDate, started, 0, error);
		}

		this.active.add(key);
		const table: TableRun = { tableName, descriptor, logicalDate, runId, logger, signal, abandoned: [] };
		try {
			return await this.ingest(table, started);
		} finally {
			if (table.abandoned.length === 0) {
				this.active.delete(key);
			} else {
				void this.finishAbandoned(key, table);
			}
		}
	}

	/**
	 * Once every abandoned step has settled, drop the staging relation it was
	 * writing and release the (table, date) key.
	 */
	private async finishAbandoned(key: string, table: TableRun): Promise<void> {
		try {
			await Promise.allSettled(table.abandoned);
			if (table.deferredDrop) await this.dropStaging(table.deferredDrop, table.logger);
		} catch (error) {
			table.logger.error("deferred staging cleanup failed", { error: toError(error) });
		} finally {
			this.active.delete(key);
		}
	}

	private async ingest(table: TableRun, started: number): Promise<IngestionOutcome> {
		const { tableName, descriptor, logicalDate, logger, signal } = table;
		const { timeouts } = this.config;

		const abandon = (pending: Promise<unknown>): void => {
			table.abandoned.push(pending);
		};

		const located = await withTimeout(
			"locate",
			timeouts.locateMs,
			signal,
			(s) => this.deps.locator.locate(tableName, logicalDate, s),
			abandon,
		);
		if (!located.ok) {
			return this.reportFailure(logger, descriptor, logicalDate, started, 0, located.error);
		}
		const partition = located.value;
		const filesProcessed = partition.files.length;
		logger.debug("partition located", { files: filesProcessed });

		const staging: RelationRef = {
			dataset: this.config.stagingDataset,
			table: stagingRelationName(tableName, logicalDate, table.runId),
		};

		try {
			const loaded = await withTimeout(
				"load",
				timeouts.loadMs,
				signal,
				(s) => this.deps.loader.load(partition, staging, s),
				abandon,
			);
			if (!loaded.ok) {
				return this.reportFailure(logger, descriptor, logicalDate, started, filesProcessed, loaded.error);
			}
			if (loaded.value.empty) {
				logger.info("table skipped", { reason: "no_files" });
				return skippedOutcome(tableName, logicalDate, started, "no_files", descriptor);
			}
			logger.debug("staging loaded", { relation: staging.table, rows: loaded.value.rowCount });

			const executor = executorFor(descriptor.kind);
			const applied = await withTimeout(
				"apply",
				timeouts.applyMs,
				signal,
				(s) =>
					executor.apply(
						{ tableName, staging: loaded.value, descriptor, logicalDate, signal: s },
						{ warehouse: this.deps.warehouse, targets: this.deps.targets, logger },
					),
				abandon,
			);
			if (!applied.ok) {
				return this.reportFailure(logger, descriptor, logicalDate, started, filesProcessed, applied.error);
			}

			const outcome: IngestionOutcome = {
				tableName,
				logicalDate,
				status: "success",
				rowsAffected: applied.value,
				strategy: descriptor.kind,
				filesProcessed,
				durationMs: Date.now() - started,
			};
			logger.info("table ingested", {
				strategy: descriptor.kind,
				files: filesProcessed,
				rowsAffected: applied.value,
				durationMs: outcome.durationMs,
			});
			return outcome;
		} finally {
			if (filesProcessed > 0) await this.releaseStaging(table, staging);
		}
	}

	/**
	 * Drop the staging relation unless a step that outlived its budget may still
	 * be writing to it. Such steps get `graceMs` to settle; after that the drop
	 * is deferred until they do.
	 */
	private async releaseStaging(table: TableRun, staging: RelationRef): Promise<void> {
		const settled = await settleWithin(table.abandoned, this.config.timeouts.graceMs);
		if (settled) {
			table.abandoned.length = 0;
			await this.dropStaging(staging, table.logger);
			return;
		}
		table.logger.warn("staging drop deferred", {
			relation: `${staging.dataset}.${staging.table}`,
			graceMs: this.config.timeouts.graceMs,
		});
		table.deferredDrop = staging;
	}

	/** Drop the staging relation under its own budget; failures are logged only. */
	private async dropStaging(staging: RelationRef, logger: Logger): Promise<void> {
		const { warehouse } = this.deps;
		const dropped = await withTimeout("cleanup", this.config.timeouts.cleanupMs, undefined, (s) =>
			warehouse.execute(warehouse.dialect.dropRelation(staging), s),
		);
		if (!dropped.ok) {
			logger.warn("staging cleanup failed", {
				relation: `${staging.dataset}.${staging.table}`,
				code: dropped.error.code,
				error: dropped.error.message,
			});
		}
	}

	private reportFailure(
		logger: Logger,
		descriptor: StrategyDescriptor,
		logicalDate: LogicalDate,
		started: number,
		filesProcessed: number,
		error: SilverlineError,
	): IngestionOutcome {
		const outcome = failedOutcome(
			descriptor.tableName,
			logicalDate,
			started,
			filesProcessed,
			outcomeError(error),
			descriptor,
		);
		logger.error("table failed", { code: error.code, error: error.message, files: filesProcessed });
		return outcome;
	}
}

function outcomeError(error: SilverlineError): OutcomeError {
	if (error instanceof SchemaConflictError) {
		return { code: error.code, message: error.message, files: [...error.files] };
	}
	return { code: error.code, message: error.message };
}

function skippedOutcome(
	tableName: string,
	logicalDate: LogicalDate,
	started: number,
	skipReason: SkipReason,
	descriptor?: StrategyDescriptor,
): IngestionOutcome {
	return {
		tableName,
		logicalDate,
		status: "skipped",
		rowsAffected: 0,
		strategy: descriptor?.kind,
		filesProcessed: 0,
		durationMs: Date.now() - started,
		skipReason,
	};
}

function failedOutcome(
	tableName: string,
	logicalDate: LogicalDate,
	started: number,
	filesProcessed: number,
	error: OutcomeError,
	descriptor?: StrategyDescriptor,
): IngestionOutcome {
	return {
		tableName,
		logicalDate,
		status: "failed",
		rowsAffected: 0,
		strategy: descriptor?.kind,
		filesProcessed,
		durationMs: Date.now() - started,
		error,
	};
}
