import {
	BigQueryWarehouse,
	type LakeAdapter,
	S3LakeAdapter,
	SqliteWarehouse,
	type Warehouse,
} from "@silverline/adapter";
import { type AdapterError, Logger, Ok, type Result } from "@silverline/core";
import {
	IngestionCoordinator,
	PartitionLocator,
	type SilverlineConfig,
	StagingLoader,
	type StrategyRegistry,
	TargetRelationManager,
	type WarehouseConfig,
} from "@silverline/ingest";

/** Stand-ins for the external systems; anything omitted is built from configuration. */
export interface RuntimeOverrides {
	lake?: LakeAdapter;
	warehouse?: Warehouse;
	/** Log line sink; stderr by default so stdout carries only command output */
	writeLog?: (line: string) => void;
}

/** Everything one CLI invocation needs to run an ingestion */
export interface Runtime {
	coordinator: IngestionCoordinator;
	warehouse: Warehouse;
	logger: Logger;
	/** Close the warehouse, if this runtime opened it. */
	close(): Promise<Result<void, AdapterError>>;
}

/** Open the configured warehouse. */
export async function openWarehouse(config: WarehouseConfig): Promise<Result<Warehouse, AdapterError>> {
	switch (config.type) {
		case "bigquery":
			return Ok(
				new BigQueryWarehouse({
					projectId: config.projectId,
					keyFilename: config.keyFilename,
					location: config.location,
				}),
			);
		case "sqlite":
			return SqliteWarehouse.open({ path: config.path });
	}
}

/**
 * Wire the bronze store, the warehouse and the ingestion components
 * from a validated configuration.
 */
export async function createRuntime(
	config: SilverlineConfig,
	registry: StrategyRegistry,
	overrides: RuntimeOverrides = {},
): Promise<Result<Runtime, AdapterError>> {
	const writeLog = overrides.writeLog ?? ((line: string) => process.stderr.write(`${line}\n`));
	const logger = new Logger(config.logLevel, { service: "silverline" }, writeLog);

	let warehouse = overrides.warehouse;
	const ownsWarehouse = warehouse === undefined;
	if (!warehouse) {
		const result = await openWarehouse(config.warehouse);
		if (!result.ok) return result;
		warehouse = result.value;
	}
	const target = warehouse;

	const lake =
		overrides.lake ??
		new S3LakeAdapter({
			endpoint: config.bronze.endpoint,
			bucket: config.bronze.bucket,
			region: config.bronze.region,
			credentials: config.bronze.credentials,
		});

	const { ingestion } = config;
	const coordinator = new IngestionCoordinator(
		{
			registry,
			locator: new PartitionLocator(lake, {
				prefix: config.bronze.prefix,
				sourceDatabase: config.bronze.sourceDatabase,
			}),
			loader: new StagingLoader(lake, target, { insertBatchSize: ingestion.insertBatchSize }),
			targets: new TargetRelationManager(target, config.warehouse.silverDataset, logger),
			warehouse: target,
			logger,
		},
		{
			stagingDataset: config.warehouse.stagingDataset,
			parallelism: ingestion.parallelism,
			timeouts: ingestion.timeouts,
		},
	);

	return Ok({
		coordinator,
		warehouse: target,
		logger,
		close: async () => (ownsWarehouse ? target.close() : Ok(undefined)),
	});
}
