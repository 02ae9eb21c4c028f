export {
	applyEnvOverrides,
	type BigQueryConfig,
	type BronzeConfig,
	DEFAULT_CONFIG_PATH,
	DEFAULT_INGESTION,
	DEFAULT_TIMEOUTS,
	type IngestionSettings,
	loadConfig,
	type SilverlineConfig,
	type SqliteConfig,
	type StepTimeouts,
	validateConfig,
	type WarehouseConfig,
} from "./config";
export {
	type CoordinatorConfig,
	type CoordinatorDeps,
	IngestionCoordinator,
	type RunOptions,
	stagingRelationName,
} from "./coordinator";
export {
	type ExecutionContext,
	type ExecutorDeps,
	executorFor,
	incrementalMergeExecutor,
	replacePartitionExecutor,
	type StrategyError,
	type StrategyExecutor,
	upsertLatestExecutor,
} from "./executors";
export { type BronzeLayout, PartitionLocator, partitionPrefix } from "./locator";
export { mapWithConcurrency } from "./pool";
export { createStrategyRegistry, type StrategyRegistry } from "./registry";
export { checkColumnNames, type FileSchema, unifySchemas } from "./schema";
export { type StagingError, StagingLoader, type StagingLoaderConfig } from "./staging-loader";
export { summariseOutcomes } from "./summary";
export { partitionSpecFor, physicalSchema, TargetRelationManager } from "./target-manager";
export { settleWithin, withTimeout } from "./timeout";
