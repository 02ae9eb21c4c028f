/** Strategy kinds as they appear in configuration */
export const STRATEGY_KINDS = ["incremental_merge", "replace_partition", "upsert_scd1"] as const;

/** How a table's staged partition is reconciled into the silver layer */
export type StrategyKind = (typeof STRATEGY_KINDS)[number];

/** BigQuery accepts at most four clustering columns */
export const MAX_CLUSTER_COLUMNS = 4;

interface DescriptorBase {
	/** Lookup key in the registry; also the bronze and silver table name */
	readonly tableName: string;
	readonly clusterColumns: readonly string[];
}

/**
 * Incremental-merge and upsert-latest tables.
 * Rows are identified by `keyColumns`; `orderingColumn` is the watermark
 * deciding which of two rows with the same key is newer.
 */
export interface KeyedStrategyDescriptor extends DescriptorBase {
	readonly kind: "incremental_merge" | "upsert_scd1";
	readonly keyColumns: readonly string[];
	readonly orderingColumn: string;
}

/** Full-snapshot tables rewritten one `partitionField` value at a time */
export interface ReplaceStrategyDescriptor extends DescriptorBase {
	readonly kind: "replace_partition";
	readonly partitionField: string;
}

/** Immutable per-table strategy, built from configuration at startup */
export type StrategyDescriptor = KeyedStrategyDescriptor | ReplaceStrategyDescriptor;

/** One `tableStrategies` entry of the configuration document */
export interface StrategyConfig {
	strategy: string;
	keyColumns?: string[];
	orderingColumn?: string;
	partitionField?: string;
	clusterColumns?: string[];
}

/** Type guard for the keyed (merge / upsert) strategies. */
export function isKeyedDescriptor(
	descriptor: StrategyDescriptor,
): descriptor is KeyedStrategyDescriptor {
	return descriptor.kind !== "replace_partition";
}
