import {
	Err,
	type InvalidStrategyError,
	NotConfiguredError,
	Ok,
	type Result,
	type StrategyDescriptor,
	validateStrategyConfig,
} from "@silverline/core";

/** Read-only lookup of table name → strategy descriptor */
export interface StrategyRegistry {
	/** The table's descriptor, or NotConfiguredError for tables without an entry. */
	resolve(tableName: string): Result<StrategyDescriptor, NotConfiguredError>;
	/** Configured table names, in configuration order. */
	tables(): string[];
}

/**
 * Validate every `tableStrategies` entry and build the registry.
 *
 * Validation is eager: the first invalid entry fails the whole registry,
 * so a bad configuration never reaches the first table of a run.
 */
export function createStrategyRegistry(
	tableStrategies: Record<string, unknown>,
): Result<StrategyRegistry, InvalidStrategyError> {
	const descriptors = new Map<string, StrategyDescriptor>();
	for (const [tableName, entry] of Object.entries(tableStrategies)) {
		const descriptor = validateStrategyConfig(tableName, entry);
		if (!descriptor.ok) return descriptor;
		descriptors.set(tableName, descriptor.value);
	}

	const names = Object.freeze([...descriptors.keys()]);
	return Ok(
		Object.freeze({
			resolve(tableName: string): Result<StrategyDescriptor, NotConfiguredError> {
				const descriptor = descriptors.get(tableName);
				return descriptor ? Ok(descriptor) : Err(new NotConfiguredError(tableName));
			},
			tables(): string[] {
				return [...names];
			},
		}),
	);
}
