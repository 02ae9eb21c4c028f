import {
	type AdapterError,
	Err,
	InvalidStrategyError,
	isKeyedDescriptor,
	Ok,
	type Result,
	type StrategyDescriptor,
	type StrategyKind,
	type TargetRelation,
	validateDescriptor,
} from "@silverline/core";
import type { ExecutionContext, ExecutorDeps } from "./types";

/** Staged columns the descriptor needs; the partition field is stamped, not read. */
function requiredColumns(descriptor: StrategyDescriptor): string[] {
	if (isKeyedDescriptor(descriptor)) {
		return [...descriptor.keyColumns, descriptor.orderingColumn, ...descriptor.clusterColumns];
	}
	return descriptor.clusterColumns.filter((c) => c !== descriptor.partitionField);
}

/**
 * Checks shared by every executor, in order:
 * 1. the descriptor is well-formed and of the executor's kind (`InvalidStrategyError`)
 * 2. the staging relation belongs to the table
 * 3. an empty staging relation short-circuits: `Ok(null)`, nothing is written
 * 4. every column the descriptor names was staged
 * 5. the silver relation exists
 */
export async function prepareTarget(
	kind: StrategyKind,
	ctx: ExecutionContext,
	deps: ExecutorDeps,
): Promise<Result<TargetRelation | null, InvalidStrategyError | AdapterError>> {
	const { descriptor, staging, tableName } = ctx;

	const valid = validateDescriptor(descriptor);
	if (!valid.ok) return valid;
	if (descriptor.kind !== kind) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": descriptor of kind ${descriptor.kind} given to the ${kind} executor`,
				tableName,
			),
		);
	}
	if (descriptor.tableName !== tableName || staging.owningTable !== tableName) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": descriptor for "${descriptor.tableName}" and staging for "${staging.owningTable}" do not match`,
				tableName,
			),
		);
	}

	if (staging.empty || staging.rowCount === 0) {
		return Ok(null);
	}

	const staged = new Set(staging.schema.map((c) => c.name));
	const missing = requiredColumns(descriptor).filter((c) => !staged.has(c));
	if (missing.length > 0) {
		return Err(
			new InvalidStrategyError(
				`Table "${tableName}": column ${missing.map((c) => `"${c}"`).join(", ")} not found in staged data`,
				tableName,
			),
		);
	}

	return deps.targets.ensure(tableName, descriptor, staging.schema, ctx.signal);
}
