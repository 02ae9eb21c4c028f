import type { MergeMode } from "@silverline/adapter";
import { isKeyedDescriptor, Ok, type Result, type StrategyKind } from "@silverline/core";
import { prepareTarget } from "./prepare";
import type { ExecutionContext, ExecutorDeps, StrategyError } from "./types";

/**
 * Latest-wins reconciliation shared by incremental merge and upsert.
 *
 * Staging is reduced to one row per key (greatest ordering value, then
 * latest file, then latest row) and applied with the dialect's merge
 * statements; their affected-row counts are summed.
 */
export async function applyMergeLatest(
	kind: StrategyKind,
	mode: MergeMode,
	ctx: ExecutionContext,
	deps: ExecutorDeps,
): Promise<Result<number, StrategyError>> {
	const prepared = await prepareTarget(kind, ctx, deps);
	if (!prepared.ok) return prepared;
	const target = prepared.value;
	if (target === null || !isKeyedDescriptor(ctx.descriptor)) return Ok(0);

	const statements = deps.warehouse.dialect.mergeLatest({
		mode,
		target: target.relation,
		staging: ctx.staging.transientName,
		columns: ctx.staging.schema,
		keyColumns: ctx.descriptor.keyColumns,
		orderingColumn: ctx.descriptor.orderingColumn,
	});

	let affected = 0;
	for (const statement of statements) {
		const executed = await deps.warehouse.execute(statement, ctx.signal);
		if (!executed.ok) return executed;
		affected += executed.value;
	}

	deps.logger.debug("merge applied", { table: ctx.tableName, mode, rowsAffected: affected });
	return Ok(affected);
}
