import { Err, isKeyedDescriptor, Ok, PartialReplaceError } from "@silverline/core";
import { prepareTarget } from "./prepare";
import type { StrategyExecutor } from "./types";

/**
 * Replace partition: delete the logical date's partition, then insert every
 * staged row into it with the partition field set to that date.
 *
 * The two statements are not atomic. A failed delete leaves the target
 * untouched; a failed insert after a successful delete leaves the partition
 * empty and is reported as PartialReplaceError. Re-running the same date
 * repairs either case.
 */
export const replacePartitionExecutor: StrategyExecutor = {
	kind: "replace_partition",

	async apply(ctx, deps) {
		const prepared = await prepareTarget("replace_partition", ctx, deps);
		if (!prepared.ok) return prepared;
		const target = prepared.value;
		if (target === null || isKeyedDescriptor(ctx.descriptor)) return Ok(0);

		const partitionField = ctx.descriptor.partitionField;
		const write = {
			target: target.relation,
			staging: ctx.staging.transientName,
			columns: ctx.staging.schema.filter((c) => c.name !== partitionField),
			partitionField,
			logicalDate: ctx.logicalDate,
		};
		const dialect = deps.warehouse.dialect;

		const deleted = await deps.warehouse.execute(dialect.deletePartition(write), ctx.signal);
		if (!deleted.ok) return deleted;

		const inserted = await deps.warehouse.execute(dialect.insertPartition(write), ctx.signal);
		if (!inserted.ok) {
			return Err(
				new PartialReplaceError(
					`Table "${ctx.tableName}": partition ${partitionField}=${ctx.logicalDate} was cleared (${deleted.value} rows) but the insert failed: ${inserted.error.message}`,
					inserted.error,
				),
			);
		}

		deps.logger.debug("partition replaced", {
			table: ctx.tableName,
			rowsDeleted: deleted.value,
			rowsInserted: inserted.value,
		});
		return Ok(inserted.value);
	},
};
