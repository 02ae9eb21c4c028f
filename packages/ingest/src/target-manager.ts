import type { Warehouse } from "@silverline/adapter";
import {
	type AdapterError,
	type ColumnSpec,
	INTERNAL_COLUMNS,
	isKeyedDescriptor,
	type Logger,
	Ok,
	type PartitionSpec,
	type Result,
	type StrategyDescriptor,
	silentLogger,
	type TargetRelation,
} from "@silverline/core";

/**
 * Silver columns for a descriptor: the staged user columns, with a replace
 * table's partition field moved to the end as a DATE column.
 */
export function physicalSchema(descriptor: StrategyDescriptor, stagingSchema: ColumnSpec[]): ColumnSpec[] {
	const columns = stagingSchema.filter((c) => !INTERNAL_COLUMNS.has(c.name));
	if (isKeyedDescriptor(descriptor)) {
		return columns.map((c) => ({ ...c }));
	}
	return [
		...columns.filter((c) => c.name !== descriptor.partitionField).map((c) => ({ ...c })),
		{ name: descriptor.partitionField, type: "date" },
	];
}

/**
 * Replace tables are partitioned by their partition field. Merge and upsert
 * tables are partitioned by the ordering column's date when it is a
 * timestamp or date, and left unpartitioned otherwise.
 */
export function partitionSpecFor(descriptor: StrategyDescriptor, columns: ColumnSpec[]): PartitionSpec {
	if (!isKeyedDescriptor(descriptor)) {
		return { type: "column", column: descriptor.partitionField };
	}
	const ordering = columns.find((c) => c.name === descriptor.orderingColumn);
	if (ordering?.type === "timestamp") return { type: "date_of", column: ordering.name };
	if (ordering?.type === "date") return { type: "column", column: ordering.name };
	return { type: "none" };
}

/**
 * Creates silver relations on first use.
 *
 * `ensure` issues `CREATE TABLE IF NOT EXISTS` and never alters an existing
 * table. Concurrent calls for one table share a single in-flight creation;
 * a successful result is remembered for the lifetime of the manager, and a
 * failed one is forgotten so the next call retries.
 */
export class TargetRelationManager {
	private readonly warehouse: Warehouse;
	private readonly silverDataset: string;
	private readonly logger: Logger;
	private readonly ensured = new Map<string, Promise<Result<TargetRelation, AdapterError>>>();

	constructor(warehouse: Warehouse, silverDataset: string, logger: Logger = silentLogger) {
		this.warehouse = warehouse;
		this.silverDataset = silverDataset;
		this.logger = logger;
	}

	ensure(
		tableName: string,
		descriptor: StrategyDescriptor,
		stagingSchema: ColumnSpec[],
		signal?: AbortSignal,
	): Promise<Result<TargetRelation, AdapterError>> {
		const existing = this.ensured.get(tableName);
		if (existing) return existing;

		const pending = this.create(tableName, descriptor, stagingSchema, signal).then((result) => {
			if (!result.ok) this.ensured.delete(tableName);
			return result;
		});
		this.ensured.set(tableName, pending);
		return pending;
	}

	private async create(
		tableName: string,
		descriptor: StrategyDescriptor,
		stagingSchema: ColumnSpec[],
		signal?: AbortSignal,
	): Promise<Result<TargetRelation, AdapterError>> {
		const columns = physicalSchema(descriptor, stagingSchema);
		const target: TargetRelation = {
			tableName,
			relation: { dataset: this.silverDataset, table: tableName },
			physicalSchema: columns,
			partitionSpec: partitionSpecFor(descriptor, columns),
			clusterSpec: [...descriptor.clusterColumns],
		};

		const created = await this.warehouse.execute(
			this.warehouse.dialect.createTarget({
				relation: target.relation,
				columns,
				partitionSpec: target.partitionSpec,
				clusterColumns: target.clusterSpec,
			}),
			signal,
		);
		if (!created.ok) return created;

		this.logger.debug("target relation ensured", {
			table: tableName,
			partition: target.partitionSpec.type,
		});
		return Ok(target);
	}
}
