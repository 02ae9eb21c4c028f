import type { LakeAdapter, ObjectInfo } from "@silverline/adapter";
import {
	Err,
	type LogicalDate,
	Ok,
	type PartitionRef,
	partitionComponents,
	type Result,
	SourceUnavailableError,
} from "@silverline/core";

/** Key layout of the bronze store */
export interface BronzeLayout {
	/** Top-level prefix, without a trailing slash */
	prefix: string;
	sourceDatabase: string;
}

/**
 * Object-key prefix of one table's partition for one logical date:
 * `{prefix}/{sourceDatabase}/{table}/year=YYYY/month=MM/day=DD/`.
 */
export function partitionPrefix(layout: BronzeLayout, tableName: string, date: LogicalDate): string {
	const { year, month, day } = partitionComponents(date);
	const head = layout.prefix ? `${layout.prefix}/` : "";
	return `${head}${layout.sourceDatabase}/${tableName}/year=${year}/month=${month}/day=${day}/`;
}

/** Arrival order: oldest modification first, key as the tie-break. */
function byArrival(a: ObjectInfo, b: ObjectInfo): number {
	const delta = a.lastModified.getTime() - b.lastModified.getTime();
	if (delta !== 0) return delta;
	return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

/**
 * Finds the Parquet files of a table's daily partition in the bronze store.
 */
export class PartitionLocator {
	private readonly lake: LakeAdapter;
	private readonly layout: BronzeLayout;

	constructor(lake: LakeAdapter, layout: BronzeLayout) {
		this.lake = lake;
		this.layout = layout;
	}

	/**
	 * List the partition's `.parquet` objects in arrival order.
	 *
	 * An empty partition is not an error: the ref comes back with no files.
	 *
	 * @returns The partition ref, or SourceUnavailableError when the store cannot be listed.
	 */
	async locate(
		tableName: string,
		logicalDate: LogicalDate,
		signal?: AbortSignal,
	): Promise<Result<PartitionRef, SourceUnavailableError>> {
		const prefix = partitionPrefix(this.layout, tableName, logicalDate);
		const listed = await this.lake.listObjects(prefix, signal);
		if (!listed.ok) {
			return Err(
				new SourceUnavailableError(
					`Cannot list bronze partition ${prefix}: ${listed.error.message}`,
					listed.error,
				),
			);
		}

		const files = listed.value
			.filter((object) => object.key.endsWith(".parquet"))
			.sort(byArrival)
			.map((object) => object.key);

		return Ok({ tableName, logicalDate, files });
	}
}
