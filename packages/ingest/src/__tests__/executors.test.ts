import type { SqliteWarehouse, Warehouse } from "@silverline/adapter";
import {
	type ColumnSpec,
	type KeyedStrategyDescriptor,
	type LogicalDate,
	type ReplaceStrategyDescriptor,
	type Row,
	type StagingRelation,
	type StrategyDescriptor,
	silentLogger,
} from "@silverline/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	executorFor,
	incrementalMergeExecutor,
	replacePartitionExecutor,
	type StrategyExecutor,
	upsertLatestExecutor,
} from "../executors";
import { TargetRelationManager } from "../target-manager";
import {
	batch,
	DATE,
	openWarehouse,
	PREVIOUS_DATE,
	recordingWarehouse,
	relationExists,
	selectAll,
	stage,
} from "./helpers";

const orderColumns: ColumnSpec[] = [
	{ name: "id", type: "int64" },
	{ name: "status", type: "string" },
	{ name: "updated_at", type: "timestamp" },
];

const orders: KeyedStrategyDescriptor = {
	tableName: "orders",
	kind: "incremental_merge",
	keyColumns: ["id"],
	orderingColumn: "updated_at",
	clusterColumns: [],
};

const itemColumns: ColumnSpec[] = [
	{ name: "code", type: "string" },
	{ name: "name", type: "string" },
	{ name: "modified_at", type: "timestamp" },
];

const items: KeyedStrategyDescriptor = {
	tableName: "items",
	kind: "upsert_scd1",
	keyColumns: ["code"],
	orderingColumn: "modified_at",
	clusterColumns: [],
};

const stockColumns: ColumnSpec[] = [
	{ name: "sku", type: "string" },
	{ name: "qty", type: "int64" },
];

const stock: ReplaceStrategyDescriptor = {
	tableName: "stock",
	kind: "replace_partition",
	partitionField: "snapshot_date",
	clusterColumns: [],
};

const T07 = "2025-08-18T07:00:00Z";
const T08 = "2025-08-18T08:00:00Z";
const T09 = "2025-08-18T09:00:00Z";
const T10 = "2025-08-18T10:00:00Z";

describe("strategy executors", () => {
	let warehouse: SqliteWarehouse;

	beforeEach(async () => {
		warehouse = await openWarehouse();
	});

	afterEach(async () => {
		await warehouse.close();
	});

	function deps(target: Warehouse = warehouse) {
		return { warehouse: target, targets: new TargetRelationManager(warehouse, "silver"), logger: silentLogger };
	}

	async function apply(
		executor: StrategyExecutor,
		descriptor: StrategyDescriptor,
		staging: StagingRelation,
		logicalDate: LogicalDate = DATE,
		target: Warehouse = warehouse,
	) {
		return executor.apply(
			{ tableName: descriptor.tableName, staging, descriptor, logicalDate },
			deps(target),
		);
	}

	async function stageAndApply(
		executor: StrategyExecutor,
		descriptor: StrategyDescriptor,
		columns: ColumnSpec[],
		files: Row[][],
		logicalDate: LogicalDate = DATE,
	): Promise<number> {
		const staging = await stage(
			warehouse,
			descriptor.tableName,
			files.map((rows) => batch(columns, rows)),
			logicalDate,
		);
		const result = await apply(executor, descriptor, staging, logicalDate);
		if (!result.ok) throw result.error;
		return result.value;
	}

	describe("executorFor", () => {
		it("dispatches each strategy kind to its executor", () => {
			expect(executorFor("incremental_merge")).toBe(incrementalMergeExecutor);
			expect(executorFor("replace_partition")).toBe(replacePartitionExecutor);
			expect(executorFor("upsert_scd1")).toBe(upsertLatestExecutor);
		});
	});

	describe("common checks", () => {
		it("writes nothing for a staging relation without rows", async () => {
			const recorded = recordingWarehouse(warehouse);
			const staging: StagingRelation = {
				owningTable: "orders",
				transientName: { dataset: "staging", table: "orders__stg_empty" },
				schema: orderColumns,
				rowCount: 0,
				files: ["bronze/erp/orders/year=2025/month=08/day=18/part-0.parquet"],
				empty: false,
			};

			const result = await incrementalMergeExecutor.apply(
				{ tableName: "orders", staging, descriptor: orders, logicalDate: DATE },
				{ warehouse: recorded, targets: new TargetRelationManager(recorded, "silver"), logger: silentLogger },
			);

			expect(result).toEqual({ ok: true, value: 0 });
			expect(recorded.statements).toEqual([]);
			expect(await relationExists(warehouse, "silver.orders")).toBe(false);
		});

		it("rejects a descriptor of another kind", async () => {
			const staging = await stage(warehouse, "orders", [batch(orderColumns, [{ id: 1, status: "new", updated_at: T08 }])]);
			const result = await apply(incrementalMergeExecutor, { ...orders, kind: "upsert_scd1" }, staging);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("INVALID_STRATEGY");
			expect(result.error.message).toBe(
				'Table "orders": descriptor of kind upsert_scd1 given to the incremental_merge executor',
			);
		});

		it("rejects a keyed descriptor without key columns before touching the warehouse", async () => {
			const staging = await stage(warehouse, "orders", [batch(orderColumns, [{ id: 1, status: "new", updated_at: T08 }])]);
			const recorded = recordingWarehouse(warehouse);
			const result = await apply(incrementalMergeExecutor, { ...orders, keyColumns: [] }, staging, DATE, recorded);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("INVALID_STRATEGY");
			expect(recorded.statements).toEqual([]);
		});

		it("rejects a key column the staged data does not have", async () => {
			const columns: ColumnSpec[] = [
				{ name: "order_id", type: "int64" },
				{ name: "updated_at", type: "timestamp" },
			];
			const staging = await stage(warehouse, "orders", [batch(columns, [{ order_id: 1, updated_at: T08 }])]);
			const result = await apply(incrementalMergeExecutor, orders, staging);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("INVALID_STRATEGY");
			expect(result.error.message).toBe('Table "orders": column "id" not found in staged data');
			expect(await relationExists(warehouse, "silver.orders")).toBe(false);
		});

		it("rejects staging that belongs to another table", async () => {
			const staging = await stage(warehouse, "refunds", [batch(orderColumns, [{ id: 1, status: "new", updated_at: T08 }])]);
			const result = await apply(incrementalMergeExecutor, orders, staging);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.message).toBe(
				'Table "orders": descriptor for "orders" and staging for "refunds" do not match',
			);
		});
	});

	describe("incremental merge", () => {
		it("keeps the latest row per key and inserts new keys", async () => {
			const rows = await stageAndApply(incrementalMergeExecutor, orders, orderColumns, [
				[
					{ id: 1, status: "new", updated_at: T08 },
					{ id: 2, status: "new", updated_at: T08 },
					{ id: 1, status: "paid", updated_at: T09 },
				],
			]);

			expect(rows).toBe(2);
			expect(await selectAll(warehouse, "silver.orders", '"id"')).toEqual([
				{ id: 1, status: "paid", updated_at: T09 },
				{ id: 2, status: "new", updated_at: T08 },
			]);
		});

		it("updates only rows whose ordering value is strictly greater", async () => {
			await stageAndApply(incrementalMergeExecutor, orders, orderColumns, [
				[
					{ id: 1, status: "new", updated_at: T08 },
					{ id: 2, status: "new", updated_at: T08 },
					{ id: 4, status: "new", updated_at: T08 },
				],
			]);

			const rows = await stageAndApply(incrementalMergeExecutor, orders, orderColumns, [
				[
					{ id: 1, status: "shipped", updated_at: T10 },
					{ id: 2, status: "stale", updated_at: T07 },
					{ id: 3, status: "new", updated_at: T10 },
					{ id: 4, status: "same-time", updated_at: T08 },
				],
			]);

			expect(rows).toBe(2);
			expect(await selectAll(warehouse, "silver.orders", '"id"')).toEqual([
				{ id: 1, status: "shipped", updated_at: T10 },
				{ id: 2, status: "new", updated_at: T08 },
				{ id: 3, status: "new", updated_at: T10 },
				{ id: 4, status: "new", updated_at: T08 },
			]);
		});

		it("breaks ordering ties by latest file, then latest row", async () => {
			const rows = await stageAndApply(incrementalMergeExecutor, orders, orderColumns, [
				[
					{ id: 1, status: "first-file", updated_at: T08 },
					{ id: 5, status: "earlier-row", updated_at: T08 },
					{ id: 5, status: "later-row", updated_at: T08 },
				],
				[{ id: 1, status: "second-file", updated_at: T08 }],
			]);

			expect(rows).toBe(2);
			expect(await selectAll(warehouse, "silver.orders", '"id"')).toEqual([
				{ id: 1, status: "second-file", updated_at: T08 },
				{ id: 5, status: "later-row", updated_at: T08 },
			]);
		});

		it("is a no-op when the same staging is applied twice", async () => {
			const staging = await stage(warehouse, "orders", [
				batch(orderColumns, [
					{ id: 1, status: "new", updated_at: T08 },
					{ id: 2, status: "new", updated_at: T09 },
				]),
			]);

			expect(await apply(incrementalMergeExecutor, orders, staging)).toEqual({ ok: true, value: 2 });
			expect(await apply(incrementalMergeExecutor, orders, staging)).toEqual({ ok: true, value: 0 });
			expect(await selectAll(warehouse, "silver.orders", '"id"')).toHaveLength(2);
		});

		it("leaves a silver row without an ordering value alone", async () => {
			await stageAndApply(incrementalMergeExecutor, orders, orderColumns, [
				[
					{ id: 7, status: "legacy", updated_at: null },
					{ id: 8, status: "new", updated_at: T08 },
				],
			]);

			const rows = await stageAndApply(incrementalMergeExecutor, orders, orderColumns, [
				[{ id: 7, status: "corrected", updated_at: T09 }],
			]);

			expect(rows).toBe(0);
			expect(await selectAll(warehouse, "silver.orders", '"id"')).toEqual([
				{ id: 7, status: "legacy", updated_at: null },
				{ id: 8, status: "new", updated_at: T08 },
			]);
		});
	});

	describe("upsert latest", () => {
		it("overwrites rows that are older or have no ordering value", async () => {
			const first = await stageAndApply(upsertLatestExecutor, items, itemColumns, [
				[
					{ code: "A", name: "Alpha", modified_at: null },
					{ code: "B", name: "Beta", modified_at: T08 },
					{ code: "C", name: "Gamma", modified_at: T08 },
				],
			]);
			expect(first).toBe(3);

			const second = await stageAndApply(upsertLatestExecutor, items, itemColumns, [
				[
					{ code: "A", name: "Alpha 2", modified_at: T09 },
					{ code: "B", name: "Beta old", modified_at: T07 },
					{ code: "C", name: "Gamma 2", modified_at: T09 },
					{ code: "D", name: "Delta", modified_at: T09 },
				],
			]);

			expect(second).toBe(3);
			expect(await selectAll(warehouse, "silver.items", '"code"')).toEqual([
				{ code: "A", name: "Alpha 2", modified_at: T09 },
				{ code: "B", name: "Beta", modified_at: T08 },
				{ code: "C", name: "Gamma 2", modified_at: T09 },
				{ code: "D", name: "Delta", modified_at: T09 },
			]);
		});

		it("is a no-op when the same staging is applied twice", async () => {
			const staging = await stage(warehouse, "items", [
				batch(itemColumns, [
					{ code: "A", name: "Alpha", modified_at: T08 },
					{ code: "A", name: "Alpha latest", modified_at: T09 },
				]),
			]);

			expect(await apply(upsertLatestExecutor, items, staging)).toEqual({ ok: true, value: 1 });
			expect(await apply(upsertLatestExecutor, items, staging)).toEqual({ ok: true, value: 0 });
			expect(await selectAll(warehouse, "silver.items", '"code"')).toEqual([
				{ code: "A", name: "Alpha latest", modified_at: T09 },
			]);
		});
	});

	describe("replace partition", () => {
		it("replaces only the logical date's partition", async () => {
			await stageAndApply(
				replacePartitionExecutor,
				stock,
				stockColumns,
				[
					[
						{ sku: "A", qty: 1 },
						{ sku: "B", qty: 2 },
					],
				],
				PREVIOUS_DATE,
			);
			await stageAndApply(replacePartitionExecutor, stock, stockColumns, [[{ sku: "A", qty: 5 }]]);

			const rows = await stageAndApply(replacePartitionExecutor, stock, stockColumns, [
				[
					{ sku: "A", qty: 7 },
					{ sku: "C", qty: 3 },
				],
			]);

			expect(rows).toBe(2);
			expect(await selectAll(warehouse, "silver.stock", '"snapshot_date", "sku"')).toEqual([
				{ sku: "A", qty: 1, snapshot_date: "2025-08-17" },
				{ sku: "B", qty: 2, snapshot_date: "2025-08-17" },
				{ sku: "A", qty: 7, snapshot_date: "2025-08-18" },
				{ sku: "C", qty: 3, snapshot_date: "2025-08-18" },
			]);
		});

		it("stamps the logical date over a staged partition field", async () => {
			const columns: ColumnSpec[] = [...stockColumns, { name: "snapshot_date", type: "date" }];
			const rows = await stageAndApply(replacePartitionExecutor, stock, columns, [
				[{ sku: "A", qty: 1, snapshot_date: "2025-01-01" }],
			]);

			expect(rows).toBe(1);
			expect(await selectAll(warehouse, "silver.stock", '"sku"')).toEqual([
				{ sku: "A", qty: 1, snapshot_date: "2025-08-18" },
			]);
		});

		it("rewrites the same content when re-run", async () => {
			const staging = await stage(warehouse, "stock", [
				batch(stockColumns, [
					{ sku: "A", qty: 1 },
					{ sku: "B", qty: 2 },
				]),
			]);

			expect(await apply(replacePartitionExecutor, stock, staging)).toEqual({ ok: true, value: 2 });
			expect(await apply(replacePartitionExecutor, stock, staging)).toEqual({ ok: true, value: 2 });
			expect(await selectAll(warehouse, "silver.stock", '"sku"')).toEqual([
				{ sku: "A", qty: 1, snapshot_date: "2025-08-18" },
				{ sku: "B", qty: 2, snapshot_date: "2025-08-18" },
			]);
		});

		it("leaves the target untouched when the delete fails", async () => {
			await stageAndApply(replacePartitionExecutor, stock, stockColumns, [[{ sku: "A", qty: 5 }]]);
			const staging = await stage(warehouse, "stock", [batch(stockColumns, [{ sku: "Z", qty: 9 }])]);

			const result = await apply(
				replacePartitionExecutor,
				stock,
				staging,
				DATE,
				recordingWarehouse(warehouse, /^DELETE/),
			);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("ADAPTER_ERROR");
			expect(await selectAll(warehouse, "silver.stock", '"sku"')).toEqual([
				{ sku: "A", qty: 5, snapshot_date: "2025-08-18" },
			]);
		});

		it("reports a partial replace when the insert fails after the delete", async () => {
			await stageAndApply(replacePartitionExecutor, stock, stockColumns, [[{ sku: "A", qty: 1 }]], PREVIOUS_DATE);
			await stageAndApply(replacePartitionExecutor, stock, stockColumns, [[{ sku: "A", qty: 5 }]]);
			const staging = await stage(warehouse, "stock", [batch(stockColumns, [{ sku: "Z", qty: 9 }])]);

			const result = await apply(
				replacePartitionExecutor,
				stock,
				staging,
				DATE,
				recordingWarehouse(warehouse, /^INSERT INTO "silver\.stock"/),
			);

			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("PARTIAL_REPLACE");
			expect(result.error.message).toBe(
				'Table "stock": partition snapshot_date=2025-08-18 was cleared (1 rows) but the insert failed: Simulated warehouse failure',
			);
			expect(await selectAll(warehouse, "silver.stock", '"sku"')).toEqual([
				{ sku: "A", qty: 1, snapshot_date: "2025-08-17" },
			]);
		});
	});
});
