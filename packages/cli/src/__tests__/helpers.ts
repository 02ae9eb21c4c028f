import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type LakeAdapter, type ObjectInfo, SqliteWarehouse } from "@silverline/adapter";
import { AdapterError, Err, Ok, type RecordBatch, type Result } from "@silverline/core";
import { writeBatchToParquet } from "@silverline/parquet";
import { vi } from "vitest";

/** A minimal valid configuration document on a SQLite warehouse */
export function sampleConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		logLevel: "info",
		bronze: { bucket: "lake", sourceDatabase: "erp" },
		warehouse: { type: "sqlite", silverDataset: "silver", stagingDataset: "staging" },
		tableStrategies: {
			orders: { strategy: "incremental_merge", keyColumns: ["id"], orderingColumn: "updated_at" },
			stock: { strategy: "replace_partition", partitionField: "snapshot_date", clusterColumns: ["sku"] },
		},
		...overrides,
	};
}

/** A temporary directory holding `silverline.json`; call `cleanup` after the test. */
export function writeConfigFile(document: unknown): { dir: string; path: string; cleanup(): void } {
	const dir = mkdtempSync(join(tmpdir(), "silverline-cli-"));
	const path = join(dir, "silverline.json");
	writeFileSync(path, typeof document === "string" ? document : JSON.stringify(document));
	return { dir, path, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/** Capture stdout and stderr writes; restore with `vi.restoreAllMocks()`. */
export function captureOutput(): { stdout: string[]; stderr: string[] } {
	const stdout: string[] = [];
	const stderr: string[] = [];
	vi.spyOn(process.stdout, "write").mockImplementation((data) => {
		stdout.push(String(data));
		return true;
	});
	vi.spyOn(process.stderr, "write").mockImplementation((data) => {
		stderr.push(String(data));
		return true;
	});
	return { stdout, stderr };
}

/** Output chunks joined and split back into lines, without the trailing empty one. */
export function lines(chunks: string[]): string[] {
	const text = chunks.join("");
	return text.endsWith("\n") ? text.slice(0, -1).split("\n") : text.split("\n");
}

/** In-memory bronze store */
export function createMemoryLake(): LakeAdapter & { put(key: string, batch: RecordBatch): Promise<void> } {
	const stored = new Map<string, { data: Uint8Array; lastModified: Date }>();
	let clock = Date.UTC(2025, 7, 18, 6, 0, 0);
	return {
		async put(key: string, batch: RecordBatch): Promise<void> {
			const encoded = await writeBatchToParquet(batch);
			if (!encoded.ok) throw encoded.error;
			clock += 1000;
			stored.set(key, { data: encoded.value, lastModified: new Date(clock) });
		},
		async putObject(path: string, data: Uint8Array): Promise<Result<void, AdapterError>> {
			clock += 1000;
			stored.set(path, { data, lastModified: new Date(clock) });
			return Ok(undefined);
		},
		async getObject(path: string): Promise<Result<Uint8Array, AdapterError>> {
			const object = stored.get(path);
			return object ? Ok(object.data) : Err(new AdapterError(`Object not found: ${path}`));
		},
		async listObjects(prefix: string): Promise<Result<ObjectInfo[], AdapterError>> {
			return Ok(
				[...stored.entries()]
					.filter(([key]) => key.startsWith(prefix))
					.map(([key, object]) => ({ key, size: object.data.length, lastModified: object.lastModified })),
			);
		},
	};
}

export async function openWarehouse(): Promise<SqliteWarehouse> {
	const opened = await SqliteWarehouse.open();
	if (!opened.ok) throw opened.error;
	return opened.value;
}
