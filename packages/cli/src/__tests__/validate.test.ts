import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { validate } from "../commands/validate";
import { captureOutput, lines, sampleConfig, writeConfigFile } from "./helpers";

describe("validate", () => {
	let out: { stdout: string[]; stderr: string[] };
	let cleanup: (() => void) | undefined;

	beforeEach(() => {
		out = captureOutput();
	});

	afterEach(() => {
		cleanup?.();
		cleanup = undefined;
		vi.restoreAllMocks();
	});

	it("lists each table's strategy", () => {
		const file = writeConfigFile(sampleConfig());
		cleanup = file.cleanup;

		const code = validate({ config: file.path }, { env: {} });

		expect(code).toBe(0);
		expect(lines(out.stdout)).toEqual([
			"table   strategy           keys  ordering    partition      cluster",
			"------  -----------------  ----  ----------  -------------  -------",
			"orders  incremental_merge  id    updated_at",
			"stock   replace_partition                    snapshot_date  sku",
			"",
			"Configuration OK: 2 tables",
		]);
		expect(out.stderr).toEqual([]);
	});

	it("fails with the first invalid strategy", () => {
		const file = writeConfigFile(
			sampleConfig({
				tableStrategies: {
					orders: { strategy: "incremental_merge", keyColumns: ["id"], orderingColumn: "updated_at" },
					stock: { strategy: "replace_partition" },
				},
			}),
		);
		cleanup = file.cleanup;

		const code = validate({ config: file.path }, { env: {} });

		expect(code).toBe(1);
		expect(out.stdout).toEqual([]);
		expect(out.stderr).toHaveLength(1);
		expect(out.stderr[0]?.startsWith('Error: Table "stock": ')).toBe(true);
	});

	it("finds the file through SILVERLINE_CONFIG", () => {
		const file = writeConfigFile(
			sampleConfig({
				tableStrategies: { items: { strategy: "upsert_scd1", keyColumns: ["code"], orderingColumn: "modified_at" } },
			}),
		);
		cleanup = file.cleanup;

		const code = validate({}, { env: { SILVERLINE_CONFIG: file.path } });

		expect(code).toBe(0);
		expect(lines(out.stdout).at(-1)).toBe("Configuration OK: 1 table");
	});
});
