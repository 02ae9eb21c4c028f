import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
	fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@silverline/core": pkg("core"),
			"@silverline/parquet": pkg("parquet"),
			"@silverline/adapter": pkg("adapter"),
			"@silverline/ingest": pkg("ingest"),
			"@silverline/cli": pkg("cli"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts"],
		testTimeout: 20_000,
	},
});
