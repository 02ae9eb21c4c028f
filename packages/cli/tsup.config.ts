import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		bin: "src/bin.ts",
	},
	format: ["esm"],
	platform: "node",
	target: "node20",
	sourcemap: true,
	clean: true,
	// Workspace packages resolve to TypeScript sources, so they are bundled in
	noExternal: [/^@silverline\//],
	external: [
		"sql.js",
		"@aws-sdk/client-s3",
		"@google-cloud/bigquery",
		"parquet-wasm",
		"apache-arrow",
	],
});
