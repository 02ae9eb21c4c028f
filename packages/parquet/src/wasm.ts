import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { initSync } from "parquet-wasm/esm";

let initialised = false;

/**
 * Loads the parquet-wasm binary from disk and initialises it synchronously.
 * Later calls return immediately.
 */
export function ensureWasmInitialised(): void {
	if (initialised) return;

	// The .wasm file sits next to the ESM entry point
	const require = createRequire(import.meta.url);
	const entryPath = require.resolve("parquet-wasm/esm");
	const wasmPath = entryPath.replace("parquet_wasm.js", "parquet_wasm_bg.wasm");

	initSync(readFileSync(wasmPath));
	initialised = true;
}
