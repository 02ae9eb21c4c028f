import { applyMergeLatest } from "./merge-latest";
import type { StrategyExecutor } from "./types";

/**
 * SCD type 1 upsert: the latest staged row per key overwrites every column
 * of the silver row when the silver ordering value is older or missing.
 * Unlike incremental merge, which keeps such a row, an upsert treats a silver
 * row without an ordering value as stale so the source always corrects it.
 */
export const upsertLatestExecutor: StrategyExecutor = {
	kind: "upsert_scd1",
	apply: (ctx, deps) => applyMergeLatest("upsert_scd1", "upsert", ctx, deps),
};
