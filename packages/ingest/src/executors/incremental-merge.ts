import { applyMergeLatest } from "./merge-latest";
import type { StrategyExecutor } from "./types";

/**
 * Incremental merge: a staged row replaces the silver row with the same key
 * only when its ordering value is strictly greater; new keys are inserted.
 * Key columns are never rewritten.
 */
export const incrementalMergeExecutor: StrategyExecutor = {
	kind: "incremental_merge",
	apply: (ctx, deps) => applyMergeLatest("incremental_merge", "merge", ctx, deps),
};
