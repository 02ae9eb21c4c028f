import type { StrategyKind } from "@silverline/core";
import { incrementalMergeExecutor } from "./incremental-merge";
import { replacePartitionExecutor } from "./replace-partition";
import type { StrategyExecutor } from "./types";
import { upsertLatestExecutor } from "./upsert-latest";

/** The executor for a strategy kind. The set of kinds is closed. */
export function executorFor(kind: StrategyKind): StrategyExecutor {
	switch (kind) {
		case "incremental_merge":
			return incrementalMergeExecutor;
		case "replace_partition":
			return replacePartitionExecutor;
		case "upsert_scd1":
			return upsertLatestExecutor;
	}
}

export { incrementalMergeExecutor } from "./incremental-merge";
export { applyMergeLatest } from "./merge-latest";
export { prepareTarget } from "./prepare";
export { replacePartitionExecutor } from "./replace-partition";
export type { ExecutionContext, ExecutorDeps, StrategyError, StrategyExecutor } from "./types";
export { upsertLatestExecutor } from "./upsert-latest";
