import type { Warehouse } from "@silverline/adapter";
import type {
	AdapterError,
	InvalidStrategyError,
	Logger,
	LogicalDate,
	PartialReplaceError,
	Result,
	StagingRelation,
	StrategyDescriptor,
	StrategyKind,
} from "@silverline/core";
import type { TargetRelationManager } from "../target-manager";

/** Inputs of one strategy application */
export interface ExecutionContext {
	tableName: string;
	staging: StagingRelation;
	descriptor: StrategyDescriptor;
	logicalDate: LogicalDate;
	signal?: AbortSignal;
}

/** Collaborators shared by every executor */
export interface ExecutorDeps {
	warehouse: Warehouse;
	targets: TargetRelationManager;
	logger: Logger;
}

/** Errors an executor can return */
export type StrategyError = InvalidStrategyError | AdapterError | PartialReplaceError;

/**
 * Reconciles a staging relation into its silver relation.
 * `apply` resolves to the number of silver rows written.
 */
export interface StrategyExecutor {
	readonly kind: StrategyKind;
	apply(ctx: ExecutionContext, deps: ExecutorDeps): Promise<Result<number, StrategyError>>;
}
