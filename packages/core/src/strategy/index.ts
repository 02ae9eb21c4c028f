export {
	isKeyedDescriptor,
	type KeyedStrategyDescriptor,
	MAX_CLUSTER_COLUMNS,
	type ReplaceStrategyDescriptor,
	STRATEGY_KINDS,
	type StrategyConfig,
	type StrategyDescriptor,
	type StrategyKind,
} from "./types";
export { validateDescriptor, validateStrategyConfig } from "./validate";
