export {
	AdapterError,
	CancelledError,
	ConfigError,
	InvalidDateError,
	InvalidStrategyError,
	NotConfiguredError,
	ParquetError,
	PartialReplaceError,
	RunInProgressError,
	SchemaConflictError,
	SilverlineError,
	SourceUnavailableError,
	TimeoutExceededError,
	toError,
} from "./errors";
export { Err, Ok, type Result, unwrapOrThrow } from "./result";
