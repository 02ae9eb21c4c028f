export { listFlag, type ParsedArgs, parseArgs } from "./args";
export { HELP, runCli, VERSION } from "./cli";
export { ingest, outcomeRows } from "./commands/ingest";
export { validate } from "./commands/validate";
export { loadSettings, resolveConfigPath, type Settings } from "./config";
export { type CommandContext, processContext } from "./context";
export { resolveLogicalDate } from "./dates";
export { createRuntime, openWarehouse, type Runtime, type RuntimeOverrides } from "./runtime";
