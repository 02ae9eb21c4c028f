import {
	type ConfigError,
	type InvalidStrategyError,
	Ok,
	type Result,
} from "@silverline/core";
import {
	createStrategyRegistry,
	DEFAULT_CONFIG_PATH,
	loadConfig,
	type SilverlineConfig,
	type StrategyRegistry,
} from "@silverline/ingest";

/** A loaded configuration together with its strategy registry */
export interface Settings {
	config: SilverlineConfig;
	registry: StrategyRegistry;
}

/** `--config`, then `SILVERLINE_CONFIG`, then `./silverline.json`. */
export function resolveConfigPath(
	flags: Record<string, string>,
	env: Record<string, string | undefined>,
): string {
	const flag = flags.config;
	if (flag !== undefined && flag !== "true") return flag;
	return env.SILVERLINE_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Load the configuration file and build the strategy registry.
 * Both are validated in full before any table is touched.
 */
export function loadSettings(
	flags: Record<string, string>,
	env: Record<string, string | undefined>,
): Result<Settings, ConfigError | InvalidStrategyError> {
	const config = loadConfig(resolveConfigPath(flags, env), env);
	if (!config.ok) return config;

	const registry = createStrategyRegistry(config.value.tableStrategies);
	if (!registry.ok) return registry;

	return Ok({ config: config.value, registry: registry.value });
}
