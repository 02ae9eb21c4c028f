import { parseArgs } from "./args";
import { ingest } from "./commands/ingest";
import { validate } from "./commands/validate";
import { type CommandContext, processContext } from "./context";
import { print, printError } from "./output";

export const VERSION = "0.1.0";

export const HELP = `silverline: move bronze Parquet partitions into the silver layer

Usage: silverline <command> [options]

Commands:
  ingest                   Ingest one logical date for the configured tables
  validate                 Check the configuration and list table strategies

Ingest options:
  --date <YYYY-MM-DD>      Logical date (default: yesterday in ingestion.timeZone)
  --tables <a,b,...>       Only these tables, in this order (default: all configured)

General:
  --config <path>          Configuration file (or SILVERLINE_CONFIG env, default: ./silverline.json)
  --help, -h               Show this help message
  --version, -v            Show version

Environment:
  SILVERLINE_LOG_LEVEL                 Override logLevel
  SILVERLINE_BRONZE_ACCESS_KEY_ID      Bronze store access key (with the secret below)
  SILVERLINE_BRONZE_SECRET_ACCESS_KEY  Bronze store secret key
  GOOGLE_APPLICATION_CREDENTIALS       BigQuery credentials when no keyFilename is configured

Exit codes:
  0  every table succeeded or was skipped
  1  a table failed, or the configuration is invalid

Examples:
  silverline validate --config ./silverline.json
  silverline ingest
  silverline ingest --date 2025-08-18 --tables orders,stock
`;

/**
 * Dispatch one invocation.
 *
 * @param argv - Full process argv, including the node binary and script path.
 * @param context - Builds the command context; receives the SIGINT-bound signal for `ingest`.
 * @returns The process exit code.
 */
export async function runCli(
	argv: string[],
	context: (signal?: AbortSignal) => CommandContext = processContext,
): Promise<number> {
	const { command, flags } = parseArgs(argv);

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return 0;
	}

	if (flags.help === "true" || flags.h === "true" || command.length === 0) {
		print(HELP);
		return 0;
	}

	const cmd = command.join(" ");

	switch (cmd) {
		case "ingest": {
			const controller = new AbortController();
			const onInterrupt = (): void => controller.abort();
			process.once("SIGINT", onInterrupt);
			try {
				return await ingest(flags, context(controller.signal));
			} finally {
				process.off("SIGINT", onInterrupt);
			}
		}

		case "validate":
			return validate(flags, context());

		case "help":
			print(HELP);
			return 0;

		case "version":
			print(VERSION);
			return 0;

		default:
			printError(`Unknown command: ${cmd}\nRun 'silverline --help' for usage.`);
			return 1;
	}
}
