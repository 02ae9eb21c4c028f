import type { IngestionOutcome } from "@silverline/core";
import { summariseOutcomes } from "@silverline/ingest";
import { listFlag } from "../args";
import { loadSettings } from "../config";
import type { CommandContext } from "../context";
import { resolveLogicalDate } from "../dates";
import { print, printError, printTable, warn } from "../output";
import { createRuntime } from "../runtime";

function detail(outcome: IngestionOutcome): string {
	if (outcome.error) return `${outcome.error.code}: ${outcome.error.message}`;
	return outcome.skipReason ?? "";
}

/** One table row per outcome */
export function outcomeRows(
	outcomes: IngestionOutcome[],
): Array<Record<string, string | number>> {
	return outcomes.map((outcome) => ({
		table: outcome.tableName,
		status: outcome.status,
		strategy: outcome.strategy ?? "",
		files: outcome.filesProcessed,
		rows: outcome.rowsAffected,
		ms: outcome.durationMs,
		detail: detail(outcome),
	}));
}

/**
 * `silverline ingest`: run one logical date for all or some tables.
 *
 * Resolves to the process exit code: 1 when the configuration is invalid,
 * the warehouse cannot be reached, or any table failed.
 */
export async function ingest(flags: Record<string, string>, ctx: CommandContext): Promise<number> {
	const settings = loadSettings(flags, ctx.env);
	if (!settings.ok) {
		printError(settings.error.message);
		return 1;
	}
	const { config, registry } = settings.value;

	const date = resolveLogicalDate(flags.date, config.ingestion.timeZone, ctx.now);
	if (!date.ok) {
		printError(date.error.message);
		return 1;
	}

	const runtime = await createRuntime(config, registry, ctx);
	if (!runtime.ok) {
		printError(runtime.error.message);
		return 1;
	}
	const { coordinator, warehouse } = runtime.value;

	const datasets = await warehouse.ensureDatasets([
		config.warehouse.silverDataset,
		config.warehouse.stagingDataset,
	]);
	if (!datasets.ok) {
		printError(datasets.error.message);
		await runtime.value.close();
		return 1;
	}

	const outcomes = await coordinator.run(date.value, {
		tables: listFlag(flags, "tables"),
		signal: ctx.signal,
	});

	const closed = await runtime.value.close();
	if (!closed.ok) warn(closed.error.message);

	const summary = summariseOutcomes(date.value, outcomes);
	printTable(outcomeRows(outcomes));
	print("");
	print(
		`${summary.logicalDate}: ${summary.succeeded} succeeded, ${summary.skipped} skipped, ${summary.failed} failed, ${summary.rowsAffected} rows written`,
	);

	return summary.failed > 0 ? 1 : 0;
}
