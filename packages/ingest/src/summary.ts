import type { IngestionOutcome, LogicalDate, RunSummary } from "@silverline/core";

/** Count outcomes by status and total the rows written. */
export function summariseOutcomes(logicalDate: LogicalDate, outcomes: IngestionOutcome[]): RunSummary {
	const summary: RunSummary = {
		logicalDate,
		total: outcomes.length,
		succeeded: 0,
		skipped: 0,
		failed: 0,
		rowsAffected: 0,
	};
	for (const outcome of outcomes) {
		if (outcome.status === "success") summary.succeeded++;
		else if (outcome.status === "skipped") summary.skipped++;
		else summary.failed++;
		summary.rowsAffected += outcome.rowsAffected;
	}
	return summary;
}
