import {
	type InvalidDateError,
	type LogicalDate,
	logicalDateInTimeZone,
	Ok,
	parseLogicalDate,
	previousLogicalDate,
	type Result,
} from "@silverline/core";

/**
 * The logical date to ingest: `--date` when given, otherwise yesterday
 * as observed in `timeZone` at `now`.
 */
export function resolveLogicalDate(
	flag: string | undefined,
	timeZone: string,
	now: Date,
): Result<LogicalDate, InvalidDateError> {
	if (flag !== undefined) return parseLogicalDate(flag);
	return Ok(previousLogicalDate(logicalDateInTimeZone(now, timeZone)));
}
