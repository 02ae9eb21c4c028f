import { InvalidDateError } from "./result/errors";
import { Err, Ok, type Result } from "./result/result";

/** A calendar date in `YYYY-MM-DD` form, validated by {@link parseLogicalDate} */
export type LogicalDate = string & { readonly __brand: "LogicalDate" };

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 86_400_000;

/**
 * Validate a `YYYY-MM-DD` string as a real calendar date.
 * `2025-02-30` and `2025-8-18` are rejected.
 */
export function parseLogicalDate(input: string): Result<LogicalDate, InvalidDateError> {
	const match = DATE_RE.exec(input);
	if (!match) {
		return Err(new InvalidDateError(`Logical date must be YYYY-MM-DD, got "${input}"`));
	}

	const [, y, m, d] = match;
	const year = Number(y);
	const month = Number(m);
	const day = Number(d);
	const candidate = new Date(Date.UTC(year, month - 1, day));
	if (
		candidate.getUTCFullYear() !== year ||
		candidate.getUTCMonth() !== month - 1 ||
		candidate.getUTCDate() !== day
	) {
		return Err(new InvalidDateError(`"${input}" is not a calendar date`));
	}

	return Ok(input as LogicalDate);
}

/** Zero-padded path components of a logical date */
export interface DateComponents {
	year: string;
	month: string;
	day: string;
}

/**
 * Split a logical date into the year/month/day segments the bronze layout uses.
 * The date is taken as written; no timezone shift is applied.
 */
export function partitionComponents(date: LogicalDate): DateComponents {
	const [year = "", month = "", day = ""] = date.split("-");
	return { year, month, day };
}

/** `2025-08-18` → `20250818`, for relation names */
export function compactLogicalDate(date: LogicalDate): string {
	return date.replace(/-/g, "");
}

/**
 * The calendar date of `instant` as observed in `timeZone`.
 * Uses the `en-CA` locale, whose short date format is already `YYYY-MM-DD`.
 */
export function logicalDateInTimeZone(instant: Date, timeZone: string): LogicalDate {
	const formatted = new Intl.DateTimeFormat("en-CA", {
		timeZone,
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
	}).format(instant);
	return formatted as LogicalDate;
}

/** The day before `date` */
export function previousLogicalDate(date: LogicalDate): LogicalDate {
	const { year, month, day } = partitionComponents(date);
	const ms = Date.UTC(Number(year), Number(month) - 1, Number(day)) - MS_PER_DAY;
	return new Date(ms).toISOString().slice(0, 10) as LogicalDate;
}
