import { describe, expect, it } from "vitest";
import {
	compactLogicalDate,
	type LogicalDate,
	logicalDateInTimeZone,
	parseLogicalDate,
	partitionComponents,
	previousLogicalDate,
} from "../logical-date";

function date(value: string): LogicalDate {
	const parsed = parseLogicalDate(value);
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

describe("parseLogicalDate", () => {
	it("accepts real calendar dates", () => {
		expect(parseLogicalDate("2025-08-18")).toEqual({ ok: true, value: "2025-08-18" });
		expect(parseLogicalDate("2024-02-29").ok).toBe(true);
	});

	it("rejects malformed input", () => {
		const result = parseLogicalDate("2025-8-18");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("INVALID_DATE");
			expect(result.error.message).toBe('Logical date must be YYYY-MM-DD, got "2025-8-18"');
		}
	});

	it("rejects dates that do not exist", () => {
		const result = parseLogicalDate("2025-02-29");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe('"2025-02-29" is not a calendar date');
		}
	});
});

describe("date helpers", () => {
	it("splits into zero-padded components", () => {
		expect(partitionComponents(date("2025-01-07"))).toEqual({
			year: "2025",
			month: "01",
			day: "07",
		});
	});

	it("compacts for relation names", () => {
		expect(compactLogicalDate(date("2025-08-18"))).toBe("20250818");
	});

	it("steps back across month and year boundaries", () => {
		expect(previousLogicalDate(date("2025-03-01"))).toBe("2025-02-28");
		expect(previousLogicalDate(date("2025-01-01"))).toBe("2024-12-31");
	});

	it("reads the calendar date in a given time zone", () => {
		const instant = new Date("2025-08-18T23:30:00Z");
		expect(logicalDateInTimeZone(instant, "UTC")).toBe("2025-08-18");
		expect(logicalDateInTimeZone(instant, "Europe/Madrid")).toBe("2025-08-19");
		expect(logicalDateInTimeZone(instant, "America/New_York")).toBe("2025-08-18");
	});
});
