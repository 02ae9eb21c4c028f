import { describe, expect, it } from "vitest";
import { isValidIdentifier, quoteBacktick, quoteIdentifier } from "../identifier";

describe("isValidIdentifier", () => {
	it("accepts plain table and column names", () => {
		expect(isValidIdentifier("alm_his_1")).toBe(true);
		expect(isValidIdentifier("_load_day")).toBe(true);
		expect(isValidIdentifier("F_FECHA")).toBe(true);
	});

	it("accepts exactly 128 characters and rejects 129", () => {
		expect(isValidIdentifier("a".repeat(128))).toBe(true);
		expect(isValidIdentifier("a".repeat(129))).toBe(false);
	});

	it("rejects empty strings and leading digits", () => {
		expect(isValidIdentifier("")).toBe(false);
		expect(isValidIdentifier("1col")).toBe(false);
	});

	it("rejects hyphens, dots, spaces and injection attempts", () => {
		expect(isValidIdentifier("has-hyphen")).toBe(false);
		expect(isValidIdentifier("silver.orders")).toBe(false);
		expect(isValidIdentifier("has space")).toBe(false);
		expect(isValidIdentifier("x; DROP TABLE orders--")).toBe(false);
		expect(isValidIdentifier("table`name")).toBe(false);
	});
});

describe("quoting", () => {
	it("double-quotes and escapes for standard SQL", () => {
		expect(quoteIdentifier("orders")).toBe('"orders"');
		expect(quoteIdentifier('a"b')).toBe('"a""b"');
	});

	it("backtick-quotes and escapes for BigQuery", () => {
		expect(quoteBacktick("silver.orders")).toBe("`silver.orders`");
		expect(quoteBacktick("a`b")).toBe("`a\\`b`");
	});
});
