import { describe, expect, it } from "vitest";
import { listFlag, parseArgs } from "../args";

describe("parseArgs", () => {
	it("parses a simple command", () => {
		const result = parseArgs(["node", "silverline", "validate"]);
		expect(result.command).toEqual(["validate"]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});

	it("takes a single command word", () => {
		const result = parseArgs(["node", "silverline", "ingest", "extra"]);
		expect(result.command).toEqual(["ingest"]);
		expect(result.positional).toEqual(["extra"]);
	});

	it("parses --flag value pairs", () => {
		const result = parseArgs([
			"node", "silverline", "ingest",
			"--date", "2025-08-18",
			"--tables", "orders,stock",
		]);
		expect(result.command).toEqual(["ingest"]);
		expect(result.flags).toEqual({ date: "2025-08-18", tables: "orders,stock" });
	});

	it("parses --flag=value syntax", () => {
		const result = parseArgs(["node", "silverline", "ingest", "--config=/etc/silverline.json"]);
		expect(result.flags).toEqual({ config: "/etc/silverline.json" });
	});

	it("parses boolean flags (no value)", () => {
		const result = parseArgs(["node", "silverline", "ingest", "--help"]);
		expect(result.command).toEqual(["ingest"]);
		expect(result.flags).toEqual({ help: "true" });
	});

	it("handles empty arguments", () => {
		const result = parseArgs(["node", "silverline"]);
		expect(result.command).toEqual([]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});

	it("parses -h short flags without a command", () => {
		const result = parseArgs(["node", "silverline", "-h"]);
		expect(result.command).toEqual([]);
		expect(result.flags).toEqual({ h: "true" });
	});
});

describe("listFlag", () => {
	it("splits on commas and drops blanks", () => {
		expect(listFlag({ tables: " orders, ,stock," }, "tables")).toEqual(["orders", "stock"]);
	});

	it("is undefined when the flag is absent or has no value", () => {
		expect(listFlag({}, "tables")).toBeUndefined();
		expect(listFlag({ tables: "true" }, "tables")).toBeUndefined();
	});
});
