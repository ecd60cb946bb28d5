import { AnalysisError } from "@insightx/core";
import { describe, expect, it } from "vitest";
import { buildCampaignTable, parseCampaignCsv, parseNumericCell } from "./parseCampaignCsv";

const captureError = (fn: () => unknown): AnalysisError => {
	try {
		fn();
	} catch (error) {
		if (error instanceof AnalysisError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected an AnalysisError");
};

describe("parseNumericCell", () => {
	it.each([
		["1500", 1500],
		[" 12.5 ", 12.5],
		["$1,000", 1000],
		["-$5", -5],
		[".5", 0.5],
	])("reads %s as %d", (raw, expected) => {
		expect(parseNumericCell(raw, "Budget", 0)).toBe(expected);
	});

	it("rejects text with the row and column", () => {
		const error = captureError(() => parseNumericCell("abc", "Budget", 0));
		expect(error.code).toBe("ParseError");
		expect(error.message).toBe('Row 1, column Budget: "abc" is not a number');
		expect(error.details).toEqual({ row: 1, column: "Budget", value: "abc" });
	});
});

describe("parseCampaignCsv", () => {
	it("reads names, currency and thousands separators", () => {
		const table = parseCampaignCsv(
			[
				"Campaign,Budget,Clicks,Conversions,Revenue",
				'Search,"$1,000",500,25,"$2,500"',
				"Social,1500,750,45,3750",
				"",
			].join("\n")
		);

		expect(table).toEqual([
			{
				id: "campaign-1",
				name: "Search",
				budget: 1000,
				clicks: 500,
				conversions: 25,
				revenue: 2500,
				rowIndex: 0,
			},
			{
				id: "campaign-2",
				name: "Social",
				budget: 1500,
				clicks: 750,
				conversions: 45,
				revenue: 3750,
				rowIndex: 1,
			},
		]);
	});

	it("falls back to positional names without a name column", () => {
		const table = parseCampaignCsv("Budget,Clicks,Conversions,Revenue\n10,5,1,20\n30,6,2,40");
		expect(table.map((record) => record.name)).toEqual(["campaign-1", "campaign-2"]);
	});

	it("accepts the alternative name columns and keeps duplicate names", () => {
		const table = parseCampaignCsv(
			"Campaign Name,Budget,Clicks,Conversions,Revenue\nEmail,10,5,1,20\nEmail,30,6,2,40\n,1,1,1,1"
		);
		expect(table.map((record) => [record.id, record.name])).toEqual([
			["campaign-1", "Email"],
			["campaign-2", "Email"],
			["campaign-3", "campaign-3"],
		]);
	});

	it("treats column names case-sensitively", () => {
		const error = captureError(() =>
			parseCampaignCsv("Campaign,budget,Clicks,Conversions,Revenue\nA,1,1,1,1")
		);
		expect(error.code).toBe("SchemaError");
		expect(error.message).toBe("Missing required columns: Budget");
	});

	it("lists every missing column", () => {
		const error = captureError(() => parseCampaignCsv("Campaign,Clicks\nA,1"));
		expect(error.details.missing).toEqual(["Budget", "Conversions", "Revenue"]);
	});

	it("rejects a header without rows", () => {
		const error = captureError(() => parseCampaignCsv("Budget,Clicks,Conversions,Revenue\n"));
		expect(error.code).toBe("SchemaError");
		expect(error.message).toBe("No campaign rows found in the file");
	});

	it("reports the offending cell for non-numeric values", () => {
		const error = captureError(() =>
			parseCampaignCsv("Campaign,Budget,Clicks,Conversions,Revenue\nA,1,1,1,1\nB,2,lots,1,1")
		);
		expect(error.code).toBe("ParseError");
		expect(error.details).toEqual({ row: 2, column: "Clicks", value: "lots" });
	});
});

describe("buildCampaignTable", () => {
	it("assigns ids by row and freezes records", () => {
		const table = buildCampaignTable([
			{ name: " Display ", budget: 1, clicks: 1, conversions: 0, revenue: 0 },
			{ budget: 2, clicks: 2, conversions: 1, revenue: 3 },
		]);
		expect(table[0].name).toBe("Display");
		expect(table[1]).toMatchObject({ id: "campaign-2", name: "campaign-2", rowIndex: 1 });
		expect(Object.isFrozen(table)).toBe(true);
		expect(Object.isFrozen(table[0])).toBe(true);
	});
});
