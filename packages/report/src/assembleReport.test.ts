import { describe, expect, it } from "vitest";
import { assembleReport } from "./assembleReport";
import { formatCell, formatFactValue } from "./formatValue";
import { GENERATED_AT, campaignAnalysis, stockAnalysis } from "./__tests__/bundles";

const ids = (bundle: Parameters<typeof assembleReport>[0]) =>
	assembleReport(bundle, { generatedAt: GENERATED_AT }).sections.map((section) => section.id);

describe("assembleReport", () => {
	it("yields only the overview and disclaimer for an empty bundle", () => {
		const report = assembleReport({}, { generatedAt: GENERATED_AT });
		expect(report.sections.map((section) => section.id)).toEqual(["overview", "disclaimer"]);
		expect(report.sections[0].facts).toEqual([
			{ label: "Generated", value: "2025-01-15T12:00:00.000Z", unit: "text" },
			{ label: "Contents", value: "no analyses", unit: "text" },
		]);
		expect(report.sections[1].prose).toEqual([
			"This analysis is for educational purposes only and is not financial or investment advice.",
		]);
	});

	it("orders stock, campaign and insight sections", () => {
		expect(
			ids({
				stock: stockAnalysis(),
				campaigns: campaignAnalysis(),
				insight: { status: "ok", text: "First.\n\nSecond.", intent: "trading", language: "en", attempts: 1 },
			})
		).toEqual([
			"overview",
			"stock-indicators",
			"stock-trend",
			"campaign-totals",
			"campaign-rankings",
			"campaign-records",
			"campaign-notes",
			"insight",
			"disclaimer",
		]);
	});

	it("builds a marketing-only report", () => {
		const report = assembleReport({ campaigns: campaignAnalysis() }, { generatedAt: GENERATED_AT });
		const totals = report.sections.find((section) => section.id === "campaign-totals");
		expect(totals?.facts.find((f) => f.label === "Overall ROI")).toEqual({
			label: "Overall ROI",
			value: 100,
			unit: "percent",
		});
		const records = report.sections.find((section) => section.id === "campaign-records");
		expect(records?.rows?.rows[1]).toEqual(["Dormant", 500, 500, 0, 0, 0, null, null]);
		const notes = report.sections.find((section) => section.id === "campaign-notes");
		expect(notes?.prose).toContain("campaign-2: conversionRate is undefined (clicks is zero)");
	});

	it("describes the trend of a falling stock", () => {
		const report = assembleReport({ stock: stockAnalysis() }, { generatedAt: GENERATED_AT });
		const trend = report.sections.find((section) => section.id === "stock-trend");
		expect(trend?.facts.slice(0, 2)).toEqual([
			{ label: "Trend", value: "Bearish", unit: "text" },
			{ label: "Indicator signal", value: "SELL", unit: "text" },
		]);
	});

	it("notes an unavailable insight without dropping the analysis", () => {
		const report = assembleReport(
			{
				stock: stockAnalysis(),
				insight: { status: "unavailable", reason: "timeout", message: "The insight service timed out.", attempts: 2 },
			},
			{ generatedAt: GENERATED_AT }
		);
		const insight = report.sections.find((section) => section.id === "insight");
		expect(insight?.prose).toEqual([
			"Insight unavailable: The insight service timed out. The figures above are unaffected.",
		]);
		expect(report.sections.some((section) => section.id === "stock-indicators")).toBe(true);
	});

	it("splits commentary into paragraphs", () => {
		const report = assembleReport(
			{ insight: { status: "ok", text: "First.\n\nSecond.", intent: "marketing", language: "ar", attempts: 1 } },
			{ generatedAt: GENERATED_AT, language: "ar" }
		);
		expect(report.sections.find((s) => s.id === "insight")?.prose).toEqual(["First.", "Second."]);
		expect(report.language).toBe("ar");
	});
});

describe("formatFactValue", () => {
	it("renders each unit and missing values", () => {
		expect(formatFactValue({ label: "Budget", value: 2500, unit: "currency" })).toBe("$2,500.00");
		expect(formatFactValue({ label: "ROI", value: 150, unit: "percent" })).toBe("150.00%");
		expect(formatFactValue({ label: "Bars", value: 1250, unit: "number" })).toBe("1,250");
		expect(formatFactValue({ label: "MACD", value: -0.123456, unit: "number" })).toBe("-0.1235");
		expect(formatFactValue({ label: "Trend", value: "Bullish", unit: "text" })).toBe("Bullish");
		expect(formatFactValue({ label: "RSI", value: null, unit: "number" })).toBe("n/a");
		expect(formatCell(Number.NaN, "percent")).toBe("n/a");
	});
});
