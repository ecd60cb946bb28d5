import { isAnalysisError } from "@insightx/core";
import { DISCLAIMER } from "@insightx/insights";
import { describe, expect, it } from "vitest";
import { assembleReport } from "./assembleReport";
import { printableProse, renderReportPdf } from "./renderPdf";
import type { ReportSection } from "./types";
import { GENERATED_AT, campaignAnalysis, stockAnalysis } from "./__tests__/bundles";

describe("renderReportPdf", () => {
	it("renders a full report to PDF bytes", async () => {
		const report = assembleReport(
			{ stock: stockAnalysis(), campaigns: campaignAnalysis() },
			{ generatedAt: GENERATED_AT }
		);
		const pdf = await renderReportPdf(report);
		expect(pdf.subarray(0, 4).toString("latin1")).toBe("%PDF");
		expect(pdf.length).toBeGreaterThan(1000);
	});

	it("renders an empty report", async () => {
		const pdf = await renderReportPdf(assembleReport({}, { generatedAt: GENERATED_AT }));
		expect(pdf.subarray(0, 4).toString("latin1")).toBe("%PDF");
	});

	it("raises FormatError for unreadable image data", async () => {
		const report = assembleReport({}, { generatedAt: GENERATED_AT });
		try {
			await renderReportPdf(report, { images: [{ title: "Chart", data: Buffer.from("not an image") }] });
			expect.unreachable();
		} catch (error) {
			expect(isAnalysisError(error, "FormatError")).toBe(true);
		}
	});
});

describe("printableProse", () => {
	const insight: ReportSection = {
		id: "insight",
		title: "Insight",
		facts: [],
		prose: ["السوق في اتجاه صاعد.", "RSI 72.5"],
	};
	const disclaimer: ReportSection = { id: "disclaimer", title: "Disclaimer", facts: [], prose: [DISCLAIMER.ar] };

	it("drops Arabic paragraphs and uses the English disclaimer without an Arabic font", () => {
		expect(printableProse(insight, false)).toEqual(["RSI 72.5"]);
		expect(printableProse(disclaimer, false)).toEqual([DISCLAIMER.en]);
	});

	it("keeps every paragraph when a font file is given", () => {
		expect(printableProse(insight, true)).toEqual(["السوق في اتجاه صاعد.", "RSI 72.5"]);
		expect(printableProse(disclaimer, true)).toEqual([DISCLAIMER.ar]);
	});

	it("renders an Arabic report without a font file", async () => {
		const report = assembleReport({ campaigns: campaignAnalysis() }, { generatedAt: GENERATED_AT, language: "ar" });
		const pdf = await renderReportPdf(report);
		expect(pdf.subarray(0, 4).toString("latin1")).toBe("%PDF");
	});
});
