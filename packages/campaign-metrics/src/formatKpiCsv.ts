import type { CampaignAnalysis } from "./types";

export type KpiCsvMode = "records" | "summary";

export interface FormatKpiCsvOptions {
	mode?: KpiCsvMode;
	includeHeader?: boolean;
}

type CsvRow = Record<string, string | number | null>;

export const formatKpiCsv = (
	analysis: CampaignAnalysis,
	options: FormatKpiCsvOptions = {}
): string => {
	const includeHeader = options.includeHeader ?? true;
	switch (options.mode ?? "records") {
		case "summary":
			return toCsv([buildSummaryRow(analysis)], includeHeader);
		case "records":
		default:
			return toCsv(buildRecordRows(analysis), includeHeader);
	}
};

const buildRecordRows = (analysis: CampaignAnalysis): CsvRow[] =>
	analysis.table.map((record, index) => {
		const kpis = analysis.kpis.records[index];
		return {
			id: record.id,
			name: record.name,
			budget: record.budget,
			clicks: record.clicks,
			conversions: record.conversions,
			revenue: record.revenue,
			profit: kpis.profit,
			roi: kpis.roi,
			conversionRate: kpis.conversionRate,
			costPerConversion: kpis.costPerConversion,
			costPerClick: kpis.costPerClick,
			revenuePerClick: kpis.revenuePerClick,
			profitMargin: kpis.profitMargin,
			clickShare: kpis.clickShare,
		};
	});

const buildSummaryRow = (analysis: CampaignAnalysis): CsvRow => {
	const { aggregate } = analysis.kpis;
	return {
		campaigns: aggregate.campaignCount,
		totalBudget: aggregate.totalBudget,
		totalRevenue: aggregate.totalRevenue,
		totalClicks: aggregate.totalClicks,
		totalConversions: aggregate.totalConversions,
		totalProfit: aggregate.totalProfit,
		overallRoi: aggregate.overallRoi,
		overallConversionRate: aggregate.overallConversionRate,
		overallCostPerConversion: aggregate.overallCostPerConversion,
		bestRoi: analysis.rankings.roi.best?.name ?? null,
		worstRoi: analysis.rankings.roi.worst?.name ?? null,
		issues: analysis.kpis.issues.length,
		warnings: analysis.warnings.length,
	};
};

const toCsv = (rows: CsvRow[], includeHeader: boolean): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: string | number | null | undefined): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
	}
	return Number.isFinite(value) ? value.toString() : "";
};
