import { createLogger } from "@insightx/core";
import { calcKpis } from "./calcKpis";
import { parseCampaignCsv } from "./parseCampaignCsv";
import { rankCampaigns } from "./rankings";
import { summaryStatistics } from "./statistics";
import type { CampaignAnalysis, CampaignTable } from "./types";
import { validateCampaigns } from "./validateCampaigns";

const logger = createLogger("campaign-metrics");

/**
 * Validate a table and compute KPIs, summary statistics and rankings.
 * Throws SchemaError or NegativeValueError; undefined ratios travel as
 * issues on the result.
 */
export function analyzeCampaignTable(table: CampaignTable): CampaignAnalysis {
	const warnings = validateCampaigns(table);
	const kpis = calcKpis(table);
	const analysis: CampaignAnalysis = Object.freeze({
		table,
		kpis,
		rankings: rankCampaigns(kpis.records),
		statistics: summaryStatistics(table, kpis.records),
		warnings: Object.freeze(warnings),
	});

	logger.debug("campaign_summary", {
		campaigns: table.length,
		totalBudget: kpis.aggregate.totalBudget,
		totalRevenue: kpis.aggregate.totalRevenue,
		overallRoi: kpis.aggregate.overallRoi,
		overallConversionRate: kpis.aggregate.overallConversionRate,
		issues: kpis.issues.length,
		warnings: warnings.length,
	});
	for (const warning of warnings) {
		logger.warn("campaign_warning", { ...warning });
	}

	return analysis;
}

export const analyzeCampaignCsv = (text: string): CampaignAnalysis =>
	analyzeCampaignTable(parseCampaignCsv(text));
