import { analyzeCampaignTable, buildCampaignTable, type CampaignAnalysis } from "@insightx/campaign-metrics";
import { computeIndicatorSet, type IndicatorAnalysis } from "@insightx/indicators";

export const GENERATED_AT = new Date(Date.UTC(2025, 0, 15, 12, 0, 0));

export const stockAnalysis = (): IndicatorAnalysis => {
	const start = Date.UTC(2024, 0, 2);
	return computeIndicatorSet({
		symbol: "MSFT",
		period: "6mo",
		bars: Array.from({ length: 60 }, (_, i) => ({
			timestamp: start + i * 86_400_000,
			open: 300 - i,
			high: 301 - i,
			low: 298.5 - i,
			close: 299.5 - i,
			volume: 2_000,
		})),
	});
};

export const campaignAnalysis = (): CampaignAnalysis =>
	analyzeCampaignTable(
		buildCampaignTable([
			{ name: "Search", budget: 1000, clicks: 500, conversions: 25, revenue: 2500 },
			{ name: "Dormant", budget: 500, clicks: 0, conversions: 0, revenue: 500 },
		])
	);
