import type { CampaignAnalysis } from "@insightx/campaign-metrics";
import type { IndicatorAnalysis } from "@insightx/indicators";
import type { FactLine, FactValue, MarketingFacts, TradingFacts } from "./types";

const MAX_CAMPAIGN_ROWS = 20;

/**
 * Scalars the prompt may quote for a stock analysis. Raw series never
 * leave the engine.
 */
export function buildTradingFacts(analysis: IndicatorAnalysis): TradingFacts {
	const { indicators, trend, statistics } = analysis;
	return Object.freeze({
		kind: "trading",
		symbol: analysis.symbol,
		period: analysis.period,
		lines: Object.freeze([
			{ label: "Current price", value: statistics.currentPrice, unit: "currency" },
			{ label: "Price change over period", value: statistics.priceChangePct, unit: "percent" },
			{ label: "Period high (close)", value: statistics.maxPrice, unit: "currency" },
			{ label: "Period low (close)", value: statistics.minPrice, unit: "currency" },
			{ label: `RSI (${indicators.parameters.rsiPeriod})`, value: indicators.rsi.latest },
			{ label: "MACD", value: indicators.macd.latest },
			{ label: "MACD signal", value: indicators.macdSignal.latest },
			{ label: "MACD histogram", value: indicators.macdHistogram.latest },
			{ label: `SMA ${indicators.parameters.smaShort}`, value: indicators.smaShort.latest, unit: "currency" },
			{ label: `SMA ${indicators.parameters.smaLong}`, value: indicators.smaLong.latest, unit: "currency" },
			{
				label: "Annualised volatility",
				value: indicators.annualizedVolatility === null ? null : indicators.annualizedVolatility * 100,
				unit: "percent",
			},
			{ label: "Trend", value: trend.trend },
			{ label: "Signal", value: trend.signal },
			{ label: "Volatility level", value: trend.volatilityLevel },
			{ label: "RSI zone", value: trend.rsiZone },
			{ label: "Price position", value: trend.pricePosition },
		] satisfies FactLine[]),
	});
}

export function buildMarketingFacts(analysis: CampaignAnalysis): MarketingFacts {
	const { aggregate } = analysis.kpis;
	const { roi, conversionRate } = analysis.rankings;
	const campaigns = analysis.kpis.records.slice(0, MAX_CAMPAIGN_ROWS).map((kpis, index) => {
		const record = analysis.table[index];
		return Object.freeze([
			{ label: "Campaign", value: kpis.name },
			{ label: "Budget", value: record.budget, unit: "currency" },
			{ label: "Revenue", value: record.revenue, unit: "currency" },
			{ label: "ROI", value: kpis.roi, unit: "percent" },
			{ label: "Conversion rate", value: kpis.conversionRate, unit: "percent" },
			{ label: "Cost per conversion", value: kpis.costPerConversion, unit: "currency" },
		] satisfies FactLine[]);
	});
	return Object.freeze({
		kind: "marketing",
		campaignCount: aggregate.campaignCount,
		lines: Object.freeze([
			{ label: "Campaigns analysed", value: aggregate.campaignCount },
			{ label: "Total budget", value: aggregate.totalBudget, unit: "currency" },
			{ label: "Total revenue", value: aggregate.totalRevenue, unit: "currency" },
			{ label: "Total profit", value: aggregate.totalProfit, unit: "currency" },
			{ label: "Overall ROI", value: aggregate.overallRoi, unit: "percent" },
			{ label: "Overall conversion rate", value: aggregate.overallConversionRate, unit: "percent" },
			{ label: "Overall cost per conversion", value: aggregate.overallCostPerConversion, unit: "currency" },
			{ label: "Best ROI campaign", value: roi.best?.name ?? null },
			{ label: "Worst ROI campaign", value: roi.worst?.name ?? null },
			{ label: "Best conversion-rate campaign", value: conversionRate.best?.name ?? null },
			{ label: "Records with undefined ratios", value: new Set(analysis.kpis.issues.map((i) => i.recordId)).size },
			{ label: "Data warnings", value: analysis.warnings.length },
		] satisfies FactLine[]),
		campaigns: Object.freeze(campaigns),
	});
}

export const NOT_AVAILABLE = "not available";

export const formatFact = (line: FactLine): string => {
	const value: FactValue = line.value;
	if (value === null) {
		return NOT_AVAILABLE;
	}
	if (typeof value === "string") {
		return value;
	}
	switch (line.unit) {
		case "currency":
			return `$${value.toFixed(2)}`;
		case "percent":
			return `${value.toFixed(2)}%`;
		default:
			return Number.isInteger(value) ? value.toString() : value.toFixed(4);
	}
};

const renderLines = (lines: readonly FactLine[]): string =>
	lines.map((line) => `- ${line.label}: ${formatFact(line)}`).join("\n");

/** Plain-text block of facts for a prompt. */
export function renderFacts(facts: TradingFacts | MarketingFacts): string {
	if (facts.kind === "trading") {
		return [`Ticker: ${facts.symbol} (period ${facts.period})`, renderLines(facts.lines)].join("\n");
	}
	const rows = facts.campaigns.map((campaign) =>
		campaign.map((line) => `${line.label}: ${formatFact(line)}`).join(", ")
	);
	const omitted = facts.campaignCount - facts.campaigns.length;
	return [
		renderLines(facts.lines),
		"Campaigns:",
		...rows.map((row) => `- ${row}`),
		...(omitted > 0 ? [`- (${omitted} more campaigns not listed)`] : []),
	].join("\n");
}
