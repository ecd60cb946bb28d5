import type { CampaignAnalysis, Ranking } from "@insightx/campaign-metrics";
import type { IndicatorAnalysis } from "@insightx/indicators";
import { DISCLAIMER, type InsightResult } from "@insightx/insights";
import type {
	AnalysisBundle,
	AssembleOptions,
	CellValue,
	ReportDocument,
	ReportFact,
	ReportSection,
} from "./types";

const fact = (label: string, value: ReportFact["value"], unit: ReportFact["unit"] = "number"): ReportFact => ({
	label,
	value,
	unit,
});

const describeContents = (bundle: AnalysisBundle): string => {
	const parts = [
		bundle.stock ? `stock analysis (${bundle.stock.symbol})` : null,
		bundle.campaigns ? `campaign analysis (${bundle.campaigns.kpis.aggregate.campaignCount} campaigns)` : null,
		bundle.insight ? "generated commentary" : null,
	].filter((part): part is string => part !== null);
	return parts.length ? parts.join(", ") : "no analyses";
};

const overviewSection = (bundle: AnalysisBundle, generatedAt: string): ReportSection => ({
	id: "overview",
	title: "Overview",
	facts: [fact("Generated", generatedAt, "text"), fact("Contents", describeContents(bundle), "text")],
});

const stockSections = (stock: IndicatorAnalysis): ReportSection[] => {
	const { indicators, statistics, trend } = stock;
	const { parameters } = indicators;
	return [
		{
			id: "stock-indicators",
			title: `Technical indicators: ${stock.symbol}`,
			facts: [
				fact("Ticker", stock.symbol, "text"),
				fact("Period", stock.period, "text"),
				fact("Bars", indicators.length),
				fact("Current price", statistics.currentPrice, "currency"),
				fact("Price change", statistics.priceChangePct, "percent"),
				fact("Period high (close)", statistics.maxPrice, "currency"),
				fact("Period low (close)", statistics.minPrice, "currency"),
				fact("Average volume", statistics.averageVolume),
				fact(`RSI (${parameters.rsiPeriod})`, indicators.rsi.latest),
				fact("MACD", indicators.macd.latest),
				fact("MACD signal", indicators.macdSignal.latest),
				fact("MACD histogram", indicators.macdHistogram.latest),
				fact(`SMA ${parameters.smaShort}`, indicators.smaShort.latest, "currency"),
				fact(`SMA ${parameters.smaLong}`, indicators.smaLong.latest, "currency"),
				fact(
					"Annualised volatility",
					indicators.annualizedVolatility === null ? null : indicators.annualizedVolatility * 100,
					"percent"
				),
			],
		},
		{
			id: "stock-trend",
			title: "Trend classification",
			facts: [
				fact("Trend", trend.trend, "text"),
				fact("Indicator signal", trend.signal, "text"),
				fact("Volatility level", trend.volatilityLevel, "text"),
				fact("RSI zone", trend.rsiZone, "text"),
				fact("Price position", trend.pricePosition, "text"),
			],
			prose: [trend.summary],
		},
	];
};

const rankingRow = (label: string, ranking: Ranking): CellValue[] => [
	label,
	ranking.best?.name ?? null,
	ranking.best?.value ?? null,
	ranking.worst?.name ?? null,
	ranking.worst?.value ?? null,
];

const campaignSections = (campaigns: CampaignAnalysis): ReportSection[] => {
	const { aggregate, records, issues } = campaigns.kpis;
	const { rankings, warnings, table } = campaigns;
	const sections: ReportSection[] = [
		{
			id: "campaign-totals",
			title: "Campaign totals",
			facts: [
				fact("Campaigns", aggregate.campaignCount),
				fact("Total budget", aggregate.totalBudget, "currency"),
				fact("Total revenue", aggregate.totalRevenue, "currency"),
				fact("Total profit", aggregate.totalProfit, "currency"),
				fact("Total clicks", aggregate.totalClicks),
				fact("Total conversions", aggregate.totalConversions),
				fact("Overall ROI", aggregate.overallRoi, "percent"),
				fact("Overall conversion rate", aggregate.overallConversionRate, "percent"),
				fact("Overall cost per conversion", aggregate.overallCostPerConversion, "currency"),
			],
		},
		{
			id: "campaign-rankings",
			title: "Rankings",
			facts: [],
			rows: {
				columns: ["Metric", "Best", "Best value", "Worst", "Worst value"],
				units: ["text", "text", "number", "text", "number"],
				rows: [
					rankingRow("ROI (%)", rankings.roi),
					rankingRow("Conversion rate (%)", rankings.conversionRate),
					rankingRow("Profit ($)", rankings.profit),
				],
			},
		},
		{
			id: "campaign-records",
			title: "Per-campaign KPIs",
			facts: [],
			rows: {
				columns: ["Campaign", "Budget", "Revenue", "Clicks", "Conversions", "ROI", "Conv. rate", "Cost/conv."],
				units: ["text", "currency", "currency", "number", "number", "percent", "percent", "currency"],
				rows: records.map((kpis, index) => [
					kpis.name,
					table[index].budget,
					table[index].revenue,
					table[index].clicks,
					table[index].conversions,
					kpis.roi,
					kpis.conversionRate,
					kpis.costPerConversion,
				]),
			},
		},
	];

	if (warnings.length || issues.length) {
		sections.push({
			id: "campaign-notes",
			title: "Data notes",
			facts: [fact("Warnings", warnings.length), fact("Undefined ratios", issues.length)],
			prose: [
				...warnings.map((warning) => warning.message),
				...issues.map((issue) => `${issue.recordId}: ${issue.metric} is undefined (${issue.reason})`),
			],
		});
	}
	return sections;
};

const insightSection = (insight: InsightResult): ReportSection =>
	insight.status === "ok"
		? { id: "insight", title: "Commentary", facts: [], prose: insight.text.split(/\n{2,}/) }
		: {
				id: "insight",
				title: "Commentary",
				facts: [fact("Status", "unavailable", "text"), fact("Reason", insight.reason, "text")],
				prose: [`Insight unavailable: ${insight.message} The figures above are unaffected.`],
			};

/**
 * Lay out whichever analyses the bundle carries as ordered sections:
 * overview, stock, campaigns, commentary, disclaimer.
 */
export function assembleReport(bundle: AnalysisBundle, options: AssembleOptions = {}): ReportDocument {
	const language = options.language ?? "en";
	const generatedAt = (options.generatedAt ?? new Date()).toISOString();
	const sections: ReportSection[] = [
		overviewSection(bundle, generatedAt),
		...(bundle.stock ? stockSections(bundle.stock) : []),
		...(bundle.campaigns ? campaignSections(bundle.campaigns) : []),
		...(bundle.insight ? [insightSection(bundle.insight)] : []),
		{ id: "disclaimer", title: "Disclaimer", facts: [], prose: [DISCLAIMER[language]] },
	];
	return Object.freeze({
		title: options.title ?? "InsightX Analysis Report",
		generatedAt,
		language,
		sections: Object.freeze(sections),
	});
}
