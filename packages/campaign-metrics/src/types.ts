export const REQUIRED_COLUMNS = ["Budget", "Clicks", "Conversions", "Revenue"] as const;
export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export const NAME_COLUMNS = ["Campaign", "Campaign Name", "Name"] as const;

export interface CampaignRecord {
	/** Unique, `campaign-<row>` (1-based). */
	id: string;
	name: string;
	budget: number;
	clicks: number;
	conversions: number;
	revenue: number;
	/** 0-based position in the source table. */
	rowIndex: number;
}

export type CampaignTable = readonly CampaignRecord[];

export interface CampaignInput {
	name?: string;
	budget: number;
	clicks: number;
	conversions: number;
	revenue: number;
}

export type RecordMetric =
	| "roi"
	| "conversionRate"
	| "costPerConversion"
	| "costPerClick"
	| "revenuePerClick"
	| "profitMargin"
	| "clickShare";

export interface KpiIssue {
	code: "DivisionUndefined";
	recordId: string;
	metric: RecordMetric;
	reason: string;
}

export interface CampaignWarning {
	code: "ConversionsExceedClicks";
	recordId: string;
	rowIndex: number;
	message: string;
}

export interface CampaignKpis {
	recordId: string;
	name: string;
	rowIndex: number;
	profit: number;
	roi: number | null;
	conversionRate: number | null;
	costPerConversion: number | null;
	costPerClick: number | null;
	revenuePerClick: number | null;
	profitMargin: number | null;
	clickShare: number | null;
}

export interface AggregateKpis {
	campaignCount: number;
	totalBudget: number;
	totalRevenue: number;
	totalClicks: number;
	totalConversions: number;
	totalProfit: number;
	overallRoi: number | null;
	overallConversionRate: number | null;
	overallCostPerConversion: number | null;
}

export interface KpiSet {
	records: readonly CampaignKpis[];
	aggregate: AggregateKpis;
	issues: readonly KpiIssue[];
}

export interface SummaryStats {
	count: number;
	total: number | null;
	mean: number | null;
	median: number | null;
	min: number | null;
	max: number | null;
	/** Sample standard deviation; null below two values. */
	std: number | null;
}

export type SummaryColumn =
	| "budget"
	| "clicks"
	| "conversions"
	| "revenue"
	| "roi"
	| "conversionRate"
	| "costPerConversion"
	| "profit";

export type SummaryStatistics = Readonly<Record<SummaryColumn, SummaryStats>>;

export type RankingMetric = "roi" | "conversionRate" | "profit";

export interface RankedEntry {
	id: string;
	name: string;
	rowIndex: number;
	value: number;
}

export interface Ranking {
	metric: RankingMetric;
	best: RankedEntry | null;
	worst: RankedEntry | null;
}

export type Rankings = Readonly<Record<RankingMetric, Ranking>>;

export interface CampaignAnalysis {
	table: CampaignTable;
	kpis: KpiSet;
	rankings: Rankings;
	statistics: SummaryStatistics;
	warnings: readonly CampaignWarning[];
}
