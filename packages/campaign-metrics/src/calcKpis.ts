import type {
	AggregateKpis,
	CampaignKpis,
	CampaignRecord,
	CampaignTable,
	KpiIssue,
	KpiSet,
	RecordMetric,
} from "./types";

const sum = (values: readonly number[]): number =>
	values.reduce((acc, value) => acc + value, 0);

/** `numerator / denominator`, or null when the denominator is zero. */
export const safeRatio = (numerator: number, denominator: number): number | null =>
	denominator === 0 ? null : numerator / denominator;

const percent = (value: number | null): number | null => (value === null ? null : value * 100);

interface RatioRule {
	metric: RecordMetric;
	reason: string;
	compute: (record: CampaignRecord, totalClicks: number) => number | null;
}

const RATIOS: readonly RatioRule[] = [
	{
		metric: "roi",
		reason: "budget is zero",
		compute: (r) => percent(safeRatio(r.revenue - r.budget, r.budget)),
	},
	{
		metric: "conversionRate",
		reason: "clicks is zero",
		compute: (r) => percent(safeRatio(r.conversions, r.clicks)),
	},
	{
		metric: "costPerConversion",
		reason: "conversions is zero",
		compute: (r) => safeRatio(r.budget, r.conversions),
	},
	{
		metric: "costPerClick",
		reason: "clicks is zero",
		compute: (r) => safeRatio(r.budget, r.clicks),
	},
	{
		metric: "revenuePerClick",
		reason: "clicks is zero",
		compute: (r) => safeRatio(r.revenue, r.clicks),
	},
	{
		metric: "profitMargin",
		reason: "revenue is zero",
		compute: (r) => percent(safeRatio(r.revenue - r.budget, r.revenue)),
	},
	{
		metric: "clickShare",
		reason: "total clicks is zero",
		compute: (r, totalClicks) => percent(safeRatio(r.clicks, totalClicks)),
	},
];

/**
 * Per-record KPIs plus aggregates. Aggregate ratios are ratios of sums; a
 * zero denominator yields null and, per record, a DivisionUndefined issue.
 */
export function calcKpis(table: CampaignTable): KpiSet {
	const totalBudget = sum(table.map((r) => r.budget));
	const totalRevenue = sum(table.map((r) => r.revenue));
	const totalClicks = sum(table.map((r) => r.clicks));
	const totalConversions = sum(table.map((r) => r.conversions));
	const issues: KpiIssue[] = [];

	const records = table.map((record): CampaignKpis => {
		const values: Partial<Record<RecordMetric, number | null>> = {};
		for (const rule of RATIOS) {
			const value = rule.compute(record, totalClicks);
			if (value === null) {
				issues.push({
					code: "DivisionUndefined",
					recordId: record.id,
					metric: rule.metric,
					reason: rule.reason,
				});
			}
			values[rule.metric] = value;
		}
		return Object.freeze({
			recordId: record.id,
			name: record.name,
			rowIndex: record.rowIndex,
			profit: record.revenue - record.budget,
			roi: values.roi ?? null,
			conversionRate: values.conversionRate ?? null,
			costPerConversion: values.costPerConversion ?? null,
			costPerClick: values.costPerClick ?? null,
			revenuePerClick: values.revenuePerClick ?? null,
			profitMargin: values.profitMargin ?? null,
			clickShare: values.clickShare ?? null,
		});
	});

	const aggregate: AggregateKpis = {
		campaignCount: table.length,
		totalBudget,
		totalRevenue,
		totalClicks,
		totalConversions,
		totalProfit: totalRevenue - totalBudget,
		overallRoi: percent(safeRatio(totalRevenue - totalBudget, totalBudget)),
		overallConversionRate: percent(safeRatio(totalConversions, totalClicks)),
		overallCostPerConversion: safeRatio(totalBudget, totalConversions),
	};

	return Object.freeze({
		records: Object.freeze(records),
		aggregate: Object.freeze(aggregate),
		issues: Object.freeze(issues),
	});
}
