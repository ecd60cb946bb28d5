import type {
	CampaignKpis,
	CampaignTable,
	SummaryColumn,
	SummaryStatistics,
	SummaryStats,
} from "./types";

export function summarize(values: readonly (number | null)[]): SummaryStats {
	const defined = values.filter((value): value is number => value !== null);
	const count = defined.length;
	if (!count) {
		return { count, total: null, mean: null, median: null, min: null, max: null, std: null };
	}
	const total = defined.reduce((acc, value) => acc + value, 0);
	const mean = total / count;
	const sorted = [...defined].sort((a, b) => a - b);
	const middle = Math.floor(count / 2);
	const median = count % 2 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
	const std =
		count < 2
			? null
			: Math.sqrt(defined.reduce((acc, value) => acc + (value - mean) ** 2, 0) / (count - 1));
	return {
		count,
		total,
		mean,
		median,
		min: sorted[0],
		max: sorted[count - 1],
		std,
	};
}

/**
 * Describe each numeric column over the values that are defined.
 */
export function summaryStatistics(
	table: CampaignTable,
	kpis: readonly CampaignKpis[]
): SummaryStatistics {
	const columns: Record<SummaryColumn, (number | null)[]> = {
		budget: table.map((r) => r.budget),
		clicks: table.map((r) => r.clicks),
		conversions: table.map((r) => r.conversions),
		revenue: table.map((r) => r.revenue),
		roi: kpis.map((k) => k.roi),
		conversionRate: kpis.map((k) => k.conversionRate),
		costPerConversion: kpis.map((k) => k.costPerConversion),
		profit: kpis.map((k) => k.profit),
	};
	return Object.freeze({
		budget: summarize(columns.budget),
		clicks: summarize(columns.clicks),
		conversions: summarize(columns.conversions),
		revenue: summarize(columns.revenue),
		roi: summarize(columns.roi),
		conversionRate: summarize(columns.conversionRate),
		costPerConversion: summarize(columns.costPerConversion),
		profit: summarize(columns.profit),
	});
}
