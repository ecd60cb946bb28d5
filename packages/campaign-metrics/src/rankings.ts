import type { CampaignKpis, RankedEntry, Ranking, RankingMetric, Rankings } from "./types";

const toEntry = (kpis: CampaignKpis, value: number): RankedEntry => ({
	id: kpis.recordId,
	name: kpis.name,
	rowIndex: kpis.rowIndex,
	value,
});

/**
 * Best (argmax) and worst (argmin) record for a metric, skipping undefined
 * values. Strict comparisons keep the earliest row on ties.
 */
export function rankBy(records: readonly CampaignKpis[], metric: RankingMetric): Ranking {
	let best: RankedEntry | null = null;
	let worst: RankedEntry | null = null;
	for (const record of records) {
		const value = record[metric];
		if (value === null) {
			continue;
		}
		if (best === null || value > best.value) {
			best = toEntry(record, value);
		}
		if (worst === null || value < worst.value) {
			worst = toEntry(record, value);
		}
	}
	return Object.freeze({ metric, best, worst });
}

export const rankCampaigns = (records: readonly CampaignKpis[]): Rankings =>
	Object.freeze({
		roi: rankBy(records, "roi"),
		conversionRate: rankBy(records, "conversionRate"),
		profit: rankBy(records, "profit"),
	});
