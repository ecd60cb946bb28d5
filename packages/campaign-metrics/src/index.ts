export * from "./types";
export {
	buildCampaignTable,
	campaignId,
	parseCampaignCsv,
	parseNumericCell,
} from "./parseCampaignCsv";
export { validateCampaigns, type NegativeValue } from "./validateCampaigns";
export { calcKpis, safeRatio } from "./calcKpis";
export { summarize, summaryStatistics } from "./statistics";
export { rankBy, rankCampaigns } from "./rankings";
export { analyzeCampaignCsv, analyzeCampaignTable } from "./analyzeCampaigns";
export { formatKpiCsv, type FormatKpiCsvOptions, type KpiCsvMode } from "./formatKpiCsv";
