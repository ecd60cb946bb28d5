import type { CampaignAnalysis } from "@insightx/campaign-metrics";
import type { AnalysisConfig, PricePeriod, PriceSeries } from "@insightx/core";
import type { IndicatorAnalysis } from "@insightx/indicators";
import type { InsightDeps, InsightResult } from "@insightx/insights";

export interface StockRequest {
	ticker: string;
	period?: PricePeriod;
}

export interface StockAnalysis extends IndicatorAnalysis {
	/** Ticker as entered, before normalisation. */
	ticker: string;
	series: PriceSeries;
}

export interface AnalysisBundle {
	stock?: StockAnalysis;
	campaigns?: CampaignAnalysis;
	insight?: InsightResult;
}

/** Anything that can turn a ticker and period into a price series. */
export interface SeriesSource {
	fetchSeries(ticker: string, period: PricePeriod): Promise<PriceSeries>;
}

export interface StockDeps {
	source: SeriesSource;
	analysis?: AnalysisConfig;
	defaultPeriod?: PricePeriod;
}

export interface RuntimeDeps extends StockDeps {
	insights: InsightDeps;
}
