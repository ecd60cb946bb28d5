import type { InsightxConfig, PriceBar, PricePeriod, PriceSeries } from "@insightx/core";
import type { SeriesSource } from "../types";

export { ScriptedCompletionClient, timeoutError } from "@insightx/insights/testing";

export const risingBars = (length: number): PriceBar[] => {
	const start = Date.UTC(2024, 0, 2);
	return Array.from({ length }, (_, i) => ({
		timestamp: start + i * 86_400_000,
		open: 99 + i,
		high: 101 + i,
		low: 98 + i,
		close: 100 + i,
		volume: 1_000,
	}));
};

/** Series source that serves fixed bars, or a scripted failure. */
export class FakeSeriesSource implements SeriesSource {
	readonly calls: Array<{ ticker: string; period: PricePeriod }> = [];

	constructor(private readonly result: PriceBar[] | Error) {}

	async fetchSeries(ticker: string, period: PricePeriod): Promise<PriceSeries> {
		this.calls.push({ ticker, period });
		if (this.result instanceof Error) {
			throw this.result;
		}
		return { symbol: ticker.trim().toUpperCase(), period, bars: this.result };
	}
}

export const CAMPAIGN_CSV = [
	"Campaign,Budget,Clicks,Conversions,Revenue",
	"Search,1000,500,25,2500",
	"Social,1500,750,45,3750",
].join("\n");

export const testConfig = (): InsightxConfig => ({
	env: {
		anthropicApiKey: "",
		insightModel: "test-model",
		insightMaxTokens: 512,
		insightTimeoutMs: 5_000,
		marketDataTimeoutMs: 5_000,
		defaultTicker: "AAPL",
		defaultPeriod: "6mo",
		defaultLanguage: "en",
		analysisProfile: "default",
	},
	analysis: {
		indicators: {
			rsiPeriod: 14,
			macdFast: 12,
			macdSlow: 26,
			macdSignal: 9,
			smaShort: 20,
			smaLong: 50,
			volatilityWindow: 20,
		},
		thresholds: {
			highVolatility: 0.3,
			moderateVolatility: 0.2,
			rsiOverbought: 70,
			rsiOversold: 30,
		},
		insights: {
			expertise: "beginner",
			responseStyle: "concise",
			historyTurns: 6,
			retryBackoffMs: 250,
		},
	},
});
