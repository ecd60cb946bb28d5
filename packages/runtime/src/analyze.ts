import { analyzeCampaignCsv, type CampaignAnalysis } from "@insightx/campaign-metrics";
import {
	AnalysisError,
	createLogger,
	describeError,
	isAnalysisError,
	type AnalysisErrorCode,
	type PricePeriod,
} from "@insightx/core";
import { computeIndicatorSet } from "@insightx/indicators";
import type { AnalysisBundle, StockAnalysis, StockDeps, StockRequest } from "./types";

const logger = createLogger("runtime");

export const DEFAULT_PERIOD: PricePeriod = "1y";

/** Pass AnalysisErrors through; wrap anything else under `code`. */
export const toAnalysisError = (
	error: unknown,
	code: AnalysisErrorCode,
	context: string
): AnalysisError =>
	isAnalysisError(error)
		? error
		: new AnalysisError(code, `${context}: ${describeError(error)}`, { cause: error });

/**
 * Fetch a price series and compute its indicators and trend.
 */
export async function analyzeStock(request: StockRequest, deps: StockDeps): Promise<StockAnalysis> {
	const period = request.period ?? deps.defaultPeriod ?? DEFAULT_PERIOD;
	const series = await deps.source.fetchSeries(request.ticker, period).catch((error: unknown) => {
		throw toAnalysisError(error, "NoDataFound", `Could not load ${request.ticker}`);
	});

	try {
		const analysis = computeIndicatorSet(series, {
			...deps.analysis?.indicators,
			thresholds: deps.analysis?.thresholds,
		});
		logger.info("stock_analyzed", {
			ticker: request.ticker,
			symbol: series.symbol,
			period,
			bars: series.bars.length,
			trend: analysis.trend.trend,
		});
		return Object.freeze({ ...analysis, ticker: request.ticker, series });
	} catch (error) {
		throw toAnalysisError(error, "InvalidSeries", `Could not analyse ${series.symbol}`);
	}
}

/**
 * Parse and analyse campaign CSV text.
 */
export function analyzeCampaigns(csvText: string): CampaignAnalysis {
	try {
		const analysis = analyzeCampaignCsv(csvText);
		logger.info("campaigns_analyzed", {
			campaigns: analysis.kpis.aggregate.campaignCount,
			issues: analysis.kpis.issues.length,
			warnings: analysis.warnings.length,
		});
		return analysis;
	} catch (error) {
		throw toAnalysisError(error, "ParseError", "Could not read the campaign file");
	}
}

export const buildAnalysisBundle = (parts: AnalysisBundle): AnalysisBundle =>
	Object.freeze({
		...(parts.stock ? { stock: parts.stock } : {}),
		...(parts.campaigns ? { campaigns: parts.campaigns } : {}),
		...(parts.insight ? { insight: parts.insight } : {}),
	});
