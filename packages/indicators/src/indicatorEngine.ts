import {
	AnalysisError,
	createLogger,
	type PriceBar,
	type PriceSeries,
} from "@insightx/core";
import { macdSeries } from "./macd";
import { rsiSeries } from "./rsi";
import { average, maskWarmup, type SeriesValue } from "./series";
import { smaSeries } from "./sma";
import { DEFAULT_THRESHOLDS, classifyTrend } from "./trend";
import type {
	IndicatorAnalysis,
	IndicatorName,
	IndicatorOptions,
	IndicatorParameters,
	IndicatorSeries,
	IndicatorSet,
	IndicatorSnapshot,
	PriceStatistics,
} from "./types";
import { validatePriceSeries } from "./validateSeries";
import { annualizeVolatility, volatilitySeries } from "./volatility";

const logger = createLogger("indicators");

export const DEFAULT_INDICATOR_PARAMETERS: IndicatorParameters = {
	rsiPeriod: 14,
	macdFast: 12,
	macdSlow: 26,
	macdSignal: 9,
	smaShort: 20,
	smaLong: 50,
	volatilityWindow: 20,
};

export const resolveParameters = (
	options: IndicatorOptions = {}
): IndicatorParameters => ({
	rsiPeriod: options.rsiPeriod ?? DEFAULT_INDICATOR_PARAMETERS.rsiPeriod,
	macdFast: options.macdFast ?? DEFAULT_INDICATOR_PARAMETERS.macdFast,
	macdSlow: options.macdSlow ?? DEFAULT_INDICATOR_PARAMETERS.macdSlow,
	macdSignal: options.macdSignal ?? DEFAULT_INDICATOR_PARAMETERS.macdSignal,
	smaShort: options.smaShort ?? DEFAULT_INDICATOR_PARAMETERS.smaShort,
	smaLong: options.smaLong ?? DEFAULT_INDICATOR_PARAMETERS.smaLong,
	volatilityWindow:
		options.volatilityWindow ?? DEFAULT_INDICATOR_PARAMETERS.volatilityWindow,
});

/**
 * First index at which each indicator is defined with the given windows.
 */
export const defaultWarmup = (
	params: IndicatorParameters
): Record<IndicatorName, number> => ({
	rsi: params.rsiPeriod,
	macd: params.macdSlow - 1,
	macdSignal: params.macdSlow + params.macdSignal - 2,
	macdHistogram: params.macdSlow + params.macdSignal - 2,
	smaShort: params.smaShort - 1,
	smaLong: params.smaLong - 1,
	volatility: params.volatilityWindow,
});

/**
 * Bars needed before every windowed indicator has at least one value.
 */
export const requiredHistory = (params: IndicatorParameters): number =>
	Math.max(
		params.smaLong,
		params.smaShort,
		params.macdSlow + params.macdSignal - 1,
		params.rsiPeriod + 1,
		params.volatilityWindow + 1
	);

const buildSeries = (
	values: readonly SeriesValue[],
	warmup: number
): IndicatorSeries => {
	const masked = maskWarmup(values, warmup);
	return Object.freeze({
		values: Object.freeze(masked),
		latest: masked.length ? masked[masked.length - 1] : null,
		warmup,
	});
};

const computeStatistics = (bars: readonly PriceBar[]): PriceStatistics => {
	const closes = bars.map((bar) => bar.close);
	const first = bars[0];
	const last = bars[bars.length - 1];
	return {
		currentPrice: last.close,
		priceChangePct: (last.close / first.close - 1) * 100,
		averageVolume: average(bars.map((bar) => bar.volume)),
		maxPrice: Math.max(...closes),
		minPrice: Math.min(...closes),
		latestVolume: last.volume,
		firstTimestamp: first.timestamp,
		lastTimestamp: last.timestamp,
	};
};

/**
 * Compute RSI, MACD, moving averages and volatility for a price series,
 * then classify the trend from the latest values.
 *
 * Throws `InvalidSeries` for out-of-order or inconsistent bars and
 * `InsufficientHistory` when the series is shorter than the longest window.
 */
export function computeIndicatorSet(
	series: PriceSeries,
	options: IndicatorOptions = {}
): IndicatorAnalysis {
	const params = resolveParameters(options);
	if (params.macdFast >= params.macdSlow) {
		throw new AnalysisError(
			"ConfigError",
			`MACD fast length (${params.macdFast}) must be below slow length (${params.macdSlow})`
		);
	}

	validatePriceSeries(series);

	const required = requiredHistory(params);
	if (series.bars.length < required) {
		throw new AnalysisError(
			"InsufficientHistory",
			`${series.symbol} has ${series.bars.length} bars; at least ${required} are required`,
			{
				details: {
					symbol: series.symbol,
					bars: series.bars.length,
					required,
				},
			}
		);
	}

	const warmup = { ...defaultWarmup(params), ...(options.warmup ?? {}) };
	const closes = series.bars.map((bar) => bar.close);
	const macdRaw = macdSeries(
		closes,
		params.macdFast,
		params.macdSlow,
		params.macdSignal
	);
	const volatility = buildSeries(
		volatilitySeries(closes, params.volatilityWindow),
		warmup.volatility
	);

	const indicators: IndicatorSet = Object.freeze({
		length: closes.length,
		parameters: Object.freeze({ ...params }),
		rsi: buildSeries(rsiSeries(closes, params.rsiPeriod), warmup.rsi),
		macd: buildSeries(macdRaw.macd, warmup.macd),
		macdSignal: buildSeries(macdRaw.signal, warmup.macdSignal),
		macdHistogram: buildSeries(macdRaw.histogram, warmup.macdHistogram),
		smaShort: buildSeries(smaSeries(closes, params.smaShort), warmup.smaShort),
		smaLong: buildSeries(smaSeries(closes, params.smaLong), warmup.smaLong),
		volatility,
		annualizedVolatility:
			volatility.latest === null ? null : annualizeVolatility(volatility.latest),
	});

	const snapshot: IndicatorSnapshot = {
		close: closes[closes.length - 1],
		rsi: indicators.rsi.latest,
		macd: indicators.macd.latest,
		macdSignal: indicators.macdSignal.latest,
		smaShort: indicators.smaShort.latest,
		smaLong: indicators.smaLong.latest,
		annualizedVolatility: indicators.annualizedVolatility,
	};
	const trend = classifyTrend(snapshot, {
		...DEFAULT_THRESHOLDS,
		...(options.thresholds ?? {}),
	});

	logger.debug("indicator_snapshot", {
		symbol: series.symbol,
		bars: closes.length,
		...snapshot,
		volatility: snapshot.annualizedVolatility,
		trend: trend.trend,
	});

	return Object.freeze({
		symbol: series.symbol,
		period: series.period,
		indicators,
		trend: Object.freeze(trend),
		statistics: Object.freeze(computeStatistics(series.bars)),
	});
}

/**
 * Latest values of an already computed set, in the shape the trend rules read.
 */
export const snapshotOf = (
	analysis: IndicatorAnalysis
): IndicatorSnapshot => ({
	close: analysis.statistics.currentPrice,
	rsi: analysis.indicators.rsi.latest,
	macd: analysis.indicators.macd.latest,
	macdSignal: analysis.indicators.macdSignal.latest,
	smaShort: analysis.indicators.smaShort.latest,
	smaLong: analysis.indicators.smaLong.latest,
	annualizedVolatility: analysis.indicators.annualizedVolatility,
});
