export * from "./types";
export { average, maskWarmup, type SeriesValue } from "./series";
export { sma, smaSeries } from "./sma";
export { ema, emaSeries } from "./ema";
export { macd, macdSeries, type MacdResult, type MacdSeries } from "./macd";
export { rsiSeries } from "./rsi";
export {
	annualizeVolatility,
	percentReturns,
	sampleStdDev,
	volatilitySeries,
} from "./volatility";
export {
	DEFAULT_THRESHOLDS,
	classifyDirection,
	classifyPricePosition,
	classifyRsi,
	classifyTrend,
	classifyVolatility,
} from "./trend";
export { validatePriceSeries } from "./validateSeries";
export {
	DEFAULT_INDICATOR_PARAMETERS,
	computeIndicatorSet,
	defaultWarmup,
	requiredHistory,
	resolveParameters,
	snapshotOf,
} from "./indicatorEngine";
