import type { IndicatorConfig, PricePeriod, ThresholdConfig } from "@insightx/core";
import type { SeriesValue } from "./series";

export type IndicatorName =
	| "rsi"
	| "macd"
	| "macdSignal"
	| "macdHistogram"
	| "smaShort"
	| "smaLong"
	| "volatility";

export type IndicatorParameters = IndicatorConfig;
export type TrendThresholds = ThresholdConfig;

export interface IndicatorSeries {
	/** Aligned with the price bars; `null` inside the warm-up prefix. */
	values: readonly SeriesValue[];
	latest: number | null;
	/** First index that may hold a value. */
	warmup: number;
}

export type IndicatorSet = Readonly<Record<IndicatorName, IndicatorSeries>> & {
	readonly length: number;
	readonly parameters: Readonly<IndicatorParameters>;
	/** Latest per-bar volatility scaled by sqrt(252). */
	readonly annualizedVolatility: number | null;
};

export type Trend = "Bullish" | "Bearish" | "Neutral";
export type TradeSignal = "BUY" | "SELL" | "HOLD";
export type VolatilityLevel = "low" | "moderate" | "high";
export type RsiZone = "oversold" | "neutral" | "overbought";
export type PricePosition = "above_both" | "between" | "below_both";

export interface TrendClassification {
	trend: Trend;
	signal: TradeSignal;
	volatilityLevel: VolatilityLevel | null;
	rsiZone: RsiZone | null;
	pricePosition: PricePosition | null;
	summary: string;
}

export interface IndicatorSnapshot {
	close: number | null;
	rsi: number | null;
	macd: number | null;
	macdSignal: number | null;
	smaShort: number | null;
	smaLong: number | null;
	annualizedVolatility: number | null;
}

export interface PriceStatistics {
	currentPrice: number;
	priceChangePct: number;
	averageVolume: number;
	maxPrice: number;
	minPrice: number;
	latestVolume: number;
	firstTimestamp: number;
	lastTimestamp: number;
}

export interface IndicatorAnalysis {
	symbol: string;
	period: PricePeriod;
	indicators: IndicatorSet;
	trend: TrendClassification;
	statistics: PriceStatistics;
}

export interface IndicatorOptions extends Partial<IndicatorParameters> {
	/** Per-indicator warm-up overrides; defaults follow each window. */
	warmup?: Partial<Record<IndicatorName, number>>;
	thresholds?: Partial<TrendThresholds>;
}
