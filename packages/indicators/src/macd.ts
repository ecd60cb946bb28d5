import { AnalysisError } from "@insightx/core";
import { emaSeries } from "./ema";

export interface MacdResult {
	macd: number | null;
	signal: number | null;
	histogram: number | null;
}

export interface MacdSeries {
	macd: number[];
	signal: number[];
	histogram: number[];
}

/**
 * Raw MACD recurrence over the full input. No warm-up masking happens here;
 * the indicator engine applies it.
 */
export function macdSeries(
	closes: readonly number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdSeries {
	if (fast >= slow) {
		throw new AnalysisError(
			"ConfigError",
			`MACD fast length (${fast}) must be below slow length (${slow})`,
			{ details: { fast, slow } }
		);
	}
	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);
	const macdLine = fastSeries.map((fastValue, index) => fastValue - slowSeries[index]);
	const signalLine = emaSeries(macdLine, signalLength);
	const histogram = macdLine.map((value, index) => value - signalLine[index]);

	return { macd: macdLine, signal: signalLine, histogram };
}

export function macd(
	closes: readonly number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdResult {
	if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
		return { macd: null, signal: null, histogram: null };
	}

	const series = macdSeries(closes, fast, slow, signalLength);
	const last = closes.length - 1;
	return {
		macd: series.macd[last],
		signal: series.signal[last],
		histogram: series.histogram[last],
	};
}
