import { AnalysisError, TRADING_DAYS_PER_YEAR } from "@insightx/core";
import { average, type SeriesValue } from "./series";

/**
 * Close-to-close percentage returns; index 0 has no predecessor and is null.
 */
export function percentReturns(closes: readonly number[]): SeriesValue[] {
	return closes.map((close, index) =>
		index === 0 ? null : close / closes[index - 1] - 1
	);
}

export function sampleStdDev(values: readonly number[]): number | null {
	if (values.length < 2) {
		return null;
	}
	const mean = average(values);
	const squared = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
	return Math.sqrt(squared / (values.length - 1));
}

/**
 * Rolling sample standard deviation of percentage returns over `window`
 * returns. Index `i` is defined for `i >= window`. Values are per bar, not
 * annualised.
 */
export function volatilitySeries(
	closes: readonly number[],
	window = 20
): SeriesValue[] {
	if (!Number.isInteger(window) || window < 2) {
		throw new AnalysisError(
			"ConfigError",
			`Volatility window must be an integer >= 2, got ${window}`,
			{ details: { parameter: "volatilityWindow", value: window } }
		);
	}
	const returns = percentReturns(closes);
	return closes.map((_, index) => {
		if (index < window) {
			return null;
		}
		const slice: number[] = [];
		for (let j = index - window + 1; j <= index; j += 1) {
			const value = returns[j];
			if (value !== null) {
				slice.push(value);
			}
		}
		return sampleStdDev(slice);
	});
}

export const annualizeVolatility = (
	perBar: number,
	periodsPerYear = TRADING_DAYS_PER_YEAR
): number => perBar * Math.sqrt(periodsPerYear);
