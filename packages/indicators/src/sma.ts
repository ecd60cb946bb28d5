import { assertPositiveLength, average, type SeriesValue } from "./series";

/**
 * Simple rolling mean. Index `i` is defined once `period` values exist
 * (`i >= period - 1`); the output has the same length as the input.
 */
export function smaSeries(values: readonly number[], period: number): SeriesValue[] {
	assertPositiveLength(period, "SMA period");
	return values.map((_, index) =>
		index >= period - 1 ? average(values.slice(index - period + 1, index + 1)) : null
	);
}

export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}
	return average(values.slice(values.length - period));
}
