import { assertPositiveLength } from "./series";

/**
 * Exponential moving average seeded with the first value:
 * `EMA[0] = x[0]`, `EMA[t] = a * x[t] + (1 - a) * EMA[t - 1]` with
 * `a = 2 / (length + 1)`. Every index is defined.
 */
export function emaSeries(values: readonly number[], length: number): number[] {
	assertPositiveLength(length, "EMA length");
	if (values.length === 0) {
		return [];
	}

	const multiplier = 2 / (length + 1);
	const series: number[] = new Array<number>(values.length);
	let emaValue = values[0];
	series[0] = emaValue;

	for (let i = 1; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

export function ema(values: readonly number[], length: number): number | null {
	if (length <= 0 || values.length === 0) {
		return null;
	}
	const series = emaSeries(values, length);
	return series[series.length - 1];
}
