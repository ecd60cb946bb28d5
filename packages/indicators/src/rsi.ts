import { assertPositiveLength, type SeriesValue } from "./series";

/**
 * Relative Strength Index using simple means of gains and losses over the
 * last `period` close-to-close changes. Index `i` is defined for
 * `i >= period`. A window with no losses reads 100.
 */
export function rsiSeries(values: readonly number[], period = 14): SeriesValue[] {
	assertPositiveLength(period, "RSI period");
	const series: SeriesValue[] = new Array<SeriesValue>(values.length).fill(null);

	for (let i = period; i < values.length; i += 1) {
		let gains = 0;
		let losses = 0;
		for (let j = i - period + 1; j <= i; j += 1) {
			const change = values[j] - values[j - 1];
			if (change > 0) {
				gains += change;
			} else {
				losses -= change;
			}
		}
		series[i] = toRsi(gains / period, losses / period);
	}

	return series;
}

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};
