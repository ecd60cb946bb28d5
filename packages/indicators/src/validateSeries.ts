import { AnalysisError, type PriceBar, type PriceSeries } from "@insightx/core";

const isPositiveFinite = (value: number): boolean =>
	Number.isFinite(value) && value > 0;

const describeBar = (bar: PriceBar): Record<string, number> => ({
	timestamp: bar.timestamp,
	open: bar.open,
	high: bar.high,
	low: bar.low,
	close: bar.close,
	volume: bar.volume,
});

const invalid = (index: number, bar: PriceBar, reason: string): AnalysisError =>
	new AnalysisError("InvalidSeries", `Bar ${index} is invalid: ${reason}`, {
		details: { index, reason, bar: describeBar(bar) },
	});

/**
 * Check ordering and OHLC consistency of every bar. Throws on the first
 * violation; the error details carry the bar index.
 */
export function validatePriceSeries(series: PriceSeries): void {
	const { bars } = series;
	for (let index = 0; index < bars.length; index += 1) {
		const bar = bars[index];
		if (!Number.isFinite(bar.timestamp)) {
			throw invalid(index, bar, "timestamp is not a finite number");
		}
		if (index > 0 && bar.timestamp <= bars[index - 1].timestamp) {
			throw invalid(index, bar, "timestamps must be strictly increasing");
		}
		if (![bar.open, bar.high, bar.low, bar.close].every(isPositiveFinite)) {
			throw invalid(index, bar, "open/high/low/close must be positive");
		}
		if (!Number.isFinite(bar.volume) || bar.volume < 0) {
			throw invalid(index, bar, "volume must be non-negative");
		}
		if (bar.high < bar.low) {
			throw invalid(index, bar, "high is below low");
		}
		if (bar.high < Math.max(bar.open, bar.close)) {
			throw invalid(index, bar, "high is below open or close");
		}
		if (bar.low > Math.min(bar.open, bar.close)) {
			throw invalid(index, bar, "low is above open or close");
		}
	}
}
