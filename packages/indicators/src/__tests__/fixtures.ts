import type { PriceBar, PriceSeries } from "@insightx/core";

const DAY = 86_400_000;
const START = Date.UTC(2024, 0, 2);

/**
 * Well-formed daily bars for the given closes: open is the previous close,
 * high/low sit one unit outside the body.
 */
export const barsFromCloses = (closes: readonly number[]): PriceBar[] =>
	closes.map((close, index) => {
		const open = index === 0 ? close : closes[index - 1];
		return {
			timestamp: START + index * DAY,
			open,
			high: Math.max(open, close) + 1,
			low: Math.min(open, close) - 1,
			close,
			volume: 1_000 + index * 10,
		};
	});

export const seriesFromCloses = (
	closes: readonly number[],
	symbol = "TEST"
): PriceSeries => ({
	symbol,
	period: "6mo",
	bars: barsFromCloses(closes),
});

export const wavyCloses = (length: number): number[] =>
	Array.from(
		{ length },
		(_, i) => 100 + 10 * Math.sin(i / 5) + i * 0.5 + ((i * 13) % 7) * 0.3
	);
