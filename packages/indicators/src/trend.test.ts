import { describe, expect, it } from "vitest";
import {
	DEFAULT_THRESHOLDS,
	classifyDirection,
	classifyPricePosition,
	classifyRsi,
	classifyTrend,
	classifyVolatility,
} from "./trend";
import type { IndicatorSnapshot } from "./types";

const snapshot = (overrides: Partial<IndicatorSnapshot>): IndicatorSnapshot => ({
	close: 105,
	rsi: 55,
	macd: 1,
	macdSignal: 0.5,
	smaShort: 102,
	smaLong: 100,
	annualizedVolatility: 0.15,
	...overrides,
});

describe("classifyDirection", () => {
	it.each([
		[{ smaShort: 102, smaLong: 100, macd: 1, macdSignal: 0.5 }, "Bullish", "BUY"],
		[{ smaShort: 98, smaLong: 100, macd: -1, macdSignal: -0.5 }, "Bearish", "SELL"],
		[{ smaShort: 102, smaLong: 100, macd: -1, macdSignal: -0.5 }, "Neutral", "HOLD"],
		[{ smaShort: 98, smaLong: 100, macd: 1, macdSignal: 0.5 }, "Neutral", "HOLD"],
		[{ smaShort: 100, smaLong: 100, macd: 1, macdSignal: 0.5 }, "Neutral", "HOLD"],
		[{ smaShort: 102, smaLong: 100, macd: 1, macdSignal: 1 }, "Neutral", "HOLD"],
		[{ smaShort: null, smaLong: 100, macd: 1, macdSignal: 0.5 }, "Neutral", "HOLD"],
	])("maps %o to %s / %s", (overrides, trend, signal) => {
		expect(classifyDirection(snapshot(overrides))).toEqual({ trend, signal });
	});
});

describe("context labels", () => {
	it("buckets annualised volatility", () => {
		expect(classifyVolatility(0.35, DEFAULT_THRESHOLDS)).toBe("high");
		expect(classifyVolatility(0.3, DEFAULT_THRESHOLDS)).toBe("moderate");
		expect(classifyVolatility(0.2, DEFAULT_THRESHOLDS)).toBe("low");
		expect(classifyVolatility(null, DEFAULT_THRESHOLDS)).toBeNull();
	});

	it("marks RSI zones", () => {
		expect(classifyRsi(75, DEFAULT_THRESHOLDS)).toBe("overbought");
		expect(classifyRsi(25, DEFAULT_THRESHOLDS)).toBe("oversold");
		expect(classifyRsi(70, DEFAULT_THRESHOLDS)).toBe("neutral");
		expect(classifyRsi(null, DEFAULT_THRESHOLDS)).toBeNull();
	});

	it("places the close relative to both averages", () => {
		expect(classifyPricePosition(snapshot({ close: 110 }))).toBe("above_both");
		expect(classifyPricePosition(snapshot({ close: 101 }))).toBe("between");
		expect(classifyPricePosition(snapshot({ close: 90 }))).toBe("below_both");
		expect(classifyPricePosition(snapshot({ smaLong: null }))).toBeNull();
	});
});

describe("classifyTrend", () => {
	it("combines direction and context into a summary", () => {
		const result = classifyTrend(snapshot({ close: 110 }));
		expect(result).toEqual({
			trend: "Bullish",
			signal: "BUY",
			volatilityLevel: "low",
			rsiZone: "neutral",
			pricePosition: "above_both",
			summary:
				"Bullish: short moving average above long and MACD above signal; price above both moving averages; low volatility (15.0% annualised).",
		});
	});
});
