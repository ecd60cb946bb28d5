import { describe, expect, it } from "vitest";
import {
	annualizeVolatility,
	percentReturns,
	sampleStdDev,
	volatilitySeries,
} from "./volatility";

describe("percentReturns", () => {
	it("aligns returns with the later close", () => {
		const returns = percentReturns([100, 110, 99]);
		expect(returns[0]).toBeNull();
		expect(returns[1]).toBeCloseTo(0.1, 12);
		expect(returns[2]).toBeCloseTo(-0.1, 12);
	});
});

describe("sampleStdDev", () => {
	it("uses the n - 1 denominator", () => {
		expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.138089935, 8);
		expect(sampleStdDev([1])).toBeNull();
	});
});

describe("volatilitySeries", () => {
	it("computes the rolling deviation of returns", () => {
		// returns: +10%, -10%, +10%
		const series = volatilitySeries([100, 110, 99, 108.9], 2);
		expect(series[0]).toBeNull();
		expect(series[1]).toBeNull();
		expect(series[2]).toBeCloseTo(Math.SQRT2 / 10, 10);
		expect(series[3]).toBeCloseTo(Math.SQRT2 / 10, 10);
	});

	it("is zero for a constant price", () => {
		const series = volatilitySeries([10, 10, 10, 10], 3);
		expect(series).toEqual([null, null, null, 0]);
	});

	it("rejects a window below two returns", () => {
		expect(() => volatilitySeries([1, 2, 3], 1)).toThrowError(
			expect.objectContaining({
				code: "ConfigError",
				message: "Volatility window must be an integer >= 2, got 1",
				details: { parameter: "volatilityWindow", value: 1 },
			})
		);
	});
});

describe("annualizeVolatility", () => {
	it("scales by the square root of 252 trading days", () => {
		expect(annualizeVolatility(0.01)).toBeCloseTo(0.158745079, 8);
	});
});
