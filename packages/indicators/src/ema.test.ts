import { describe, expect, it } from "vitest";
import { ema, emaSeries } from "./ema";

describe("emaSeries", () => {
	it("seeds with the first value and applies alpha = 2 / (length + 1)", () => {
		// length 3 -> alpha 0.5
		expect(emaSeries([10, 20, 30], 3)).toEqual([10, 15, 22.5]);
	});

	it("is flat on a constant input", () => {
		expect(emaSeries([5, 5, 5, 5], 9)).toEqual([5, 5, 5, 5]);
	});

	it("returns an empty series for empty input", () => {
		expect(emaSeries([], 12)).toEqual([]);
		expect(ema([], 12)).toBeNull();
	});

	it("exposes the latest value", () => {
		expect(ema([10, 20, 30], 3)).toBe(22.5);
	});
});
