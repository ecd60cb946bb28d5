import { AnalysisError } from "@insightx/core";

export type SeriesValue = number | null;

export const average = (nums: readonly number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};

/**
 * Null out every index below `warmup`; values at or after it are kept as-is.
 */
export const maskWarmup = (
	values: readonly SeriesValue[],
	warmup: number
): SeriesValue[] => values.map((value, index) => (index < warmup ? null : value));

export const assertPositiveLength = (length: number, label: string): void => {
	if (!Number.isInteger(length) || length <= 0) {
		throw new AnalysisError("ConfigError", `${label} must be a positive integer, got ${length}`, {
			details: { parameter: label, value: length },
		});
	}
};
