import type { PricePeriod } from "../types";
import { DAY_MS } from "./constants";

const PERIOD_DAYS: Record<PricePeriod, number> = {
	"1mo": 30,
	"3mo": 91,
	"6mo": 182,
	"1y": 365,
	"2y": 730,
	"5y": 1826,
};

/**
 * Calendar days covered by a lookback period.
 */
export const periodToDays = (period: PricePeriod): number => PERIOD_DAYS[period];

/**
 * Start of the lookback window ending at `now`, in UTC epoch milliseconds.
 */
export const periodStartTimestamp = (
	period: PricePeriod,
	now: number = Date.now()
): number => now - PERIOD_DAYS[period] * DAY_MS;
