/**
 * Time constants for consistent time calculations across the codebase.
 * All values are in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Sessions per year used to annualise daily volatility.
 */
export const TRADING_DAYS_PER_YEAR = 252;
