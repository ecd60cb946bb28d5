import type { OHLCV } from "ccxt";
import type { PriceBar } from "@insightx/core";

/**
 * Map a ccxt OHLCV row to a PriceBar. Rows with a missing price are dropped
 * (returns null) rather than zero-filled.
 */
export const mapCcxtCandleToBar = (row: OHLCV): PriceBar | null => {
	const [timestamp, open, high, low, close, volume] = row;
	if (
		timestamp == null ||
		open == null ||
		high == null ||
		low == null ||
		close == null
	) {
		return null;
	}
	return {
		timestamp: Number(timestamp),
		open: Number(open),
		high: Number(high),
		low: Number(low),
		close: Number(close),
		volume: Number(volume ?? 0),
	};
};
