import {
	AnalysisError,
	createLogger,
	describeError,
	isAnalysisError,
	type PriceBar,
	type PricePeriod,
	type PriceSeries,
} from "@insightx/core";
import { marketKindOf, normalizeTicker } from "./tickers";
import type { MarketDataClient, PriceSeriesProviderConfig } from "./types";

const logger = createLogger("data");

/** Ascending by timestamp; the first bar seen for a timestamp wins. */
export const orderBars = (bars: readonly PriceBar[]): PriceBar[] => {
	const seen = new Set<number>();
	const unique: PriceBar[] = [];
	for (const bar of bars) {
		if (!seen.has(bar.timestamp)) {
			seen.add(bar.timestamp);
			unique.push(bar);
		}
	}
	return unique.sort((a, b) => a.timestamp - b.timestamp);
};

export class PriceSeriesProvider {
	constructor(private readonly config: PriceSeriesProviderConfig) {}

	clientFor(symbol: string): MarketDataClient {
		if (marketKindOf(symbol) === "crypto") {
			if (!this.config.crypto) {
				throw new AnalysisError(
					"ConfigError",
					`No crypto market-data client is configured for ${symbol}`,
					{ details: { symbol } }
				);
			}
			return this.config.crypto;
		}
		return this.config.equities;
	}

	/**
	 * Fetch daily bars for a ticker over a lookback period. Throws
	 * `NoDataFound` when the source has nothing for the symbol or the
	 * request fails.
	 */
	async fetchSeries(ticker: string, period: PricePeriod): Promise<PriceSeries> {
		const symbol = normalizeTicker(ticker);
		if (!symbol) {
			throw new AnalysisError("NoDataFound", "Ticker symbol is empty", {
				details: { ticker },
			});
		}
		const client = this.clientFor(symbol);
		const startedAt = Date.now();

		let raw: PriceBar[];
		try {
			raw = await client.fetchDailyBars(symbol, period);
		} catch (error) {
			logger.warn("series_fetch_failed", {
				symbol,
				period,
				source: client.name,
				error,
			});
			if (isAnalysisError(error)) {
				throw error;
			}
			throw new AnalysisError(
				"NoDataFound",
				`Could not fetch price data for ${symbol}: ${describeError(error)}`,
				{ details: { symbol, period, source: client.name }, cause: error }
			);
		}

		const bars = orderBars(raw);
		if (!bars.length) {
			throw new AnalysisError(
				"NoDataFound",
				`No data found for ticker ${symbol}. Check the symbol and try again.`,
				{ details: { symbol, period, source: client.name } }
			);
		}

		logger.info("series_fetched", {
			symbol,
			period,
			source: client.name,
			bars: bars.length,
			durationMs: Date.now() - startedAt,
		});

		return Object.freeze({
			symbol,
			period,
			bars: Object.freeze(bars.map((bar) => Object.freeze({ ...bar }))),
		});
	}
}
