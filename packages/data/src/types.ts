import type { PriceBar, PricePeriod } from "@insightx/core";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Source of daily OHLCV bars. Implementations return bars in any order and
 * may include duplicates; the provider sorts and de-duplicates.
 */
export interface MarketDataClient {
	readonly name: string;
	fetchDailyBars(symbol: string, period: PricePeriod): Promise<PriceBar[]>;
}

export type MarketKind = "equity" | "crypto";

export interface PriceSeriesProviderConfig {
	equities: MarketDataClient;
	crypto?: MarketDataClient;
}
