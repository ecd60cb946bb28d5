import type { PriceBar, PricePeriod } from "@insightx/core";
import { AnalysisError } from "@insightx/core";
import { describe, expect, it, vi } from "vitest";
import { PriceSeriesProvider, orderBars } from "./provider";
import type { MarketDataClient } from "./types";

const bar = (timestamp: number, close = 100): PriceBar => ({
	timestamp,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: 1_000,
});

class StaticClient implements MarketDataClient {
	readonly requests: Array<{ symbol: string; period: PricePeriod }> = [];

	constructor(
		readonly name: string,
		private readonly bars: PriceBar[]
	) {}

	async fetchDailyBars(symbol: string, period: PricePeriod): Promise<PriceBar[]> {
		this.requests.push({ symbol, period });
		return this.bars;
	}
}

const captureRejection = async (promise: Promise<unknown>): Promise<AnalysisError> => {
	try {
		await promise;
	} catch (error) {
		if (error instanceof AnalysisError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected an AnalysisError");
};

describe("orderBars", () => {
	it("sorts ascending and drops duplicate timestamps", () => {
		const ordered = orderBars([bar(3, 3), bar(1, 1), bar(3, 30), bar(2, 2)]);
		expect(ordered.map((b) => [b.timestamp, b.close])).toEqual([
			[1, 1],
			[2, 2],
			[3, 3],
		]);
	});
});

describe("PriceSeriesProvider", () => {
	it("normalises the ticker and returns a frozen ordered series", async () => {
		const equities = new StaticClient("equities", [bar(2), bar(1)]);
		const provider = new PriceSeriesProvider({ equities });

		const series = await provider.fetchSeries(" google ", "6mo");

		expect(equities.requests).toEqual([{ symbol: "GOOGL", period: "6mo" }]);
		expect(series.symbol).toBe("GOOGL");
		expect(series.period).toBe("6mo");
		expect(series.bars.map((b) => b.timestamp)).toEqual([1, 2]);
		expect(Object.isFrozen(series.bars)).toBe(true);
	});

	it("routes pairs to the crypto client", async () => {
		const equities = new StaticClient("equities", []);
		const crypto = new StaticClient("crypto", [bar(1)]);
		const provider = new PriceSeriesProvider({ equities, crypto });

		await provider.fetchSeries("btc/usdt", "1mo");

		expect(crypto.requests).toEqual([{ symbol: "BTC/USDT", period: "1mo" }]);
		expect(equities.requests).toEqual([]);
	});

	it("fails with ConfigError for a pair when no crypto client is set", async () => {
		const provider = new PriceSeriesProvider({
			equities: new StaticClient("equities", [bar(1)]),
		});
		const error = await captureRejection(provider.fetchSeries("ETH/BTC", "1mo"));
		expect(error.code).toBe("ConfigError");
	});

	it("turns an empty result into NoDataFound", async () => {
		const provider = new PriceSeriesProvider({
			equities: new StaticClient("equities", []),
		});
		const error = await captureRejection(provider.fetchSeries("ZZZZ", "1y"));
		expect(error.code).toBe("NoDataFound");
		expect(error.message).toBe(
			"No data found for ticker ZZZZ. Check the symbol and try again."
		);
	});

	it("wraps transport failures as NoDataFound with the cause", async () => {
		const cause = new Error("socket hang up");
		const equities: MarketDataClient = {
			name: "flaky",
			fetchDailyBars: vi.fn(async () => {
				throw cause;
			}),
		};
		const provider = new PriceSeriesProvider({ equities });

		const error = await captureRejection(provider.fetchSeries("AAPL", "1y"));

		expect(error.code).toBe("NoDataFound");
		expect(error.message).toBe("Could not fetch price data for AAPL: socket hang up");
		expect(error.cause).toBe(cause);
		expect(error.details).toEqual({ symbol: "AAPL", period: "1y", source: "flaky" });
	});

	it("rejects an empty ticker", async () => {
		const provider = new PriceSeriesProvider({
			equities: new StaticClient("equities", [bar(1)]),
		});
		const error = await captureRejection(provider.fetchSeries("   ", "1y"));
		expect(error.code).toBe("NoDataFound");
	});
});
