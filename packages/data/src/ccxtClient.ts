import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import {
	DAY_MS,
	createLogger,
	periodStartTimestamp,
	type PriceBar,
	type PricePeriod,
} from "@insightx/core";
import type { MarketDataClient } from "./types";
import { mapCcxtCandleToBar } from "./utils/ccxtMapper";

const logger = createLogger("data:ccxt");

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 20;

/** The slice of a ccxt exchange this client calls. */
export interface OhlcvExchange {
	readonly id: string;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface CcxtMarketDataClientOptions {
	exchange?: OhlcvExchange;
	exchangeId?: "binance" | "kraken" | "coinbase";
	batchSize?: number;
	maxIterations?: number;
	now?: () => number;
}

const createExchange = (id: CcxtMarketDataClientOptions["exchangeId"]): OhlcvExchange => {
	const options = { enableRateLimit: true, timeout: 30_000 };
	switch (id) {
		case "kraken":
			return new ccxt.kraken(options);
		case "coinbase":
			return new ccxt.coinbase(options);
		default:
			return new ccxt.binance({ ...options, options: { defaultType: "spot" } });
	}
};

/**
 * Daily candles for `BASE/QUOTE` crypto pairs through a public ccxt
 * endpoint. Pages forward from the period start until a short batch or
 * the present.
 */
export class CcxtMarketDataClient implements MarketDataClient {
	readonly name: string;
	private readonly exchange: OhlcvExchange;
	private readonly batchSize: number;
	private readonly maxIterations: number;
	private readonly now: () => number;

	constructor(options: CcxtMarketDataClientOptions = {}) {
		this.exchange = options.exchange ?? createExchange(options.exchangeId);
		this.name = `ccxt:${this.exchange.id}`;
		this.batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
		this.maxIterations = Math.max(options.maxIterations ?? DEFAULT_MAX_ITERATIONS, 1);
		this.now = options.now ?? Date.now;
	}

	async fetchDailyBars(symbol: string, period: PricePeriod): Promise<PriceBar[]> {
		const end = this.now();
		let since = periodStartTimestamp(period, end);
		const bars: PriceBar[] = [];

		for (let iteration = 0; iteration < this.maxIterations && since <= end; iteration += 1) {
			const batch = await this.exchange.fetchOHLCV(symbol, "1d", since, this.batchSize);
			logger.debug("ohlcv_batch", { symbol, since, received: batch.length });
			let lastTimestamp = since - DAY_MS;
			for (const row of batch) {
				const bar = mapCcxtCandleToBar(row);
				if (bar) {
					bars.push(bar);
					lastTimestamp = Math.max(lastTimestamp, bar.timestamp);
				}
			}
			if (batch.length < this.batchSize) {
				break;
			}
			since = lastTimestamp + DAY_MS;
		}

		return bars;
	}
}
