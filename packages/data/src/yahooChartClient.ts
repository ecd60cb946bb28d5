import { AnalysisError, createLogger, type PriceBar, type PricePeriod } from "@insightx/core";
import type { FetchLike, MarketDataClient } from "./types";

const logger = createLogger("data:yahoo");

const DEFAULT_BASE_URL = "https://query2.finance.yahoo.com";
const DEFAULT_TIMEOUT_MS = 30_000;

export interface YahooChartClientOptions {
	baseUrl?: string;
	timeoutMs?: number;
	fetch?: FetchLike;
}

type Cell = number | null;

interface ChartQuote {
	open: Cell[];
	high: Cell[];
	low: Cell[];
	close: Cell[];
	volume: Cell[];
}

export interface ChartResult {
	timestamp: number[];
	quote: ChartQuote;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const toCells = (value: unknown): Cell[] =>
	Array.isArray(value)
		? value.map((cell) => (typeof cell === "number" && Number.isFinite(cell) ? cell : null))
		: [];

const malformed = (symbol: string, reason: string): AnalysisError =>
	new AnalysisError("NoDataFound", `Malformed chart response for ${symbol}: ${reason}`, {
		details: { symbol, reason },
	});

/**
 * Pull the first chart result out of a v8 chart payload. Returns null when
 * the payload carries no result (unknown symbol).
 */
export const parseChartPayload = (symbol: string, payload: unknown): ChartResult | null => {
	if (!isRecord(payload) || !isRecord(payload.chart)) {
		throw malformed(symbol, "missing chart object");
	}
	const { chart } = payload;
	if (isRecord(chart.error)) {
		const description =
			typeof chart.error.description === "string" ? chart.error.description : "unknown error";
		throw new AnalysisError("NoDataFound", `No data found for ${symbol}: ${description}`, {
			details: { symbol, code: chart.error.code },
		});
	}
	const first: unknown = Array.isArray(chart.result) ? chart.result[0] : undefined;
	if (!isRecord(first)) {
		return null;
	}
	const indicators = first.indicators;
	const quotes = isRecord(indicators) ? indicators.quote : undefined;
	const quote: unknown = Array.isArray(quotes) ? quotes[0] : undefined;
	if (!Array.isArray(first.timestamp) || !isRecord(quote)) {
		return null;
	}
	return {
		timestamp: first.timestamp.filter((value): value is number => typeof value === "number"),
		quote: {
			open: toCells(quote.open),
			high: toCells(quote.high),
			low: toCells(quote.low),
			close: toCells(quote.close),
			volume: toCells(quote.volume),
		},
	};
};

/**
 * Convert a parsed chart result to bars. Bars without a close are skipped;
 * a missing open falls back to the close and high/low are widened to cover
 * open and close. A missing volume reads 0.
 */
export const chartResultToBars = (result: ChartResult): PriceBar[] => {
	const { timestamp, quote } = result;
	const bars: PriceBar[] = [];
	for (let i = 0; i < timestamp.length; i += 1) {
		const close = quote.close[i] ?? null;
		if (close === null) {
			continue;
		}
		const open = quote.open[i] ?? close;
		bars.push({
			timestamp: timestamp[i] * 1000,
			open,
			high: Math.max(quote.high[i] ?? close, open, close),
			low: Math.min(quote.low[i] ?? close, open, close),
			close,
			volume: quote.volume[i] ?? 0,
		});
	}
	return bars;
};

/**
 * Daily bars for equities and indices from the public v8 chart endpoint.
 */
export class YahooChartClient implements MarketDataClient {
	readonly name = "yahoo";
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;

	constructor(options: YahooChartClientOptions = {}) {
		this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
	}

	buildUrl(symbol: string, period: PricePeriod): string {
		const url = new URL(`/v8/finance/chart/${encodeURIComponent(symbol)}`, this.baseUrl);
		url.searchParams.set("range", period);
		url.searchParams.set("interval", "1d");
		url.searchParams.set("includePrePost", "false");
		return url.toString();
	}

	async fetchDailyBars(symbol: string, period: PricePeriod): Promise<PriceBar[]> {
		const url = this.buildUrl(symbol, period);
		logger.debug("chart_request", { symbol, period, url });
		const response = await this.fetchImpl(url, {
			signal: AbortSignal.timeout(this.timeoutMs),
			headers: { accept: "application/json" },
		});
		if (response.status === 404) {
			return [];
		}
		if (!response.ok) {
			throw new Error(`Chart request failed: ${response.status} ${response.statusText}`);
		}
		const payload: unknown = await response.json();
		const result = parseChartPayload(symbol, payload);
		return result ? chartResultToBars(result) : [];
	}
}
