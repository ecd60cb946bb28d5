export * from "./types";
export { marketKindOf, normalizeTicker } from "./tickers";
export {
	YahooChartClient,
	chartResultToBars,
	type ChartResult,
	parseChartPayload,
	type YahooChartClientOptions,
} from "./yahooChartClient";
export {
	CcxtMarketDataClient,
	type CcxtMarketDataClientOptions,
	type OhlcvExchange,
} from "./ccxtClient";
export { PriceSeriesProvider, orderBars } from "./provider";
export { mapCcxtCandleToBar } from "./utils/ccxtMapper";
