import type { MarketKind } from "./types";

const TICKER_ALIASES: Readonly<Record<string, string>> = {
	GOOGLE: "GOOGL",
	GOOG: "GOOGL",
	FACEBOOK: "META",
	FB: "META",
	AMAZON: "AMZN",
	MICROSOFT: "MSFT",
	APPLE: "AAPL",
	TESLA: "TSLA",
	NETFLIX: "NFLX",
	BITCOIN: "BTC-USD",
	BTC: "BTC-USD",
	ETHEREUM: "ETH-USD",
	ETH: "ETH-USD",
};

/**
 * Upper-case and trim a user-entered symbol, then apply the common-name
 * aliases (GOOGLE -> GOOGL, BITCOIN -> BTC-USD, ...).
 */
export const normalizeTicker = (raw: string): string => {
	const cleaned = raw.trim().toUpperCase();
	return TICKER_ALIASES[cleaned] ?? cleaned;
};

/** `BASE/QUOTE` pairs go to the crypto exchange; everything else is an equity. */
export const marketKindOf = (symbol: string): MarketKind =>
	/^[A-Z0-9]+\/[A-Z0-9]+$/.test(symbol) ? "crypto" : "equity";
