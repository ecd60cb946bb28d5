import type { Intent } from "./types";

const TRADING_KEYWORDS = [
	"trading",
	"trade",
	"stock",
	"stocks",
	"share",
	"shares",
	"ticker",
	"price",
	"market",
	"rsi",
	"macd",
	"sma",
	"ema",
	"moving average",
	"volatility",
	"trend",
	"bullish",
	"bearish",
	"candlestick",
	"portfolio",
	"crypto",
	"bitcoin",
	"finance",
	"investing",
	"تداول",
	"سهم",
	"أسهم",
	"سوق",
] as const;

const MARKETING_KEYWORDS = [
	"marketing",
	"campaign",
	"campaigns",
	"ads",
	"advertising",
	"ctr",
	"click",
	"clicks",
	"conversion",
	"conversions",
	"conversion rate",
	"roi",
	"budget",
	"revenue",
	"cpc",
	"cpa",
	"funnel",
	"audience",
	"seo",
	"email",
	"kpi",
	"kpis",
	"analysis",
	"تسويق",
	"حملة",
	"إعلان",
] as const;

const tokenize = (text: string): string[] => text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

const ARABIC_LETTER = /^\p{Script=Arabic}/u;

/**
 * Arabic attaches the article and some conjunctions to the word: "السوق",
 * "والتسويق", "بالسوق". Each token also yields its stem without them.
 */
const arabicForms = (token: string): string[] => {
	if (!ARABIC_LETTER.test(token)) {
		return [token];
	}
	const forms = [token];
	let stem = token;
	if ((stem.startsWith("و") || stem.startsWith("ب")) && stem.length > 3) {
		stem = stem.slice(1);
		forms.push(stem);
	}
	if (stem.startsWith("ال") && stem.length > 3) {
		forms.push(stem.slice(2));
	}
	return forms;
};

const matchKeywords = (tokens: readonly string[], keywords: readonly string[]): string[] => {
	const tokenSet = new Set(tokens.flatMap(arabicForms));
	const joined = ` ${tokens.join(" ")} `;
	return keywords.filter((keyword) =>
		keyword.includes(" ") ? joined.includes(` ${keyword} `) : tokenSet.has(keyword)
	);
};

/**
 * Keyword classifier: the table with more hits wins. Ties, including a
 * question that matches nothing, are `general`.
 */
export function classifyIntent(text: string): Intent {
	const tokens = tokenize(text);
	const trading = matchKeywords(tokens, TRADING_KEYWORDS);
	const marketing = matchKeywords(tokens, MARKETING_KEYWORDS);
	if (trading.length > marketing.length) {
		return { kind: "trading", matched: trading };
	}
	if (marketing.length > trading.length) {
		return { kind: "marketing", matched: marketing };
	}
	return { kind: "general", matched: [...trading, ...marketing] };
}

/** A question is in scope when it matches at least one keyword. */
export const isInScope = (intent: Intent): boolean => intent.matched.length > 0;
