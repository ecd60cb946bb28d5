export * from "./time";

export interface PriceBar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export const PRICE_PERIODS = ["1mo", "3mo", "6mo", "1y", "2y", "5y"] as const;

export type PricePeriod = (typeof PRICE_PERIODS)[number];

export const isPricePeriod = (value: unknown): value is PricePeriod =>
	typeof value === "string" &&
	(PRICE_PERIODS as readonly string[]).includes(value);

export interface PriceSeries {
	symbol: string;
	period: PricePeriod;
	bars: readonly PriceBar[];
}

export type Language = "en" | "ar";

export const isLanguage = (value: unknown): value is Language =>
	value === "en" || value === "ar";

export type ExpertiseLevel = "beginner" | "intermediate" | "expert";

export const isExpertiseLevel = (value: unknown): value is ExpertiseLevel =>
	value === "beginner" || value === "intermediate" || value === "expert";

export type ResponseStyle = "concise" | "detailed";

export const isResponseStyle = (value: unknown): value is ResponseStyle =>
	value === "concise" || value === "detailed";
