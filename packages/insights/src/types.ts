import type { ExpertiseLevel, Language, ResponseStyle } from "@insightx/core";

export type IntentKind = "trading" | "marketing" | "general";

export interface Intent {
	kind: IntentKind;
	/** Keywords that decided the classification, in table order. */
	matched: string[];
}

export type FactValue = number | string | null;

export interface FactLine {
	label: string;
	value: FactValue;
	unit?: "currency" | "percent" | "ratio";
}

export interface TradingFacts {
	kind: "trading";
	symbol: string;
	period: string;
	lines: readonly FactLine[];
}

export interface MarketingFacts {
	kind: "marketing";
	campaignCount: number;
	lines: readonly FactLine[];
	campaigns: readonly (readonly FactLine[])[];
}

export type FactBag = TradingFacts | MarketingFacts;

export interface CompletionMessage {
	role: "user" | "assistant";
	content: string;
}

export interface CompletionRequest {
	system: string;
	messages: CompletionMessage[];
	maxTokens: number;
	language: Language;
}

/** Narrow seam over the hosted model; resolves with text or rejects. */
export interface TextCompletionClient {
	readonly model: string;
	complete(request: CompletionRequest): Promise<string>;
}

export type UnavailableReason =
	| "timeout"
	| "rate_limited"
	| "malformed_response"
	| "not_configured"
	| "api_error";

export type InsightResult =
	| {
			status: "ok";
			text: string;
			intent: IntentKind;
			language: Language;
			attempts: number;
	  }
	| {
			status: "unavailable";
			reason: UnavailableReason;
			message: string;
			attempts: number;
	  };

export interface InsightOptions {
	expertise?: ExpertiseLevel;
	language?: Language;
	style?: ResponseStyle;
	maxTokens?: number;
}

export interface InsightDeps {
	/** `null` when no API key is configured. */
	client: TextCompletionClient | null;
	retryBackoffMs?: number;
	sleep?: (ms: number) => Promise<void>;
}

export interface InsightRequest extends InsightOptions {
	facts: FactBag;
	/** Optional user question to answer against the facts. */
	question?: string;
}
