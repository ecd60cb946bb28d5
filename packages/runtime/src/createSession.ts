import type { InsightxConfig } from "@insightx/core";
import {
	CcxtMarketDataClient,
	PriceSeriesProvider,
	YahooChartClient,
	type MarketDataClient,
} from "@insightx/data";
import { createCompletionClient, type TextCompletionClient } from "@insightx/insights";
import { AnalysisSession, type SessionPreferences } from "./session";
import type { RuntimeDeps } from "./types";

export interface CreateSessionOptions {
	config: InsightxConfig;
	/** Overrides for the collaborators built from config. */
	equities?: MarketDataClient;
	crypto?: MarketDataClient;
	completion?: TextCompletionClient | null;
	preferences?: Partial<SessionPreferences>;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
}

export const createRuntimeDeps = (options: CreateSessionOptions): RuntimeDeps => {
	const { env, analysis } = options.config;
	const source = new PriceSeriesProvider({
		equities: options.equities ?? new YahooChartClient({ timeoutMs: env.marketDataTimeoutMs }),
		crypto: options.crypto ?? new CcxtMarketDataClient(),
	});
	return {
		source,
		analysis,
		defaultPeriod: env.defaultPeriod,
		insights: {
			client: options.completion === undefined ? createCompletionClient(env) : options.completion,
			retryBackoffMs: analysis.insights.retryBackoffMs,
			sleep: options.sleep,
		},
	};
};

export const createAnalysisSession = (options: CreateSessionOptions): AnalysisSession => {
	const { env, analysis } = options.config;
	const preferences: SessionPreferences = {
		language: env.defaultLanguage,
		expertise: analysis.insights.expertise,
		style: analysis.insights.responseStyle,
		historyTurns: analysis.insights.historyTurns,
		maxTokens: env.insightMaxTokens,
		...options.preferences,
	};
	return new AnalysisSession(createRuntimeDeps(options), preferences, options.now);
};
