import Anthropic from "@anthropic-ai/sdk";
import { describe, expect, it, vi } from "vitest";
import { classifyCompletionError, unavailable } from "./completionClient";
import { buildMarketingFacts, buildTradingFacts } from "./facts";
import { generateInsight } from "./generateInsight";
import { SAFETY_PREAMBLE } from "./prompts";
import { ScriptedCompletionClient, risingStock, sampleCampaigns, timeoutError } from "./__tests__/fakes";

const noSleep = vi.fn(async (_ms: number) => {});

describe("generateInsight", () => {
	it("returns text for a trading fact bag", async () => {
		const client = new ScriptedCompletionClient("RSI is elevated. Educational only.");
		const stock = risingStock();

		const result = await generateInsight(
			{ facts: buildTradingFacts(stock), expertise: "beginner", language: "en" },
			{ client, sleep: noSleep }
		);

		expect(result).toEqual({
			status: "ok",
			text: "RSI is elevated. Educational only.",
			intent: "trading",
			language: "en",
			attempts: 1,
		});
		const [request] = client.requests;
		expect(request.system.startsWith(SAFETY_PREAMBLE)).toBe(true);
		expect(request.system).toContain("Respond in English.");
		expect(request.messages).toHaveLength(1);
		expect(request.messages[0].content).toContain("Ticker: AAPL (period 6mo)");
		expect(request.messages[0].content).toContain("- Trend: Bullish");
		expect(request.maxTokens).toBe(1024);
	});

	it("retries a timeout once and reports it unavailable, leaving the analysis intact", async () => {
		const client = new ScriptedCompletionClient(timeoutError(), timeoutError());
		const sleep = vi.fn(async (_ms: number) => {});
		const stock = risingStock();
		const before = stock.indicators.rsi.latest;

		const result = await generateInsight(
			{ facts: buildTradingFacts(stock) },
			{ client, sleep, retryBackoffMs: 1000 }
		);

		expect(result).toEqual({
			status: "unavailable",
			reason: "timeout",
			message: "The insight service timed out.",
			attempts: 2,
		});
		expect(sleep).toHaveBeenCalledTimes(1);
		expect(sleep).toHaveBeenCalledWith(1000);
		expect(client.requests).toHaveLength(2);
		expect(stock.indicators.rsi.latest).toBe(before);
		expect(stock.trend.trend).toBe("Bullish");
	});

	it("succeeds on the retry after a rate limit", async () => {
		const client = new ScriptedCompletionClient(
			unavailable("rate_limited", "slow down"),
			"Second time lucky."
		);
		const result = await generateInsight(
			{ facts: buildMarketingFacts(sampleCampaigns()), language: "ar" },
			{ client, sleep: noSleep }
		);
		expect(result).toEqual({
			status: "ok",
			text: "Second time lucky.",
			intent: "marketing",
			language: "ar",
			attempts: 2,
		});
		expect(client.requests[1].system).toContain("Respond in Modern Standard Arabic.");
	});

	it("does not retry a malformed response", async () => {
		const client = new ScriptedCompletionClient(unavailable("malformed_response", "empty"));
		const result = await generateInsight(
			{ facts: buildMarketingFacts(sampleCampaigns()) },
			{ client, sleep: noSleep }
		);
		expect(result.status).toBe("unavailable");
		expect(result.attempts).toBe(1);
		expect(client.requests).toHaveLength(1);
	});

	it("reports not_configured without a client", async () => {
		const result = await generateInsight(
			{ facts: buildMarketingFacts(sampleCampaigns()) },
			{ client: null }
		);
		expect(result).toEqual({
			status: "unavailable",
			reason: "not_configured",
			message: "No insight service is configured (set ANTHROPIC_API_KEY).",
			attempts: 0,
		});
	});

	it("answers a question against the facts", async () => {
		const client = new ScriptedCompletionClient("Search and Social tie on ROI.");
		await generateInsight(
			{ facts: buildMarketingFacts(sampleCampaigns()), question: "Which campaign is best?" },
			{ client }
		);
		expect(client.requests[0].messages[0].content).toContain("Question: Which campaign is best?");
		expect(client.requests[0].messages[0].content).toContain("- Overall ROI: 150.00%");
	});
});

describe("classifyCompletionError", () => {
	it("maps SDK and runtime errors to reasons", () => {
		expect(classifyCompletionError(new Anthropic.APIConnectionTimeoutError())).toBe("timeout");
		expect(
			classifyCompletionError(Anthropic.APIError.generate(429, undefined, "too many requests", undefined))
		).toBe("rate_limited");
		expect(
			classifyCompletionError(Anthropic.APIError.generate(401, undefined, "bad key", undefined))
		).toBe("not_configured");
		expect(
			classifyCompletionError(Anthropic.APIError.generate(500, undefined, "server error", undefined))
		).toBe("api_error");
		expect(classifyCompletionError(timeoutError())).toBe("timeout");
		expect(classifyCompletionError(new SyntaxError("Unexpected token"))).toBe("malformed_response");
		expect(classifyCompletionError("boom")).toBe("api_error");
	});
});
