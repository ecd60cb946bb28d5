import { SECOND_MS, createLogger, describeError, type Language } from "@insightx/core";
import { RETRYABLE_REASONS, classifyCompletionError } from "./completionClient";
import { renderFacts } from "./facts";
import {
	MARKETING_INSIGHT_PROMPT,
	QUESTION_PROMPT,
	TRADING_INSIGHT_PROMPT,
	buildSystemPrompt,
	fillTemplate,
} from "./prompts";
import type {
	CompletionMessage,
	InsightDeps,
	InsightRequest,
	InsightResult,
	IntentKind,
	UnavailableReason,
} from "./types";

const logger = createLogger("insights");

export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_RETRY_BACKOFF_MS = SECOND_MS;
const MAX_ATTEMPTS = 2;

const UNAVAILABLE_MESSAGES: Record<UnavailableReason, string> = {
	timeout: "The insight service timed out.",
	rate_limited: "The insight service is rate limited.",
	malformed_response: "The insight service returned an unreadable response.",
	not_configured: "No insight service is configured (set ANTHROPIC_API_KEY).",
	api_error: "The insight service returned an error.",
};

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => {
		setTimeout(resolve, ms);
	});

export interface CompletionCall {
	system: string;
	messages: CompletionMessage[];
	intent: IntentKind;
	language: Language;
	maxTokens: number;
}

/**
 * Send one completion with at most one retry for transient failures.
 * Never rejects: every failure becomes an `unavailable` result.
 */
export async function runCompletion(call: CompletionCall, deps: InsightDeps): Promise<InsightResult> {
	const { client } = deps;
	if (!client) {
		return Object.freeze({
			status: "unavailable",
			reason: "not_configured",
			message: UNAVAILABLE_MESSAGES.not_configured,
			attempts: 0,
		});
	}
	const sleep = deps.sleep ?? defaultSleep;
	const backoffMs = deps.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;

	let attempts = 0;
	for (;;) {
		attempts += 1;
		const startedAt = Date.now();
		try {
			const text = await client.complete({
				system: call.system,
				messages: call.messages,
				maxTokens: call.maxTokens,
				language: call.language,
			});
			logger.info("insight_generated", {
				intent: call.intent,
				model: client.model,
				attempts,
				durationMs: Date.now() - startedAt,
				chars: text.length,
			});
			return Object.freeze({
				status: "ok",
				text,
				intent: call.intent,
				language: call.language,
				attempts,
			});
		} catch (error) {
			const reason = classifyCompletionError(error);
			const retry = RETRYABLE_REASONS.has(reason) && attempts < MAX_ATTEMPTS;
			logger.warn("insight_failed", {
				intent: call.intent,
				reason,
				attempts,
				retry,
				error: describeError(error),
			});
			if (!retry) {
				return Object.freeze({
					status: "unavailable",
					reason,
					message: UNAVAILABLE_MESSAGES[reason],
					attempts,
				});
			}
			await sleep(backoffMs);
		}
	}
}

/**
 * Commentary on an already computed analysis. The prompt quotes only the
 * fact bag; an optional question is answered against it.
 */
export function generateInsight(request: InsightRequest, deps: InsightDeps): Promise<InsightResult> {
	const { facts } = request;
	const language = request.language ?? "en";
	const template = request.question
		? QUESTION_PROMPT
		: facts.kind === "trading"
			? TRADING_INSIGHT_PROMPT
			: MARKETING_INSIGHT_PROMPT;
	const prompt = fillTemplate(template, {
		facts: renderFacts(facts),
		question: request.question ?? "",
	});
	return runCompletion(
		{
			system: buildSystemPrompt({
				intent: facts.kind,
				expertise: request.expertise ?? "beginner",
				language,
				style: request.style ?? "detailed",
			}),
			messages: [{ role: "user", content: prompt }],
			intent: facts.kind,
			language,
			maxTokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
		},
		deps
	);
}
