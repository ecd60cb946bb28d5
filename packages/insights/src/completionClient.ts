import Anthropic from "@anthropic-ai/sdk";
import { AnalysisError, DEFAULT_INSIGHT_MODEL, type EnvConfig } from "@insightx/core";
import type { CompletionRequest, TextCompletionClient, UnavailableReason } from "./types";

const DEFAULT_TIMEOUT_MS = 30_000;

export interface AnthropicCompletionClientOptions {
	apiKey: string;
	model?: string;
	timeoutMs?: number;
	client?: Anthropic;
}

export const unavailable = (reason: UnavailableReason, message: string, cause?: unknown): AnalysisError =>
	new AnalysisError("InsightUnavailable", message, { details: { reason }, cause });

/**
 * Hosted-model client on the Anthropic Messages API. SDK retries are off;
 * the generator owns the retry policy.
 */
export class AnthropicCompletionClient implements TextCompletionClient {
	readonly model: string;
	private readonly client: Anthropic;

	constructor(options: AnthropicCompletionClientOptions) {
		this.model = options.model ?? DEFAULT_INSIGHT_MODEL;
		this.client =
			options.client ??
			new Anthropic({
				apiKey: options.apiKey,
				timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
				maxRetries: 0,
			});
	}

	async complete(request: CompletionRequest): Promise<string> {
		const message = await this.client.messages.create({
			model: this.model,
			max_tokens: request.maxTokens,
			system: request.system,
			messages: request.messages.map((entry) => ({
				role: entry.role,
				content: entry.content,
			})),
		});

		const parts: string[] = [];
		for (const block of message.content) {
			if (block.type === "text") {
				parts.push(block.text);
			}
		}
		const text = parts.join("\n").trim();
		if (!text) {
			throw unavailable("malformed_response", "The model returned no text");
		}
		return text;
	}
}

/** Build the configured client, or null when no API key is set. */
export const createCompletionClient = (env: EnvConfig): TextCompletionClient | null =>
	env.anthropicApiKey
		? new AnthropicCompletionClient({
				apiKey: env.anthropicApiKey,
				model: env.insightModel,
				timeoutMs: env.insightTimeoutMs,
			})
		: null;

const readReason = (error: AnalysisError): UnavailableReason | null => {
	const reason = error.details.reason;
	switch (reason) {
		case "timeout":
		case "rate_limited":
		case "malformed_response":
		case "not_configured":
		case "api_error":
			return reason;
		default:
			return null;
	}
};

/** Map a completion failure onto the unavailable reasons. */
export function classifyCompletionError(error: unknown): UnavailableReason {
	if (error instanceof AnalysisError && error.code === "InsightUnavailable") {
		return readReason(error) ?? "api_error";
	}
	if (error instanceof Anthropic.APIConnectionTimeoutError) {
		return "timeout";
	}
	if (error instanceof Anthropic.RateLimitError) {
		return "rate_limited";
	}
	if (error instanceof Anthropic.AuthenticationError) {
		return "not_configured";
	}
	if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
		return "timeout";
	}
	if (error instanceof SyntaxError) {
		return "malformed_response";
	}
	return "api_error";
}

export const RETRYABLE_REASONS: ReadonlySet<UnavailableReason> = new Set<UnavailableReason>([
	"timeout",
	"rate_limited",
	"api_error",
]);
