export * from "./types";
export { classifyIntent, isInScope } from "./intent";
export {
	NOT_AVAILABLE,
	buildMarketingFacts,
	buildTradingFacts,
	formatFact,
	renderFacts,
} from "./facts";
export {
	DISCLAIMER,
	REFUSAL,
	SAFETY_PREAMBLE,
	buildSystemPrompt,
	fillTemplate,
} from "./prompts";
export {
	AnthropicCompletionClient,
	RETRYABLE_REASONS,
	classifyCompletionError,
	createCompletionClient,
	type AnthropicCompletionClientOptions,
} from "./completionClient";
export {
	DEFAULT_MAX_TOKENS,
	DEFAULT_RETRY_BACKOFF_MS,
	generateInsight,
	runCompletion,
} from "./generateInsight";
export { ConversationContext, type ConversationTurn } from "./conversation";
export { DEFAULT_HISTORY_TURNS, chatTurn, type ChatOptions, type ChatTurnResult } from "./chat";
export { generateExecutiveSummary, type SummaryInput } from "./executiveSummary";
