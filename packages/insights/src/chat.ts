import type { ExpertiseLevel, Language, ResponseStyle } from "@insightx/core";
import type { ConversationContext } from "./conversation";
import { renderFacts } from "./facts";
import { DEFAULT_MAX_TOKENS, runCompletion } from "./generateInsight";
import { classifyIntent, isInScope } from "./intent";
import { REFUSAL, buildSystemPrompt } from "./prompts";
import type { FactBag, InsightDeps, InsightResult, Intent } from "./types";

export const DEFAULT_HISTORY_TURNS = 6;

export interface ChatOptions {
	language?: Language;
	expertise?: ExpertiseLevel;
	style?: ResponseStyle;
	historyTurns?: number;
	maxTokens?: number;
	/** Facts from the session's current analyses, offered as context. */
	facts?: readonly FactBag[];
}

export interface ChatTurnResult {
	intent: Intent;
	reply: string;
	refused: boolean;
	/** `null` when the question was refused without calling the model. */
	result: InsightResult | null;
}

const contextBlock = (facts: readonly FactBag[]): string =>
	facts.length
		? `\n\nCurrent analysis context:\n${facts.map((bag) => renderFacts(bag)).join("\n\n")}`
		: "";

/**
 * One chat exchange. A question matching no keyword gets a fixed refusal;
 * the rest go to the model with the recent history and every fact bag the
 * session holds. Both sides of the exchange are appended to the context.
 */
export async function chatTurn(
	context: ConversationContext,
	message: string,
	options: ChatOptions,
	deps: InsightDeps
): Promise<ChatTurnResult> {
	const language = options.language ?? "en";
	const intent = classifyIntent(message);
	const history = context.recentMessages(options.historyTurns ?? DEFAULT_HISTORY_TURNS);
	context.append({ role: "user", text: message, language, intent: intent.kind });

	if (!isInScope(intent)) {
		const reply = REFUSAL[language];
		context.append({ role: "assistant", text: reply, language, intent: intent.kind, status: "refused" });
		return { intent, reply, refused: true, result: null };
	}

	const result = await runCompletion(
		{
			system:
				buildSystemPrompt({
					intent: intent.kind,
					expertise: options.expertise ?? "beginner",
					language,
					style: options.style ?? "concise",
				}) + contextBlock(options.facts ?? []),
			messages: [...history, { role: "user", content: message }],
			intent: intent.kind,
			language,
			maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
		},
		deps
	);
	if (result.status === "ok") {
		context.append({ role: "assistant", text: result.text, language, intent: intent.kind });
		return { intent, reply: result.text, refused: false, result };
	}
	context.append({
		role: "assistant",
		text: result.message,
		language,
		intent: intent.kind,
		status: "unavailable",
	});
	return { intent, reply: result.message, refused: false, result };
}
