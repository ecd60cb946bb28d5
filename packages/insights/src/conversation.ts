import type { Language } from "@insightx/core";
import type { CompletionMessage, IntentKind } from "./types";

export interface ConversationTurn {
	role: "user" | "assistant";
	text: string;
	language: Language;
	intent: IntentKind;
	/** Set on assistant turns that are not a model answer. */
	status?: "refused" | "unavailable";
	at: number;
}

/**
 * Append-only chat history owned by one session.
 */
export class ConversationContext {
	private readonly entries: ConversationTurn[] = [];

	constructor(private readonly now: () => number = Date.now) {}

	append(turn: Omit<ConversationTurn, "at">): ConversationTurn {
		const entry = Object.freeze({ ...turn, at: this.now() });
		this.entries.push(entry);
		return entry;
	}

	get turns(): readonly ConversationTurn[] {
		return [...this.entries];
	}

	get length(): number {
		return this.entries.length;
	}

	/**
	 * The last `count` turns as completion messages, starting on a user turn.
	 * An exchange whose reply was unavailable is left out entirely.
	 */
	recentMessages(count: number): CompletionMessage[] {
		const answered = this.entries.filter(
			(turn, index) =>
				turn.status !== "unavailable" && this.entries[index + 1]?.status !== "unavailable"
		);
		const recent = count > 0 ? answered.slice(-count) : [];
		const firstUser = recent.findIndex((turn) => turn.role === "user");
		if (firstUser < 0) {
			return [];
		}
		return recent.slice(firstUser).map((turn) => ({ role: turn.role, content: turn.text }));
	}
}
