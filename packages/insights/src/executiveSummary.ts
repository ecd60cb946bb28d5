import type { CampaignAnalysis } from "@insightx/campaign-metrics";
import type { IndicatorAnalysis } from "@insightx/indicators";
import { buildMarketingFacts, buildTradingFacts, renderFacts } from "./facts";
import { DEFAULT_MAX_TOKENS, runCompletion } from "./generateInsight";
import { EXECUTIVE_SUMMARY_PROMPT, buildSystemPrompt, fillTemplate } from "./prompts";
import type { InsightDeps, InsightOptions, InsightResult } from "./types";

export type SummaryInput =
	| { stock: IndicatorAnalysis; campaigns?: CampaignAnalysis }
	| { stock?: IndicatorAnalysis; campaigns: CampaignAnalysis };

/**
 * Short report-ready summary over whichever analyses are present.
 */
export function generateExecutiveSummary(
	input: SummaryInput,
	options: InsightOptions,
	deps: InsightDeps
): Promise<InsightResult> {
	const bags = [
		...(input.stock ? [buildTradingFacts(input.stock)] : []),
		...(input.campaigns ? [buildMarketingFacts(input.campaigns)] : []),
	];
	const intent = input.stock ? "trading" : "marketing";
	const language = options.language ?? "en";
	return runCompletion(
		{
			system: buildSystemPrompt({
				intent,
				expertise: options.expertise ?? "intermediate",
				language,
				style: options.style ?? "concise",
			}),
			messages: [
				{
					role: "user",
					content: fillTemplate(EXECUTIVE_SUMMARY_PROMPT, {
						facts: bags.map((bag) => renderFacts(bag)).join("\n\n"),
					}),
				},
			],
			intent,
			language,
			maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
		},
		deps
	);
}
