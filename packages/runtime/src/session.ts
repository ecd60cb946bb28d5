import type { CampaignAnalysis } from "@insightx/campaign-metrics";
import { AnalysisError, createLogger, type ExpertiseLevel, type Language, type ResponseStyle } from "@insightx/core";
import {
	ConversationContext,
	buildMarketingFacts,
	buildTradingFacts,
	chatTurn,
	generateExecutiveSummary,
	generateInsight,
	type ChatTurnResult,
	type FactBag,
	type InsightOptions,
	type InsightResult,
} from "@insightx/insights";
import { assembleReport, renderReportPdf, type AssembleOptions, type RenderPdfOptions } from "@insightx/report";
import { analyzeCampaigns, analyzeStock, buildAnalysisBundle } from "./analyze";
import type { AnalysisBundle, RuntimeDeps, StockAnalysis, StockRequest } from "./types";

const logger = createLogger("session");

export interface SessionPreferences {
	language: Language;
	expertise: ExpertiseLevel;
	style: ResponseStyle;
	historyTurns?: number;
	maxTokens?: number;
}

export interface ExportOptions extends AssembleOptions, RenderPdfOptions {}

/**
 * Per-user state: the conversation so far and the latest analyses it can
 * refer to. Each analysis call replaces the previous one of its kind.
 */
export class AnalysisSession {
	readonly conversation: ConversationContext;
	private stock: StockAnalysis | null = null;
	private campaigns: CampaignAnalysis | null = null;
	private insight: InsightResult | null = null;

	constructor(
		private readonly deps: RuntimeDeps,
		readonly preferences: SessionPreferences,
		now?: () => number
	) {
		this.conversation = new ConversationContext(now);
	}

	get lastStock(): StockAnalysis | null {
		return this.stock;
	}

	get lastCampaigns(): CampaignAnalysis | null {
		return this.campaigns;
	}

	get lastInsight(): InsightResult | null {
		return this.insight;
	}

	async analyzeStock(request: StockRequest): Promise<StockAnalysis> {
		const analysis = await analyzeStock(request, this.deps);
		this.stock = analysis;
		this.insight = null;
		return analysis;
	}

	analyzeCampaigns(csvText: string): CampaignAnalysis {
		const analysis = analyzeCampaigns(csvText);
		this.campaigns = analysis;
		this.insight = null;
		return analysis;
	}

	/**
	 * Generate an insight for the latest analysis of `kind` (the stock one
	 * when omitted and both exist) and keep it for the report.
	 */
	async attachInsight(kind?: "stock" | "campaigns", question?: string): Promise<InsightResult> {
		const facts = this.factsFor(kind);
		const result = await generateInsight(
			{ ...this.insightOptions(), facts, question },
			this.deps.insights
		);
		this.insight = result;
		return result;
	}

	chat(message: string): Promise<ChatTurnResult> {
		return chatTurn(
			this.conversation,
			message,
			{
				...this.insightOptions(),
				historyTurns: this.preferences.historyTurns,
				facts: this.currentFacts(),
			},
			this.deps.insights
		);
	}

	async summarize(): Promise<InsightResult> {
		const stock = this.stock ?? undefined;
		if (stock) {
			this.insight = await generateExecutiveSummary(
				{ stock, campaigns: this.campaigns ?? undefined },
				this.insightOptions(),
				this.deps.insights
			);
			return this.insight;
		}
		if (this.campaigns) {
			this.insight = await generateExecutiveSummary(
				{ campaigns: this.campaigns },
				this.insightOptions(),
				this.deps.insights
			);
			return this.insight;
		}
		throw new AnalysisError("ConfigError", "Nothing to summarise yet: analyse a stock or a campaign file first");
	}

	bundle(): AnalysisBundle {
		return buildAnalysisBundle({
			stock: this.stock ?? undefined,
			campaigns: this.campaigns ?? undefined,
			insight: this.insight ?? undefined,
		});
	}

	async exportReport(options: ExportOptions = {}): Promise<Buffer> {
		const document = assembleReport(this.bundle(), {
			title: options.title,
			language: options.language ?? this.preferences.language,
			generatedAt: options.generatedAt,
		});
		const pdf = await renderReportPdf(document, { images: options.images, fontPath: options.fontPath });
		logger.info("report_exported", { sections: document.sections.length, bytes: pdf.length });
		return pdf;
	}

	private insightOptions(): InsightOptions {
		return {
			language: this.preferences.language,
			expertise: this.preferences.expertise,
			style: this.preferences.style,
			maxTokens: this.preferences.maxTokens,
		};
	}

	private currentFacts(): FactBag[] {
		return [
			...(this.stock ? [buildTradingFacts(this.stock)] : []),
			...(this.campaigns ? [buildMarketingFacts(this.campaigns)] : []),
		];
	}

	private factsFor(kind?: "stock" | "campaigns"): FactBag {
		if (kind !== "campaigns" && this.stock) {
			return buildTradingFacts(this.stock);
		}
		if (kind !== "stock" && this.campaigns) {
			return buildMarketingFacts(this.campaigns);
		}
		throw new AnalysisError(
			"ConfigError",
			kind === "campaigns"
				? "No campaign analysis yet: analyse a campaign file first"
				: kind === "stock"
					? "No stock analysis yet: analyse a ticker first"
					: "Nothing to explain yet: analyse a stock or a campaign file first"
		);
	}
}
