import { formatKpiCsv, type CampaignAnalysis } from "@insightx/campaign-metrics";
import { AnalysisError, getConfigMetadata, type InsightxConfig } from "@insightx/core";
import type { AnalysisSession, StockAnalysis } from "@insightx/runtime";
import type { InsightResult } from "@insightx/insights";
import { readFlag, readPeriod, readString, requireString, type ArgValue, type ParsedArgs } from "./cliArgs";

export interface CliIo {
	out: (line: string) => void;
	readText: (filePath: string) => string;
	writeFile: (filePath: string, data: string | Buffer) => void;
}

export interface CommandDefaults {
	ticker: string;
}

export const USAGE = `Usage:
  insightx <command> [options]

Commands:
  stock      Technical indicators and trend for a ticker
  campaigns  KPIs, rankings and statistics for a campaign CSV
  chat       Ask a trading or marketing question
  summary    Executive summary of a stock and/or campaign analysis
  config     Print the resolved configuration

Options:
  --ticker <symbol>        Ticker or BASE/QUOTE pair (defaults to DEFAULT_TICKER)
  --period <range>         1mo, 3mo, 6mo, 1y, 2y or 5y
  --file <path>            Campaign CSV with Budget, Clicks, Conversions, Revenue
  --message <text>         Chat question
  --insight                Add AI commentary to the analysis
  --question <text>        Question for the commentary to answer
  --language <en|ar>       Response language
  --level <level>          beginner, intermediate or expert
  --style <style>          concise or detailed
  --pdf <path>             Write a PDF report
  --csv <path>             Write per-campaign KPIs as CSV
  --json                   Print the full JSON result
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --profile <name>         Analysis profile under config/analysis
  --help                   Show this message
`;

const formatNumber = (value: number | null, digits = 2): string =>
	value === null || !Number.isFinite(value) ? "n/a" : value.toFixed(digits);

const formatUsd = (value: number | null): string => (value === null ? "n/a" : `$${formatNumber(value)}`);

const formatPct = (value: number | null): string => (value === null ? "n/a" : `${formatNumber(value)}%`);

export const describeStock = (analysis: StockAnalysis): string[] => {
	const { indicators, statistics, trend } = analysis;
	return [
		`${analysis.symbol} (${analysis.period}, ${indicators.length} bars): ${trend.trend}, signal ${trend.signal}`,
		trend.summary,
		`Price ${formatUsd(statistics.currentPrice)} (${formatPct(statistics.priceChangePct)} over the period)`,
		`RSI ${formatNumber(indicators.rsi.latest, 1)}, MACD ${formatNumber(indicators.macd.latest, 4)} / signal ${formatNumber(indicators.macdSignal.latest, 4)}`,
		`SMA ${indicators.parameters.smaShort} ${formatUsd(indicators.smaShort.latest)}, SMA ${indicators.parameters.smaLong} ${formatUsd(indicators.smaLong.latest)}`,
		`Annualised volatility ${formatPct(indicators.annualizedVolatility === null ? null : indicators.annualizedVolatility * 100)}`,
	];
};

export const describeCampaigns = (analysis: CampaignAnalysis): string[] => {
	const { aggregate, issues } = analysis.kpis;
	const lines = [
		`${aggregate.campaignCount} campaigns: budget ${formatUsd(aggregate.totalBudget)}, revenue ${formatUsd(aggregate.totalRevenue)}, profit ${formatUsd(aggregate.totalProfit)}`,
		`Overall ROI ${formatPct(aggregate.overallRoi)}, conversion rate ${formatPct(aggregate.overallConversionRate)}, cost per conversion ${formatUsd(aggregate.overallCostPerConversion)}`,
	];
	for (const ranking of Object.values(analysis.rankings)) {
		if (ranking.best && ranking.worst) {
			lines.push(`Best ${ranking.metric}: ${ranking.best.name}; worst: ${ranking.worst.name}`);
		}
	}
	for (const issue of issues) {
		lines.push(`Note: ${issue.metric} for ${issue.recordId} is undefined (${issue.reason})`);
	}
	for (const warning of analysis.warnings) {
		lines.push(`Warning: ${warning.message}`);
	}
	return lines;
};

/** Resolved configuration with the API key masked. */
export const describeConfig = (config: InsightxConfig): string => {
	const meta = getConfigMetadata(config.analysis);
	return JSON.stringify(
		{
			env: { ...config.env, anthropicApiKey: config.env.anthropicApiKey ? "***" : "" },
			analysis: config.analysis,
			source: meta ?? { source: "merged" },
		},
		null,
		2
	);
};

export const describeInsight = (result: InsightResult): string =>
	result.status === "ok" ? result.text : `Insight unavailable: ${result.message}`;

const writeReport = async (session: AnalysisSession, args: Record<string, ArgValue>, io: CliIo): Promise<void> => {
	const pdfPath = readString(args, "pdf");
	if (pdfPath) {
		io.writeFile(pdfPath, await session.exportReport());
		io.out(`Report written to ${pdfPath}`);
	}
};

const runStock = async (
	session: AnalysisSession,
	args: Record<string, ArgValue>,
	io: CliIo,
	defaults: CommandDefaults
): Promise<void> => {
	const analysis = await session.analyzeStock({
		ticker: readString(args, "ticker") ?? defaults.ticker,
		period: readPeriod(args),
	});
	if (readFlag(args, "json")) {
		io.out(JSON.stringify(analysis, null, 2));
	} else {
		describeStock(analysis).forEach((line) => io.out(line));
	}
	if (readFlag(args, "insight")) {
		io.out(describeInsight(await session.attachInsight("stock", readString(args, "question"))));
	}
	await writeReport(session, args, io);
};

const runCampaigns = async (session: AnalysisSession, args: Record<string, ArgValue>, io: CliIo): Promise<void> => {
	const filePath = requireString(args, "file", "path");
	const analysis = session.analyzeCampaigns(io.readText(filePath));
	if (readFlag(args, "json")) {
		io.out(JSON.stringify(analysis, null, 2));
	} else {
		describeCampaigns(analysis).forEach((line) => io.out(line));
	}
	const csvPath = readString(args, "csv");
	if (csvPath) {
		io.writeFile(csvPath, formatKpiCsv(analysis));
		io.out(`KPIs written to ${csvPath}`);
	}
	if (readFlag(args, "insight")) {
		io.out(describeInsight(await session.attachInsight("campaigns", readString(args, "question"))));
	}
	await writeReport(session, args, io);
};

/** Load whichever analyses were named so the chat or summary can refer to them. */
const loadContext = async (session: AnalysisSession, args: Record<string, ArgValue>, io: CliIo): Promise<void> => {
	const ticker = readString(args, "ticker");
	if (ticker) {
		await session.analyzeStock({ ticker, period: readPeriod(args) });
	}
	const filePath = readString(args, "file");
	if (filePath) {
		session.analyzeCampaigns(io.readText(filePath));
	}
};

const runChat = async (session: AnalysisSession, args: Record<string, ArgValue>, io: CliIo): Promise<void> => {
	const message = requireString(args, "message", "text");
	await loadContext(session, args, io);
	const turn = await session.chat(message);
	io.out(turn.reply);
};

const runSummary = async (session: AnalysisSession, args: Record<string, ArgValue>, io: CliIo): Promise<void> => {
	await loadContext(session, args, io);
	io.out(describeInsight(await session.summarize()));
	await writeReport(session, args, io);
};

export const runCommand = async (
	session: AnalysisSession,
	parsed: ParsedArgs,
	io: CliIo,
	defaults: CommandDefaults
): Promise<void> => {
	switch (parsed.command) {
		case "stock":
			return runStock(session, parsed.args, io, defaults);
		case "campaigns":
			return runCampaigns(session, parsed.args, io);
		case "chat":
			return runChat(session, parsed.args, io);
		case "summary":
			return runSummary(session, parsed.args, io);
		default:
			throw new AnalysisError(
				"ConfigError",
				parsed.command ? `Unknown command: ${parsed.command}` : "No command given",
				{ details: { command: parsed.command ?? null } }
			);
	}
};
