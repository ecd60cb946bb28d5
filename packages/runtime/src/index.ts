export * from "./types";
export {
	DEFAULT_PERIOD,
	analyzeCampaigns,
	analyzeStock,
	buildAnalysisBundle,
	toAnalysisError,
} from "./analyze";
export { AnalysisSession, type ExportOptions, type SessionPreferences } from "./session";
export { createAnalysisSession, createRuntimeDeps, type CreateSessionOptions } from "./createSession";
