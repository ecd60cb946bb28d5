import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { AnalysisError } from "./errors";
import {
	ExpertiseLevel,
	Language,
	PricePeriod,
	ResponseStyle,
	isExpertiseLevel,
	isLanguage,
	isPricePeriod,
	isResponseStyle,
} from "./types";
import { configureLogger } from "./utils/logger";

export type ConfigSourceType = "file" | "env" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("insightx.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const pkgPath = path.join(dir, "package.json");
	if (!fs.existsSync(pkgPath)) {
		return false;
	}
	const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
	return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

export interface EnvConfig {
	anthropicApiKey: string;
	insightModel: string;
	insightMaxTokens: number;
	insightTimeoutMs: number;
	marketDataTimeoutMs: number;
	defaultTicker: string;
	defaultPeriod: PricePeriod;
	defaultLanguage: Language;
	analysisProfile: string;
}

export interface IndicatorConfig {
	rsiPeriod: number;
	macdFast: number;
	macdSlow: number;
	macdSignal: number;
	smaShort: number;
	smaLong: number;
	volatilityWindow: number;
}

export interface ThresholdConfig {
	highVolatility: number;
	moderateVolatility: number;
	rsiOverbought: number;
	rsiOversold: number;
}

export interface InsightDefaults {
	expertise: ExpertiseLevel;
	responseStyle: ResponseStyle;
	historyTurns: number;
	retryBackoffMs: number;
}

export interface AnalysisConfig {
	indicators: IndicatorConfig;
	thresholds: ThresholdConfig;
	insights: InsightDefaults;
}

export interface InsightxConfig {
	env: EnvConfig;
	analysis: AnalysisConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	analysisProfile?: string;
}

export const DEFAULT_INSIGHT_MODEL = "claude-3-5-sonnet-latest";

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readPositiveIntEnv = (
	env: NodeJS.ProcessEnv,
	key: string,
	fallback: number
): number => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new AnalysisError(
			"ConfigError",
			`Environment variable ${key} must be a positive integer, got "${raw}"`,
			{ details: { key, value: raw } }
		);
	}
	return value;
};

const readEnum = <T extends string>(
	env: NodeJS.ProcessEnv,
	key: string,
	guard: (value: unknown) => value is T,
	fallback: T
): T => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return fallback;
	}
	if (!guard(raw)) {
		throw new AnalysisError(
			"ConfigError",
			`Environment variable ${key} has unsupported value "${raw}"`,
			{ details: { key, value: raw } }
		);
	}
	return raw;
};

/**
 * Build the env-derived settings from a variable bag. `process.env` is the
 * default; tests pass their own object.
 */
export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig =>
	withConfigMetadata(
		{
			anthropicApiKey: readOptionalEnvVar(env, "ANTHROPIC_API_KEY") ?? "",
			insightModel:
				readOptionalEnvVar(env, "INSIGHT_MODEL") ?? DEFAULT_INSIGHT_MODEL,
			insightMaxTokens: readPositiveIntEnv(env, "INSIGHT_MAX_TOKENS", 1024),
			insightTimeoutMs: readPositiveIntEnv(env, "INSIGHT_TIMEOUT_MS", 30_000),
			marketDataTimeoutMs: readPositiveIntEnv(
				env,
				"MARKET_DATA_TIMEOUT_MS",
				30_000
			),
			defaultTicker: (
				readOptionalEnvVar(env, "DEFAULT_TICKER") ?? "AAPL"
			).toUpperCase(),
			defaultPeriod: readEnum(env, "DEFAULT_PERIOD", isPricePeriod, "1y"),
			defaultLanguage: readEnum(env, "DEFAULT_LANGUAGE", isLanguage, "en"),
			analysisProfile: readOptionalEnvVar(env, "ANALYSIS_PROFILE") ?? "default",
		},
		{ source: "env" }
	);

export const loadEnvConfig = (
	projectRoot: string = findWorkspaceRoot(),
	envPath?: string
): EnvConfig => {
	loadEnvFiles(projectRoot, envPath ? [envPath] : []);
	configureLogger(process.env);
	return readEnvConfig(process.env);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readSection = (
	file: Record<string, unknown>,
	key: string,
	filePath: string
): Record<string, unknown> => {
	const section = file[key];
	if (!isRecord(section)) {
		throw new AnalysisError(
			"ConfigError",
			`Config ${filePath} is missing the "${key}" section`,
			{ details: { path: filePath, section: key } }
		);
	}
	return section;
};

const ensureNumber = (
	section: Record<string, unknown>,
	field: string,
	label: string
): number => {
	const value = section[field];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new AnalysisError(
			"ConfigError",
			`Required numeric field missing in ${label}.${field}`,
			{ details: { field: `${label}.${field}` } }
		);
	}
	return value;
};

const ensureIntAtLeast = (
	section: Record<string, unknown>,
	field: string,
	label: string,
	min: number
): number => {
	const value = ensureNumber(section, field, label);
	if (!Number.isInteger(value) || value < min) {
		throw new AnalysisError(
			"ConfigError",
			min === 1
				? `${label}.${field} must be a positive integer, got ${value}`
				: `${label}.${field} must be an integer of at least ${min}, got ${value}`,
			{ details: { field: `${label}.${field}`, value } }
		);
	}
	return value;
};

const ensurePositiveInt = (
	section: Record<string, unknown>,
	field: string,
	label: string
): number => ensureIntAtLeast(section, field, label, 1);

const ensureNonNegative = (
	section: Record<string, unknown>,
	field: string,
	label: string
): number => {
	const value = ensureNumber(section, field, label);
	if (value < 0) {
		throw new AnalysisError(
			"ConfigError",
			`${label}.${field} must not be negative, got ${value}`,
			{ details: { field: `${label}.${field}`, value } }
		);
	}
	return value;
};

const ensureEnum = <T extends string>(
	section: Record<string, unknown>,
	field: string,
	label: string,
	guard: (value: unknown) => value is T
): T => {
	const value = section[field];
	if (!guard(value)) {
		throw new AnalysisError(
			"ConfigError",
			`${label}.${field} has unsupported value ${JSON.stringify(value)}`,
			{ details: { field: `${label}.${field}` } }
		);
	}
	return value;
};

export const parseAnalysisConfig = (
	raw: unknown,
	filePath = "<inline>"
): AnalysisConfig => {
	if (!isRecord(raw)) {
		throw new AnalysisError(
			"ConfigError",
			`Config ${filePath} must contain a JSON object`,
			{ details: { path: filePath } }
		);
	}
	const indicators = readSection(raw, "indicators", filePath);
	const thresholds = readSection(raw, "thresholds", filePath);
	const insights = readSection(raw, "insights", filePath);

	const config: AnalysisConfig = {
		indicators: {
			rsiPeriod: ensurePositiveInt(indicators, "rsiPeriod", "indicators"),
			macdFast: ensurePositiveInt(indicators, "macdFast", "indicators"),
			macdSlow: ensurePositiveInt(indicators, "macdSlow", "indicators"),
			macdSignal: ensurePositiveInt(indicators, "macdSignal", "indicators"),
			smaShort: ensurePositiveInt(indicators, "smaShort", "indicators"),
			smaLong: ensurePositiveInt(indicators, "smaLong", "indicators"),
			// a sample deviation needs at least two returns
			volatilityWindow: ensureIntAtLeast(
				indicators,
				"volatilityWindow",
				"indicators",
				2
			),
		},
		thresholds: {
			highVolatility: ensureNumber(thresholds, "highVolatility", "thresholds"),
			moderateVolatility: ensureNumber(
				thresholds,
				"moderateVolatility",
				"thresholds"
			),
			rsiOverbought: ensureNumber(thresholds, "rsiOverbought", "thresholds"),
			rsiOversold: ensureNumber(thresholds, "rsiOversold", "thresholds"),
		},
		insights: {
			expertise: ensureEnum(insights, "expertise", "insights", isExpertiseLevel),
			responseStyle: ensureEnum(
				insights,
				"responseStyle",
				"insights",
				isResponseStyle
			),
			historyTurns: ensurePositiveInt(insights, "historyTurns", "insights"),
			retryBackoffMs: ensureNonNegative(insights, "retryBackoffMs", "insights"),
		},
	};

	if (config.indicators.macdFast >= config.indicators.macdSlow) {
		throw new AnalysisError(
			"ConfigError",
			`indicators.macdFast (${config.indicators.macdFast}) must be below indicators.macdSlow (${config.indicators.macdSlow})`
		);
	}
	if (config.indicators.smaShort >= config.indicators.smaLong) {
		throw new AnalysisError(
			"ConfigError",
			`indicators.smaShort (${config.indicators.smaShort}) must be below indicators.smaLong (${config.indicators.smaLong})`
		);
	}
	return config;
};

export const resolveAnalysisConfigPath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "analysis", fileName),
		path.join(configDir, fileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new AnalysisError(
		"ConfigError",
		`Analysis config not found. Looked for ${candidates.join(", ")}`,
		{ details: { profile, candidates } }
	);
};

export const loadAnalysisConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): AnalysisConfig => {
	const filePath = resolveAnalysisConfigPath(configDir, profile);
	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new AnalysisError(
			"ConfigError",
			`Analysis config ${filePath} is not valid JSON`,
			{ details: { path: filePath }, cause: error }
		);
	}
	return withConfigMetadata(parseAnalysisConfig(raw, filePath), {
		source: "file",
		path: filePath,
		profile,
	});
};

export const loadInsightxConfig = (
	options: ConfigLoadOptions = {}
): InsightxConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const env = loadEnvConfig(workspaceRoot, options.envPath);
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	return {
		env,
		analysis: loadAnalysisConfig(
			configDir,
			options.analysisProfile ?? env.analysisProfile
		),
	};
};
