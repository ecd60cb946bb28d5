export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

interface LoggerSettings {
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

const parseModuleFilter = (raw: string | undefined): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const readSettings = (env: NodeJS.ProcessEnv): LoggerSettings => {
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		moduleFilter: parseModuleFilter(env.LOG_MODULE),
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

let settings = readSettings(process.env);

/**
 * Re-read LOG_* variables. Called after `.env` files are loaded so that
 * values defined there take effect.
 */
export const configureLogger = (env: NodeJS.ProcessEnv = process.env): void => {
	settings = readSettings(env);
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			const json = JSON.stringify(sanitize(base));
			console.log(json);
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

export const sanitize = (payload: BaseLogPayload): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clean = sanitizeValue(payload, seen);
	return isRecord(clean) ? clean : {};
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (isRecord(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "indicator_snapshot": {
				printIndicatorSnapshot(rest);
				break;
			}
			case "campaign_summary": {
				printCampaignSummary(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const fmtNumber = (value: unknown): string =>
	typeof value === "number" && Number.isFinite(value)
		? value.toFixed(2)
		: "n/a";

const printIndicatorSnapshot = (payload: Record<string, unknown>): void => {
	console.table([
		{
			symbol: payload.symbol,
			bars: payload.bars,
			close: fmtNumber(payload.close),
			rsi: fmtNumber(payload.rsi),
			macd: fmtNumber(payload.macd),
			signal: fmtNumber(payload.macdSignal),
			smaShort: fmtNumber(payload.smaShort),
			smaLong: fmtNumber(payload.smaLong),
			volatility: fmtNumber(payload.volatility),
			trend: payload.trend ?? "-",
		},
	]);
};

const printCampaignSummary = (payload: Record<string, unknown>): void => {
	console.table([
		{
			campaigns: payload.campaigns,
			totalBudget: fmtNumber(payload.totalBudget),
			totalRevenue: fmtNumber(payload.totalRevenue),
			overallRoi: fmtNumber(payload.overallRoi),
			overallConversionRate: fmtNumber(payload.overallConversionRate),
			issues: payload.issues,
			warnings: payload.warnings,
		},
	]);
};
