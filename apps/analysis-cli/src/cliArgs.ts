import {
	AnalysisError,
	isExpertiseLevel,
	isLanguage,
	isPricePeriod,
	isResponseStyle,
	type ExpertiseLevel,
	type Language,
	type PricePeriod,
	type ResponseStyle,
} from "@insightx/core";

export type ArgValue = string | boolean;

export interface ParsedArgs {
	command: string | undefined;
	args: Record<string, ArgValue>;
}

export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[1] && args.ticker === undefined && positionals[0] === "stock") {
		args.ticker = positionals[1];
	}
	if (positionals[1] && args.file === undefined && positionals[0] === "campaigns") {
		args.file = positionals[1];
	}
	return { command: positionals[0], args };
};

const usageError = (message: string, key: string): AnalysisError =>
	new AnalysisError("ConfigError", message, { details: { option: key } });

export const readString = (args: Record<string, ArgValue>, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw usageError(`--${key} needs a value`, key);
	}
	return value;
};

export const requireString = (args: Record<string, ArgValue>, key: string, hint: string): string => {
	const value = readString(args, key);
	if (!value) {
		throw usageError(`Missing required --${key} <${hint}>`, key);
	}
	return value;
};

export const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

const readChoice = <T extends string>(
	args: Record<string, ArgValue>,
	key: string,
	guard: (value: unknown) => value is T,
	choices: string
): T | undefined => {
	const value = readString(args, key);
	if (value === undefined) {
		return undefined;
	}
	if (!guard(value)) {
		throw usageError(`Invalid --${key} ${value}; expected one of ${choices}`, key);
	}
	return value;
};

export const readPeriod = (args: Record<string, ArgValue>): PricePeriod | undefined =>
	readChoice(args, "period", isPricePeriod, "1mo, 3mo, 6mo, 1y, 2y, 5y");

export const readLanguage = (args: Record<string, ArgValue>): Language | undefined =>
	readChoice(args, "language", isLanguage, "en, ar");

export const readExpertise = (args: Record<string, ArgValue>): ExpertiseLevel | undefined =>
	readChoice(args, "level", isExpertiseLevel, "beginner, intermediate, expert");

export const readStyle = (args: Record<string, ArgValue>): ResponseStyle | undefined =>
	readChoice(args, "style", isResponseStyle, "concise, detailed");
