export type AnalysisErrorCode =
	| "InsufficientHistory"
	| "InvalidSeries"
	| "NoDataFound"
	| "SchemaError"
	| "NegativeValueError"
	| "DivisionUndefined"
	| "InsightUnavailable"
	| "ParseError"
	| "FormatError"
	| "ConfigError";

export interface AnalysisErrorOptions {
	details?: Record<string, unknown>;
	cause?: unknown;
}

/**
 * Error raised at a component boundary. `code` names the failure class and
 * `details` carries the structured context (row, column, bar index, ...).
 */
export class AnalysisError extends Error {
	readonly code: AnalysisErrorCode;
	readonly details: Record<string, unknown>;

	constructor(
		code: AnalysisErrorCode,
		message: string,
		options: AnalysisErrorOptions = {}
	) {
		super(message, { cause: options.cause });
		this.name = "AnalysisError";
		this.code = code;
		this.details = options.details ?? {};
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			details: this.details,
		};
	}
}

export const isAnalysisError = (
	value: unknown,
	code?: AnalysisErrorCode
): value is AnalysisError =>
	value instanceof AnalysisError && (code === undefined || value.code === code);

export const describeError = (value: unknown): string => {
	if (value instanceof Error) {
		return value.message;
	}
	return typeof value === "string" ? value : "unknown error";
};
