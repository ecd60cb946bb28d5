import Papa from "papaparse";
import { AnalysisError } from "@insightx/core";
import {
	NAME_COLUMNS,
	REQUIRED_COLUMNS,
	type CampaignInput,
	type CampaignRecord,
	type CampaignTable,
	type RequiredColumn,
} from "./types";

const NUMERIC_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Parse a spreadsheet cell as a number. Accepts a leading `$` and comma
 * thousands separators; anything else non-numeric is a ParseError.
 */
export const parseNumericCell = (
	raw: string | undefined,
	column: string,
	rowIndex: number
): number => {
	const cleaned = (raw ?? "").trim().replace(/^(-?)\$/, "$1").replace(/,/g, "");
	if (!NUMERIC_PATTERN.test(cleaned)) {
		throw new AnalysisError(
			"ParseError",
			`Row ${rowIndex + 1}, column ${column}: "${raw ?? ""}" is not a number`,
			{ details: { row: rowIndex + 1, column, value: raw ?? null } }
		);
	}
	return Number(cleaned);
};

export const campaignId = (rowIndex: number): string => `campaign-${rowIndex + 1}`;

/**
 * Build a table from already-typed rows. Missing or blank names fall back to
 * the positional id.
 */
export const buildCampaignTable = (rows: readonly CampaignInput[]): CampaignTable =>
	Object.freeze(
		rows.map((row, rowIndex): CampaignRecord => {
			const id = campaignId(rowIndex);
			const name = row.name?.trim();
			return Object.freeze({
				id,
				name: name ? name : id,
				budget: row.budget,
				clicks: row.clicks,
				conversions: row.conversions,
				revenue: row.revenue,
				rowIndex,
			});
		})
	);

/**
 * Parse campaign CSV text with a header row. Required columns are
 * `Budget`, `Clicks`, `Conversions` and `Revenue` (case-sensitive); the name
 * comes from `Campaign`, `Campaign Name` or `Name` when present.
 */
export function parseCampaignCsv(text: string): CampaignTable {
	const parsed = Papa.parse<Record<string, string | undefined>>(text, {
		header: true,
		dynamicTyping: false,
		skipEmptyLines: "greedy",
		transformHeader: (header) => header.trim(),
	});

	const quoteError = parsed.errors.find((error) => error.type === "Quotes");
	if (quoteError) {
		throw new AnalysisError("ParseError", `Malformed CSV: ${quoteError.message}`, {
			details: { row: (quoteError.row ?? 0) + 1, code: quoteError.code },
		});
	}

	const fields = parsed.meta.fields ?? [];
	const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
	if (missing.length) {
		throw new AnalysisError(
			"SchemaError",
			`Missing required columns: ${missing.join(", ")}`,
			{ details: { missing, found: fields } }
		);
	}
	if (!parsed.data.length) {
		throw new AnalysisError("SchemaError", "No campaign rows found in the file", {
			details: { found: fields },
		});
	}

	const nameColumn = NAME_COLUMNS.find((column) => fields.includes(column));
	const cell = (row: Record<string, string | undefined>, column: RequiredColumn, index: number) =>
		parseNumericCell(row[column], column, index);

	return buildCampaignTable(
		parsed.data.map((row, index) => ({
			name: nameColumn ? row[nameColumn] : undefined,
			budget: cell(row, "Budget", index),
			clicks: cell(row, "Clicks", index),
			conversions: cell(row, "Conversions", index),
			revenue: cell(row, "Revenue", index),
		}))
	);
}
