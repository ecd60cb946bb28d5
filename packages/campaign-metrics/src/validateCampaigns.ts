import { AnalysisError } from "@insightx/core";
import type { CampaignTable, CampaignWarning, RequiredColumn } from "./types";

type NumericField = "budget" | "clicks" | "conversions" | "revenue";

const NUMERIC_FIELDS: ReadonlyArray<[RequiredColumn, NumericField]> = [
	["Budget", "budget"],
	["Clicks", "clicks"],
	["Conversions", "conversions"],
	["Revenue", "revenue"],
];

export interface NegativeValue {
	column: RequiredColumn;
	row: number;
	value: number;
}

/**
 * Reject empty tables and negative or non-finite values; return the soft
 * warnings (conversions above clicks) for the rest.
 */
export function validateCampaigns(table: CampaignTable): CampaignWarning[] {
	if (!table.length) {
		throw new AnalysisError("SchemaError", "No campaign rows found in the file");
	}

	const negatives: NegativeValue[] = [];
	for (const record of table) {
		for (const [column, field] of NUMERIC_FIELDS) {
			const value = record[field];
			if (!Number.isFinite(value)) {
				throw new AnalysisError(
					"SchemaError",
					`Row ${record.rowIndex + 1}, column ${column} is not a finite number`,
					{ details: { column, row: record.rowIndex + 1 } }
				);
			}
			if (value < 0) {
				negatives.push({ column, row: record.rowIndex + 1, value });
			}
		}
	}
	if (negatives.length) {
		const columns = [...new Set(negatives.map((entry) => entry.column))];
		throw new AnalysisError(
			"NegativeValueError",
			`Negative values found in ${columns.join(", ")} (rows ${negatives
				.map((entry) => entry.row)
				.join(", ")})`,
			{ details: { violations: negatives } }
		);
	}

	return table
		.filter((record) => record.conversions > record.clicks)
		.map((record): CampaignWarning => ({
			code: "ConversionsExceedClicks",
			recordId: record.id,
			rowIndex: record.rowIndex,
			message: `${record.name}: ${record.conversions} conversions exceed ${record.clicks} clicks`,
		}));
}
