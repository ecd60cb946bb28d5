import type { CellValue, ReportFact, ReportUnit } from "./types";

export const MISSING_VALUE = "n/a";

export function formatCell(value: CellValue, unit: ReportUnit): string {
	if (value === null) {
		return MISSING_VALUE;
	}
	if (typeof value === "string") {
		return value;
	}
	if (!Number.isFinite(value)) {
		return MISSING_VALUE;
	}
	switch (unit) {
		case "currency":
			return `$${value.toLocaleString("en-US", {
				minimumFractionDigits: 2,
				maximumFractionDigits: 2,
			})}`;
		case "percent":
			return `${value.toFixed(2)}%`;
		default:
			return value.toLocaleString("en-US", { maximumFractionDigits: 4 });
	}
}

export const formatFactValue = (fact: ReportFact): string => formatCell(fact.value, fact.unit);
