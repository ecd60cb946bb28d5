import type { CampaignAnalysis } from "@insightx/campaign-metrics";
import type { Language } from "@insightx/core";
import type { IndicatorAnalysis } from "@insightx/indicators";
import type { InsightResult } from "@insightx/insights";

export type ReportUnit = "currency" | "percent" | "number" | "text";
export type CellValue = number | string | null;

export interface ReportFact {
	label: string;
	value: CellValue;
	unit: ReportUnit;
}

export interface ReportTable {
	columns: readonly string[];
	units: readonly ReportUnit[];
	rows: readonly (readonly CellValue[])[];
}

export type SectionId =
	| "overview"
	| "stock-indicators"
	| "stock-trend"
	| "campaign-totals"
	| "campaign-rankings"
	| "campaign-records"
	| "campaign-notes"
	| "insight"
	| "disclaimer";

export interface ReportSection {
	id: SectionId;
	title: string;
	facts: readonly ReportFact[];
	rows?: ReportTable;
	prose?: readonly string[];
}

export interface ReportDocument {
	title: string;
	generatedAt: string;
	language: Language;
	sections: readonly ReportSection[];
}

/** Whatever parts of an analysis are available; every field is optional. */
export interface AnalysisBundle {
	stock?: IndicatorAnalysis;
	campaigns?: CampaignAnalysis;
	insight?: InsightResult;
}

export interface AssembleOptions {
	title?: string;
	language?: Language;
	generatedAt?: Date;
}

export interface ReportImage {
	title?: string;
	/** PNG or JPEG bytes. */
	data: Buffer;
}

export interface RenderPdfOptions {
	images?: readonly ReportImage[];
	/** TTF/OTF font for body text, needed for Arabic glyphs. */
	fontPath?: string;
}
