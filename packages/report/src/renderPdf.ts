import PDFDocument from "pdfkit";
import { AnalysisError, createLogger, describeError } from "@insightx/core";
import { DISCLAIMER } from "@insightx/insights";
import { formatCell, formatFactValue } from "./formatValue";
import type { RenderPdfOptions, ReportDocument, ReportSection, ReportTable } from "./types";

const logger = createLogger("report");

const MARGIN = 50;
const ROW_HEIGHT = 16;
const ARABIC_SCRIPT = /\p{Script=Arabic}/u;

/**
 * Paragraphs the document can draw. The built-in Helvetica has no Arabic
 * glyphs, so without a font file Arabic paragraphs are left out and the
 * disclaimer falls back to English.
 */
export const printableProse = (section: ReportSection, hasArabicFont: boolean): string[] => {
	const prose = section.prose ?? [];
	if (hasArabicFont) {
		return [...prose];
	}
	if (section.id === "disclaimer") {
		return prose.map((paragraph) => (ARABIC_SCRIPT.test(paragraph) ? DISCLAIMER.en : paragraph));
	}
	return prose.filter((paragraph) => !ARABIC_SCRIPT.test(paragraph));
};

const ensureSpace = (doc: PDFKit.PDFDocument, height: number): void => {
	if (doc.y + height > doc.page.height - doc.page.margins.bottom) {
		doc.addPage();
	}
};

const writeFacts = (doc: PDFKit.PDFDocument, section: ReportSection): void => {
	for (const item of section.facts) {
		ensureSpace(doc, ROW_HEIGHT);
		doc.font("Helvetica-Bold").text(`${item.label}: `, { continued: true });
		doc.font("Helvetica").text(formatFactValue(item));
	}
};

const writeTable = (doc: PDFKit.PDFDocument, table: ReportTable): void => {
	const width = doc.page.width - MARGIN * 2;
	const columnWidth = width / table.columns.length;
	const writeRow = (cells: readonly string[], bold: boolean): void => {
		ensureSpace(doc, ROW_HEIGHT);
		const y = doc.y;
		doc.font(bold ? "Helvetica-Bold" : "Helvetica").fontSize(8);
		cells.forEach((cell, index) => {
			doc.text(cell, MARGIN + index * columnWidth, y, {
				width: columnWidth - 4,
				lineBreak: false,
				ellipsis: true,
			});
		});
		doc.x = MARGIN;
		doc.y = y + ROW_HEIGHT;
	};

	doc.moveDown(0.5);
	writeRow(table.columns, true);
	for (const row of table.rows) {
		writeRow(
			row.map((value, index) => formatCell(value, table.units[index] ?? "text")),
			false
		);
	}
	doc.fontSize(10);
};

const writeSection = (doc: PDFKit.PDFDocument, section: ReportSection, hasArabicFont: boolean): void => {
	ensureSpace(doc, ROW_HEIGHT * 3);
	doc.moveDown();
	doc.font("Helvetica-Bold").fontSize(14).text(section.title);
	doc.fontSize(10).moveDown(0.3);
	writeFacts(doc, section);
	if (section.rows) {
		writeTable(doc, section.rows);
	}
	const prose = printableProse(section, hasArabicFont);
	if (prose.length < (section.prose?.length ?? 0)) {
		logger.warn("arabic_text_skipped", { section: section.id, hint: "pass fontPath to render Arabic" });
	}
	for (const paragraph of prose) {
		doc.font("Helvetica").text(paragraph, { align: "left" });
		doc.moveDown(0.3);
	}
};

const collect = (doc: PDFKit.PDFDocument): Promise<Buffer> =>
	new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		doc.on("data", (chunk: Buffer) => chunks.push(chunk));
		doc.on("end", () => resolve(Buffer.concat(chunks)));
		doc.on("error", reject);
	});

/**
 * Render a report document to PDF bytes. Any rendering failure (bad image
 * data, unreadable font) becomes a FormatError.
 */
export async function renderReportPdf(
	document: ReportDocument,
	options: RenderPdfOptions = {}
): Promise<Buffer> {
	try {
		const doc = new PDFDocument({
			size: "A4",
			margin: MARGIN,
			info: { Title: document.title, CreationDate: new Date(document.generatedAt) },
		});
		const done = collect(doc);

		if (options.fontPath) {
			doc.registerFont("Helvetica", options.fontPath);
			doc.registerFont("Helvetica-Bold", options.fontPath);
		}
		doc.font("Helvetica-Bold").fontSize(20).text(document.title);
		doc.font("Helvetica").fontSize(9).text(`Generated ${document.generatedAt}`);

		for (const section of document.sections) {
			writeSection(doc, section, Boolean(options.fontPath));
		}

		for (const image of options.images ?? []) {
			doc.addPage();
			if (image.title) {
				doc.font("Helvetica-Bold").fontSize(12).text(image.title);
			}
			doc.image(image.data, { fit: [doc.page.width - MARGIN * 2, 400] });
		}

		doc.end();
		const buffer = await done;
		logger.info("report_rendered", {
			sections: document.sections.length,
			images: options.images?.length ?? 0,
			bytes: buffer.length,
		});
		return buffer;
	} catch (error) {
		throw new AnalysisError("FormatError", `Could not render the PDF report: ${describeError(error)}`, {
			details: { title: document.title },
			cause: error,
		});
	}
}
