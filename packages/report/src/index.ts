export * from "./types";
export { MISSING_VALUE, formatCell, formatFactValue } from "./formatValue";
export { assembleReport } from "./assembleReport";
export { renderReportPdf } from "./renderPdf";
