/**
 * Reporters Module Index
 */

import type { ComplianceReport } from '../types/compliance.js';
import type { ReportFormat } from '../utils/constants.js';
import { renderReportCsv } from './CsvReporter.js';
import { renderReportHtml } from './HtmlReporter.js';
import { renderReportJson } from './JsonReporter.js';

export {
    renderReportJson,
    renderGapJson,
    reportToJson,
    gapToJson,
    mappingToJson,
    sortedValues,
    type ComplianceReportJson,
    type GapResultJson,
} from './JsonReporter.js';
export { renderReportCsv, reportToRows, escapeCsv, CSV_HEADER, type CsvOptions } from './CsvReporter.js';
export { renderReportHtml, escapeHtml, type HtmlReportOptions } from './HtmlReporter.js';
export { GapReportExporter, gapStatus, type GapStatus } from './GapReportExporter.js';
export { writeOutput } from './output.js';

/**
 * Render a coverage report in the requested format
 */
export function renderReport(report: ComplianceReport, format: ReportFormat): string {
    switch (format) {
        case 'csv':
            return renderReportCsv(report);
        case 'html':
            return renderReportHtml(report);
        case 'json':
            return renderReportJson(report);
    }
}
