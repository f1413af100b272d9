/**
 * CSV Reporter
 * One row per policy × standard, controls joined by ";"
 */

import type { ComplianceReport } from '../types/compliance.js';
import { sortedValues } from './JsonReporter.js';

const UTF8_BOM = '\uFEFF';

export const CSV_HEADER = ['Policy', 'Standard', 'Controls'] as const;

/**
 * Quote values containing delimiters, and values spreadsheet apps would treat as formulas
 */
export function escapeCsv(value: string): string {
    if (
        value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r') ||
        value.startsWith('=') || value.startsWith('+') || value.startsWith('-') || value.startsWith('@')
    ) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export interface CsvOptions {
    /** Prefix with a UTF-8 BOM (default: false) */
    includeBOM?: boolean;
    /** Field delimiter (default: comma) */
    delimiter?: string;
    /** Separator between control ids (default: ";") */
    controlSeparator?: string;
}

export function reportToRows(report: ComplianceReport, controlSeparator = ';'): string[][] {
    const rows: string[][] = [];
    for (const [name, detail] of report.details) {
        for (const [standardId, controlIds] of detail.standards) {
            rows.push([name, standardId, sortedValues(controlIds).join(controlSeparator)]);
        }
    }
    return rows;
}

export function renderReportCsv(report: ComplianceReport, options: CsvOptions = {}): string {
    const { includeBOM = false, delimiter = ',', controlSeparator = ';' } = options;

    const lines = [[...CSV_HEADER], ...reportToRows(report, controlSeparator)]
        .map((row) => row.map(escapeCsv).join(delimiter));

    const csv = lines.join('\r\n');
    return includeBOM ? UTF8_BOM + csv : csv;
}
