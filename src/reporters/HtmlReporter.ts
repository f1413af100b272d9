/**
 * HTML Reporter
 * Self-contained, offline-viewable coverage report
 */

import type { ComplianceReport } from '../types/compliance.js';
import { sortedValues } from './JsonReporter.js';

export interface HtmlReportOptions {
    title?: string;
    /** ISO timestamp shown in the header; defaults to now */
    generatedAt?: string;
}

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function renderControlList(controlIds: Iterable<string>): string {
    const items = sortedValues(controlIds).map((id) => `<code>${escapeHtml(id)}</code>`);
    return items.length > 0 ? items.join(' ') : '<em>none</em>';
}

function renderSummary(report: ComplianceReport): string {
    const rows = sortedValues(report.summary.standardsCovered)
        .map((standardId) => `
            <tr>
                <td>${escapeHtml(standardId)}</td>
                <td>${renderControlList(report.summary.controlsCovered.get(standardId) ?? [])}</td>
            </tr>`)
        .join('');

    return `
        <section>
            <h2>Summary</h2>
            <p>Policies analysed: <strong>${report.summary.totalPolicies}</strong>,
               standards covered: <strong>${report.summary.standardsCovered.size}</strong></p>
            <table>
                <thead><tr><th>Standard</th><th>Controls covered</th></tr></thead>
                <tbody>${rows || '<tr><td colspan="2"><em>No standards covered</em></td></tr>'}</tbody>
            </table>
        </section>`;
}

function renderDetails(report: ComplianceReport): string {
    const rows: string[] = [];
    for (const [name, detail] of report.details) {
        if (detail.standards.size === 0) {
            rows.push(`
            <tr><td>${escapeHtml(name)}</td><td colspan="2"><em>No mapped standards</em></td></tr>`);
            continue;
        }
        for (const [standardId, controlIds] of detail.standards) {
            rows.push(`
            <tr>
                <td>${escapeHtml(name)}</td>
                <td>${escapeHtml(standardId)}</td>
                <td>${renderControlList(controlIds)}</td>
            </tr>`);
        }
    }

    return `
        <section>
            <h2>Policies</h2>
            <table>
                <thead><tr><th>Policy</th><th>Standard</th><th>Controls</th></tr></thead>
                <tbody>${rows.join('')}</tbody>
            </table>
        </section>`;
}

export function renderReportHtml(report: ComplianceReport, options: HtmlReportOptions = {}): string {
    const title = options.title ?? 'Policy Compliance Report';
    const generatedAt = options.generatedAt ?? new Date().toISOString();

    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>
        body { font-family: system-ui, sans-serif; margin: 2rem; color: #1f2933; }
        table { border-collapse: collapse; width: 100%; margin-bottom: 2rem; }
        th, td { border: 1px solid #cbd2d9; padding: 0.4rem 0.6rem; text-align: left; vertical-align: top; }
        th { background: #f5f7fa; }
        code { background: #eef2f7; padding: 0 0.25rem; border-radius: 3px; }
    </style>
</head>
<body>
    <h1>${escapeHtml(title)}</h1>
    <p class="timestamp">Generated ${escapeHtml(generatedAt)}</p>
    ${renderSummary(report)}
    ${renderDetails(report)}
</body>
</html>
`;
}
