/**
 * Gap Report Exporter
 * Generates markdown gap reports for audit evidence
 */

import type { StandardCatalog } from '../core/StandardCatalog.js';
import type { GapResult } from '../types/compliance.js';
import { sortedValues } from './JsonReporter.js';
import { writeOutput } from './output.js';

export type GapStatus = 'compliant' | 'partial' | 'non-compliant';

/**
 * Overall status: full coverage is compliant, none is non-compliant
 */
export function gapStatus(gap: GapResult): GapStatus {
    if (gap.missingControls.size === 0) {
        return 'compliant';
    }
    return gap.implementedControls.size > 0 ? 'partial' : 'non-compliant';
}

const STATUS_EMOJI: Record<GapStatus, string> = {
    compliant: '✅',
    partial: '⚠️',
    'non-compliant': '❌',
};

export class GapReportExporter {
    constructor(private readonly catalog: StandardCatalog) {}

    /**
     * Render a gap result as markdown
     */
    generateMarkdown(gap: GapResult, reportDate?: string): string {
        const date = reportDate || new Date().toISOString().split('T')[0];
        const standard = this.catalog.get(gap.standard);
        const status = gapStatus(gap);
        const heading = standard ? `${standard.name} (${standard.id} v${standard.version})` : gap.standard;

        let md = `# ${heading} Gap Report

**Date:** ${date}
**Status:** ${STATUS_EMOJI[status]} ${status.toUpperCase()}
**Coverage:** ${gap.coveragePercentage.toFixed(1)}%

---

## Summary

| Metric | Count |
|--------|-------|
| Controls Required | ${gap.implementedControls.size + gap.missingControls.size} |
| Controls Implemented | ${gap.implementedControls.size} |
| Controls Missing | ${gap.missingControls.size} |

---

## Control Details

| Status | Control | Title | Severity |
|--------|---------|-------|----------|
`;

        const required = sortedValues(new Set(gap.requiredControls));
        for (const controlId of required) {
            const control = this.catalog.getControl(gap.standard, controlId);
            const icon = gap.implementedControls.has(controlId) ? '✅' : '❌';
            md += `| ${icon} | ${controlId} | ${control?.title ?? '*not in catalog*'} | ${control?.severity ?? '-'} |\n`;
        }

        if (required.length === 0) {
            md += `| ✅ | - | *No controls required* | - |\n`;
        }

        return md;
    }

    /**
     * Write the markdown report to a file and return its path
     */
    export(gap: GapResult, filePath: string, reportDate?: string): string {
        return writeOutput(filePath, this.generateMarkdown(gap, reportDate));
    }
}
