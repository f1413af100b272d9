/**
 * JSON Reporter
 * Converts report structures to plain JSON values; sets become sorted arrays
 */

import type { ComplianceReport, GapResult, PolicyStandardMapping } from '../types/compliance.js';

export interface ComplianceReportJson {
    summary: {
        total_policies: number;
        standards_covered: string[];
        controls_covered: Record<string, string[]>;
    };
    details: Record<string, {
        policy_name: string;
        standards: Record<string, string[]>;
    }>;
}

export interface GapResultJson {
    standard: string;
    required_controls: string[];
    implemented_controls: string[];
    missing_controls: string[];
    coverage_percentage: number;
}

export function sortedValues(values: Iterable<string>): string[] {
    return [...values].sort();
}

// Object.fromEntries defines own properties, so ids like "__proto__" stay plain keys
export function mappingToJson(mapping: PolicyStandardMapping): Record<string, string[]> {
    return Object.fromEntries(
        [...mapping].map(([standardId, controlIds]) => [standardId, sortedValues(controlIds)] as const)
    );
}

export function reportToJson(report: ComplianceReport): ComplianceReportJson {
    const details: ComplianceReportJson['details'] = Object.fromEntries(
        [...report.details].map(([name, detail]) => [name, {
            policy_name: detail.policyName,
            standards: mappingToJson(detail.standards),
        }] as const)
    );

    return {
        summary: {
            total_policies: report.summary.totalPolicies,
            standards_covered: sortedValues(report.summary.standardsCovered),
            controls_covered: mappingToJson(report.summary.controlsCovered),
        },
        details,
    };
}

export function gapToJson(gap: GapResult): GapResultJson {
    return {
        standard: gap.standard,
        required_controls: [...gap.requiredControls],
        implemented_controls: sortedValues(gap.implementedControls),
        missing_controls: sortedValues(gap.missingControls),
        coverage_percentage: gap.coveragePercentage,
    };
}

export function renderReportJson(report: ComplianceReport): string {
    return JSON.stringify(reportToJson(report), null, 2);
}

export function renderGapJson(gap: GapResult): string {
    return JSON.stringify(gapToJson(gap), null, 2);
}
