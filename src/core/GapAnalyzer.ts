/**
 * Gap Analyzer
 * Compares required controls of a standard against the controls policies implement
 */

import type { GapResult } from '../types/compliance.js';
import type { Policy } from '../types/policy.js';
import { UnknownStandardError } from './errors.js';
import { PolicyMapper } from './PolicyMapper.js';
import type { StandardCatalog } from './StandardCatalog.js';

/**
 * Implemented controls as a percentage of the required list, duplicates included.
 * An empty requirement is vacuously satisfied (100).
 */
export function coveragePercentage(implementedCount: number, requiredCount: number): number {
    if (requiredCount === 0) {
        return 100;
    }
    return (implementedCount / requiredCount) * 100;
}

export class GapAnalyzer {
    private readonly mapper: PolicyMapper;

    constructor(private readonly catalog: StandardCatalog) {
        this.mapper = new PolicyMapper(catalog);
    }

    /**
     * Compute implemented and missing controls of a standard across a batch of policies.
     *
     * @throws UnknownStandardError if the standard is not in the catalog
     */
    analyze(standardId: string, requiredControls: readonly string[], policies: readonly Policy[]): GapResult {
        if (!this.catalog.has(standardId)) {
            throw new UnknownStandardError(standardId);
        }

        const implementedAnywhere = new Set<string>();
        for (const policy of policies) {
            const controls = this.mapper.map(policy).get(standardId);
            controls?.forEach((controlId) => implementedAnywhere.add(controlId));
        }

        const required = new Set(requiredControls);
        const implementedControls = new Set<string>();
        const missingControls = new Set<string>();

        for (const controlId of required) {
            if (implementedAnywhere.has(controlId)) {
                implementedControls.add(controlId);
            } else {
                missingControls.add(controlId);
            }
        }

        return {
            standard: standardId,
            requiredControls: [...requiredControls],
            implementedControls,
            missingControls,
            coveragePercentage: coveragePercentage(implementedControls.size, requiredControls.length),
        };
    }

    /**
     * Every control id the catalog declares for a standard, in declaration order
     *
     * @throws UnknownStandardError if the standard is not in the catalog
     */
    requiredControlsFor(standardId: string): string[] {
        const standard = this.catalog.get(standardId);
        if (!standard) {
            throw new UnknownStandardError(standardId);
        }
        return standard.controls.map((control) => control.id);
    }
}
