/**
 * Report Aggregator
 * Builds a cross-policy compliance report from per-policy mappings
 */

import type { ComplianceReport, PolicyStandardMapping } from '../types/compliance.js';
import type { Policy } from '../types/policy.js';
import type { Logger } from '../types/index.js';
import { PolicyMapper } from './PolicyMapper.js';
import type { StandardCatalog } from './StandardCatalog.js';

export const UNKNOWN_POLICY_NAME = 'unknown';

/**
 * Name used for a policy in report details
 */
export function policyName(policy: Policy): string {
    const name = policy.metadata?.name;
    return typeof name === 'string' ? name : UNKNOWN_POLICY_NAME;
}

/**
 * Union a policy mapping into an accumulated standard → controls map
 */
export function mergeMapping(target: Map<string, Set<string>>, mapping: PolicyStandardMapping): void {
    for (const [standardId, controlIds] of mapping) {
        let controls = target.get(standardId);
        if (!controls) {
            controls = new Set();
            target.set(standardId, controls);
        }
        for (const controlId of controlIds) {
            controls.add(controlId);
        }
    }
}

export class ReportAggregator {
    private readonly mapper: PolicyMapper;

    constructor(
        catalog: StandardCatalog,
        private readonly logger?: Logger
    ) {
        this.mapper = new PolicyMapper(catalog);
    }

    /**
     * Aggregate a batch of policies.
     *
     * Policies sharing a name overwrite each other's detail entry (the later one wins,
     * with a warning), while their mappings still count towards the summary.
     * `totalPolicies` is the number of inputs.
     */
    aggregate(policies: readonly Policy[]): ComplianceReport {
        const report: ComplianceReport = {
            summary: {
                totalPolicies: policies.length,
                standardsCovered: new Set(),
                controlsCovered: new Map(),
            },
            details: new Map(),
        };

        for (const policy of policies) {
            const name = policyName(policy);
            const { mapping, unresolved } = this.mapper.resolve(policy);

            if (unresolved.length > 0) {
                this.logger?.debug(`Policy ${name}: ignoring references to unknown standards`, { references: unresolved });
            }

            if (report.details.has(name)) {
                this.logger?.warn(`Duplicate policy name "${name}"; report details keep the last occurrence`);
            }
            report.details.set(name, { policyName: name, standards: mapping });

            for (const standardId of mapping.keys()) {
                report.summary.standardsCovered.add(standardId);
            }
            mergeMapping(report.summary.controlsCovered, mapping);
        }

        return report;
    }
}
