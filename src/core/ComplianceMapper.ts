/**
 * Compliance Mapper
 * Single entry point binding a catalog to the mapping, report and gap operations
 */

import type { ComplianceReport, GapResult, PolicyStandardMapping } from '../types/compliance.js';
import type { Policy } from '../types/policy.js';
import type { Logger } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { GapAnalyzer } from './GapAnalyzer.js';
import { PolicyMapper } from './PolicyMapper.js';
import { ReportAggregator } from './ReportAggregator.js';
import type { StandardCatalog } from './StandardCatalog.js';

export class ComplianceMapper {
    private readonly mapper: PolicyMapper;
    private readonly aggregator: ReportAggregator;
    private readonly gapAnalyzer: GapAnalyzer;

    constructor(
        readonly catalog: StandardCatalog,
        private readonly logger: Logger = createChildLogger({ component: 'compliance-mapper' })
    ) {
        this.mapper = new PolicyMapper(catalog);
        this.aggregator = new ReportAggregator(catalog, logger);
        this.gapAnalyzer = new GapAnalyzer(catalog);
    }

    mapPolicy(policy: Policy): PolicyStandardMapping {
        return this.mapper.map(policy);
    }

    generateReport(policies: readonly Policy[]): ComplianceReport {
        this.logger.info(`Mapping ${policies.length} policies against ${this.catalog.size} standards`);
        const report = this.aggregator.aggregate(policies);
        this.logger.info(`Policies reference ${report.summary.standardsCovered.size} known standards`);
        return report;
    }

    /**
     * Gap analysis for one standard. Without an explicit list, every control
     * the catalog declares for the standard is required.
     *
     * @throws UnknownStandardError if the standard is not in the catalog
     */
    checkGap(standardId: string, policies: readonly Policy[], requiredControls?: readonly string[]): GapResult {
        const required = requiredControls ?? this.gapAnalyzer.requiredControlsFor(standardId);
        const result = this.gapAnalyzer.analyze(standardId, required, policies);
        this.logger.info(
            `${standardId}: ${result.implementedControls.size} implemented, ${result.missingControls.size} missing ` +
            `(${result.coveragePercentage.toFixed(1)}% coverage)`
        );
        return result;
    }
}
