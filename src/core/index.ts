/**
 * Core Module Index
 */

export { parseReference } from './ReferenceParser.js';
export { StandardCatalog } from './StandardCatalog.js';
export type { DuplicateStandardStrategy, StandardCatalogOptions } from './StandardCatalog.js';
export { PolicyMapper, mapPolicy, resolvePolicy, complianceReferences } from './PolicyMapper.js';
export type { PolicyResolution } from './PolicyMapper.js';
export { ReportAggregator, policyName, mergeMapping, UNKNOWN_POLICY_NAME } from './ReportAggregator.js';
export { GapAnalyzer, coveragePercentage } from './GapAnalyzer.js';
export { ComplianceMapper } from './ComplianceMapper.js';
export {
    ComplianceMapperError,
    UnknownStandardError,
    DuplicateStandardError,
    DefinitionLoadError,
} from './errors.js';
export type { ComplianceErrorCode } from './errors.js';

export * from '../types/index.js';
