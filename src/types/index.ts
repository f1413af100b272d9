/**
 * Shared Type Definitions
 */

export type {
    ControlSeverity,
    CheckDescriptor,
    Control,
    Standard,
    ControlDefinition,
    StandardDefinition,
    PolicyStandardMapping,
    PolicyReportDetail,
    ComplianceReport,
    GapResult,
} from './compliance.js';
export { CONTROL_SEVERITIES } from './compliance.js';

export type { Policy, PolicyMetadata, ParsedReference } from './policy.js';

/**
 * Minimal logger contract accepted by services, satisfied by the winston logger
 */
export interface Logger {
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}
