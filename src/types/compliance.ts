/**
 * Compliance Standard Type Definitions
 * Standards, their controls, and the in-memory report structures built from them
 */

/**
 * Control severity levels, lowest first
 */
export const CONTROL_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type ControlSeverity = (typeof CONTROL_SEVERITIES)[number];

/**
 * Opaque check descriptor attached to a control.
 * The mapper never interprets these; they travel with the control for downstream tooling.
 */
export type CheckDescriptor = Readonly<Record<string, unknown>>;

/**
 * A single requirement within a standard
 */
export interface Control {
    /** Control identifier (e.g., "CC6.1") */
    readonly id: string;
    readonly title: string;
    readonly description: string;
    readonly severity: ControlSeverity;
    readonly checks: readonly CheckDescriptor[];
}

/**
 * A named, versioned catalog of controls
 */
export interface Standard {
    /** Globally unique key (e.g., "SOC-2") */
    readonly id: string;
    readonly name: string;
    readonly version: string;
    readonly controls: readonly Control[];
}

/**
 * Control as it arrives from an external definition, before defaults are applied
 */
export interface ControlDefinition {
    id: string;
    title: string;
    description: string;
    severity?: ControlSeverity;
    checks?: CheckDescriptor[];
}

/**
 * One standard as it arrives from an external definition
 */
export interface StandardDefinition {
    id: string;
    name: string;
    version: string;
    controls: ControlDefinition[];
}

/**
 * Standard id → referenced control ids, for a single policy
 */
export type PolicyStandardMapping = Map<string, Set<string>>;

/**
 * Per-policy entry of a compliance report
 */
export interface PolicyReportDetail {
    policyName: string;
    standards: PolicyStandardMapping;
}

/**
 * Result of aggregating many policies against a catalog
 */
export interface ComplianceReport {
    summary: {
        /** Number of input policies (not of distinct detail entries) */
        totalPolicies: number;
        standardsCovered: Set<string>;
        controlsCovered: Map<string, Set<string>>;
    };
    /** Keyed by policy name */
    details: Map<string, PolicyReportDetail>;
}

/**
 * Result of comparing required controls against what policies implement
 */
export interface GapResult {
    standard: string;
    /** Required control ids as given, duplicates preserved */
    requiredControls: string[];
    implementedControls: Set<string>;
    missingControls: Set<string>;
    /** 0-100 */
    coveragePercentage: number;
}
