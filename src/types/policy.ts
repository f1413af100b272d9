/**
 * Governance Policy Type Definitions
 * Only the metadata the mapper reads is typed; everything else is carried through untouched
 */

/**
 * Policy metadata block
 */
export interface PolicyMetadata {
    /** Human-readable name; reports fall back to "unknown" */
    name?: string;
    /** Compliance references, e.g. "SOC-2-CC6.1" or "ISO-27001-A.9.2" */
    compliance?: string[];
    [key: string]: unknown;
}

/**
 * A governance policy document
 */
export interface Policy {
    metadata?: PolicyMetadata;
    [key: string]: unknown;
}

/**
 * Result of splitting a compliance reference string
 */
export interface ParsedReference {
    standardId: string;
    /** Absent when the reference names only a standard */
    controlId?: string;
}
