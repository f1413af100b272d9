/**
 * Compliance mapper error types
 */

export type ComplianceErrorCode =
    | 'UNKNOWN_STANDARD'
    | 'DUPLICATE_STANDARD'
    | 'DEFINITION_LOAD_FAILED';

/**
 * Base class for every error the mapper raises on purpose
 */
export class ComplianceMapperError extends Error {
    public readonly code: ComplianceErrorCode;

    constructor(code: ComplianceErrorCode, message: string) {
        super(message);
        this.name = 'ComplianceMapperError';
        this.code = code;
    }
}

/**
 * Raised when a gap analysis targets a standard that is not in the catalog
 */
export class UnknownStandardError extends ComplianceMapperError {
    public readonly standardId: string;

    constructor(standardId: string) {
        super('UNKNOWN_STANDARD', `Standard ${standardId} not found`);
        this.name = 'UnknownStandardError';
        this.standardId = standardId;
    }
}

/**
 * Raised when the catalog is built with the "error" duplicate strategy and an id repeats
 */
export class DuplicateStandardError extends ComplianceMapperError {
    public readonly standardId: string;

    constructor(standardId: string) {
        super('DUPLICATE_STANDARD', `Standard ${standardId} is defined more than once`);
        this.name = 'DuplicateStandardError';
        this.standardId = standardId;
    }
}

/**
 * Raised by the loaders when a definition file cannot be read or parsed
 */
export class DefinitionLoadError extends ComplianceMapperError {
    public readonly filePath: string;

    constructor(filePath: string, reason: string) {
        super('DEFINITION_LOAD_FAILED', `Failed to load ${filePath}: ${reason}`);
        this.name = 'DefinitionLoadError';
        this.filePath = filePath;
    }
}
