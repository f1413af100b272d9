/**
 * Constants and Configuration Limits
 */

/**
 * Input Limits
 */
export const LIMITS = {
    /** Maximum YAML file size in bytes (1MB) */
    YAML_MAX_SIZE_BYTES: 1 * 1024 * 1024,

    /** Maximum YAML alias count (billion laughs protection) */
    YAML_MAX_ALIASES: 50,

    /** Maximum definition files read from one directory */
    MAX_FILES_PER_DIRECTORY: 5000,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
    /** Standard definitions are only read from .yaml files */
    STANDARD: ['.yaml'] as const,

    /** Policy documents */
    POLICY: ['.yaml', '.yml'] as const,
} as const;

/**
 * Output formats for the coverage report
 */
export const REPORT_FORMATS = ['json', 'csv', 'html'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

/**
 * Defaults
 */
export const DEFAULTS = {
    STANDARDS_DIR: './standards',
    LOAD_CONCURRENCY: 4,
    REPORT_FORMAT: 'json',
} as const;
