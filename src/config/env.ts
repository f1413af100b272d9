/**
 * Environment Configuration Manager
 * Loads and validates optional environment variables with strict error handling
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import type { DuplicateStandardStrategy } from '../core/StandardCatalog.js';
import { DEFAULTS } from '../utils/constants.js';

// Load .env file from project root
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

/**
 * Application configuration interface
 */
export interface EnvConfig {
    /** Directory holding one YAML file per standard */
    STANDARDS_DIR: string;
    /** Winston log level */
    LOG_LEVEL: string;
    /** Handling of repeated standard ids while building the catalog */
    DUPLICATE_STANDARDS: DuplicateStandardStrategy;
    /** Number of definition files read in parallel */
    LOAD_CONCURRENCY: number;
}

/**
 * Get an optional environment variable with a default value
 */
function getOptional(key: string, defaultValue: string): string {
    const value = process.env[key];
    return (value !== undefined && value.trim() !== '')
        ? value.trim()
        : defaultValue;
}

/**
 * Get a numeric environment variable
 * @throws Error if value is not a valid integer
 */
function getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];

    if (value === undefined || value.trim() === '') {
        return defaultValue;
    }

    const parsed = parseInt(value.trim(), 10);

    if (isNaN(parsed)) {
        throw new Error(
            `[CONFIG ERROR] Invalid numeric value for ${key}: "${value}"\n` +
            `Expected a valid integer.`
        );
    }

    return parsed;
}

/**
 * Get an environment variable restricted to a fixed set of values
 * @throws Error if the value is not one of the allowed values
 */
function getEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
    const value = getOptional(key, defaultValue).toLowerCase();
    const match = allowed.find((candidate) => candidate === value);

    if (match === undefined) {
        throw new Error(
            `[CONFIG ERROR] Invalid value for ${key}: "${value}"\n` +
            `Expected one of: ${allowed.join(', ')}`
        );
    }

    return match;
}

/**
 * Load and validate all environment configuration
 * @throws Error if any configuration value is invalid
 */
export function loadEnvConfig(): EnvConfig {
    const config: EnvConfig = {
        STANDARDS_DIR: getOptional('STANDARDS_DIR', DEFAULTS.STANDARDS_DIR),
        LOG_LEVEL: getOptional('LOG_LEVEL', 'info'),
        DUPLICATE_STANDARDS: getEnum<DuplicateStandardStrategy>('DUPLICATE_STANDARDS', ['warn', 'error'], 'warn'),
        LOAD_CONCURRENCY: getNumber('LOAD_CONCURRENCY', DEFAULTS.LOAD_CONCURRENCY),
    };

    if (config.LOAD_CONCURRENCY < 1) {
        throw new Error(
            `[CONFIG ERROR] LOAD_CONCURRENCY (${config.LOAD_CONCURRENCY}) must be >= 1`
        );
    }

    return config;
}

/**
 * Singleton configuration instance
 */
let configInstance: EnvConfig | null = null;

/**
 * Get the configuration singleton, loading it on first access
 * @throws Error if configuration is invalid
 */
export function getConfig(): EnvConfig {
    if (!configInstance) {
        configInstance = loadEnvConfig();
    }
    return configInstance;
}

/**
 * Reset configuration (for testing purposes)
 */
export function resetConfig(): void {
    configInstance = null;
}

export default getConfig;
