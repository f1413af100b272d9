#!/usr/bin/env node
/**
 * Policy Compliance Mapper
 * Main Entry Point
 *
 * 1. Load the standard catalog and the policy batch from YAML
 * 2. Map policies to standards (coverage report) or compare them to required controls (gap analysis)
 * 3. Render the result to stdout or a file
 */

import { getConfig } from './config/env.js';
import { parseCliOptions, CliUsageError, type CliOptions } from './config/cli.js';
import { ComplianceMapper } from './core/ComplianceMapper.js';
import { ComplianceMapperError } from './core/errors.js';
import { loadPolicies } from './loaders/PolicyLoader.js';
import { loadStandardCatalog } from './loaders/StandardLoader.js';
import { GapReportExporter, renderGapJson, renderReport, writeOutput } from './reporters/index.js';
import type { Policy } from './types/policy.js';
import { logger, logSection, logSuccess, logFailure, logWarning } from './utils/logger.js';

export const EXIT_CODES = {
    SUCCESS: 0,
    FAILURE: 1,
    USAGE: 2,
} as const;

/**
 * Display help message
 */
function displayHelp(): void {
    console.log(`
Policy Compliance Mapper

Usage:
  compliance-mapper --policies=DIR [options]

Options:
  -p, --policies=DIR        Directory containing policy YAML files (required)
  -s, --standards=DIR       Standards directory (default: STANDARDS_DIR or ./standards)
  -o, --output=FILE         Write output to FILE instead of stdout
  -f, --format=FORMAT       Coverage report format: json, csv, html (default: json)
      --gap=STANDARD        Run a gap analysis for STANDARD instead of the coverage report
      --require=ID,ID       Required control ids (default: every control of STANDARD)
      --min-coverage=N      Exit with code 1 when gap coverage is below N percent
      --markdown=FILE       Also write a markdown gap report to FILE
  -h, --help                Show this help
`);
}

function emit(content: string, outputPath?: string): void {
    if (outputPath) {
        const written = writeOutput(outputPath, content);
        logSuccess(`Report written to ${written}`);
    } else {
        console.log(content);
    }
}

function runGapAnalysis(mapper: ComplianceMapper, policies: Policy[], options: CliOptions, standardId: string): number {
    const gap = mapper.checkGap(standardId, policies, options.requiredControls);

    emit(renderGapJson(gap), options.outputPath);

    if (options.markdownPath) {
        const written = new GapReportExporter(mapper.catalog).export(gap, options.markdownPath);
        logSuccess(`Gap report written to ${written}`);
    }

    if (options.minCoverage !== undefined && gap.coveragePercentage < options.minCoverage) {
        logFailure(
            `${standardId} coverage ${gap.coveragePercentage.toFixed(1)}% is below the required ${options.minCoverage}%`
        );
        return EXIT_CODES.FAILURE;
    }

    return EXIT_CODES.SUCCESS;
}

/**
 * Run the CLI and resolve to a process exit code
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliOptions(args);
    } catch (error) {
        if (error instanceof CliUsageError) {
            logger.error(error.message);
            logger.error('Run with --help for usage');
            return EXIT_CODES.USAGE;
        }
        throw error;
    }

    if (options.helpFlag || !options.policiesDir) {
        displayHelp();
        return EXIT_CODES.SUCCESS;
    }

    try {
        const config = getConfig();
        logger.level = config.LOG_LEVEL;

        logSection('Policy Compliance Mapper');

        const catalog = await loadStandardCatalog(options.standardsDir ?? config.STANDARDS_DIR, {
            concurrency: config.LOAD_CONCURRENCY,
            onDuplicate: config.DUPLICATE_STANDARDS,
            logger,
        });
        const policies = await loadPolicies(options.policiesDir, {
            concurrency: config.LOAD_CONCURRENCY,
            logger,
        });
        if (policies.length === 0) {
            logWarning(`No policy files found in ${options.policiesDir}`);
        }

        const mapper = new ComplianceMapper(catalog);

        if (options.gapStandard) {
            return runGapAnalysis(mapper, policies, options, options.gapStandard);
        }

        emit(renderReport(mapper.generateReport(policies), options.format), options.outputPath);
        return EXIT_CODES.SUCCESS;
    } catch (error) {
        if (error instanceof ComplianceMapperError) {
            logFailure(error.message);
            return EXIT_CODES.FAILURE;
        }
        throw error;
    }
}

if (require.main === module) {
    main()
        .then((exitCode) => {
            process.exitCode = exitCode;
        })
        .catch((error: unknown) => {
            logger.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`, {
                stack: error instanceof Error ? error.stack : undefined,
            });
            process.exitCode = EXIT_CODES.FAILURE;
        });
}
