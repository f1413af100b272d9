import { REPORT_FORMATS, DEFAULTS, type ReportFormat } from '../utils/constants.js';

export interface CliOptions {
    args: string[];
    helpFlag: boolean;
    /** Directory of policy YAML files (required unless --help) */
    policiesDir?: string;
    /** Overrides STANDARDS_DIR */
    standardsDir?: string;
    /** Write the rendered output here instead of stdout */
    outputPath?: string;
    format: ReportFormat;
    /** Standard id to run a gap analysis for */
    gapStandard?: string;
    /** Required control ids; all controls of the standard when omitted */
    requiredControls?: string[];
    /** Gap analysis fails (exit code 1) below this percentage */
    minCoverage?: number;
    /** Also write a markdown gap report here */
    markdownPath?: string;
}

/**
 * Invalid command line usage
 */
export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

/**
 * Read an option given as `--name=value`, `--name value` or `-n value`
 */
function readOption(args: string[], names: string[]): string | undefined {
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        for (const name of names) {
            if (name.startsWith('--') && arg.startsWith(`${name}=`)) {
                return arg.slice(name.length + 1);
            }
            if (arg === name) {
                const next = args[i + 1];
                if (next === undefined || next.startsWith('-')) {
                    throw new CliUsageError(`Missing value for ${name}`);
                }
                return next;
            }
        }
    }
    return undefined;
}

function parseFormat(value: string | undefined): ReportFormat {
    if (value === undefined) {
        return DEFAULTS.REPORT_FORMAT;
    }
    const format = REPORT_FORMATS.find((candidate) => candidate === value.toLowerCase());
    if (!format) {
        throw new CliUsageError(`Invalid --format "${value}". Expected one of: ${REPORT_FORMATS.join(', ')}`);
    }
    return format;
}

function parseMinCoverage(value: string | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 100) {
        throw new CliUsageError(`Invalid --min-coverage "${value}". Expected a number between 0 and 100`);
    }
    return parsed;
}

function parseList(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Parse command line arguments
 *
 * @throws CliUsageError on malformed or inconsistent options
 */
export function parseCliOptions(args: string[]): CliOptions {
    const helpFlag = args.includes('--help') || args.includes('-h');

    const options: CliOptions = {
        args,
        helpFlag,
        policiesDir: readOption(args, ['--policies', '-p']),
        standardsDir: readOption(args, ['--standards', '-s']),
        outputPath: readOption(args, ['--output', '-o']),
        format: parseFormat(readOption(args, ['--format', '-f'])),
        gapStandard: readOption(args, ['--gap']),
        requiredControls: parseList(readOption(args, ['--require'])),
        minCoverage: parseMinCoverage(readOption(args, ['--min-coverage'])),
        markdownPath: readOption(args, ['--markdown']),
    };

    if (helpFlag) {
        return options;
    }

    if (!options.policiesDir) {
        throw new CliUsageError('Missing required option --policies');
    }

    if (!options.gapStandard && (options.requiredControls || options.minCoverage !== undefined || options.markdownPath)) {
        throw new CliUsageError('--require, --min-coverage and --markdown need --gap');
    }

    return options;
}
