/**
 * Standard Loader
 *
 * Reads one standard per YAML file:
 *
 * ```yaml
 * standard:
 *   id: SOC-2
 *   name: SOC 2 Type II
 *   version: "2017"
 * controls:
 *   - id: CC6.1
 *     title: Logical Access Controls
 *     description: ...
 *     severity: high
 *     checks:
 *       - type: policy-exists
 * ```
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import { DefinitionLoadError } from '../core/errors.js';
import { StandardCatalog, type StandardCatalogOptions } from '../core/StandardCatalog.js';
import { CONTROL_SEVERITIES, type StandardDefinition } from '../types/compliance.js';
import type { Logger } from '../types/index.js';
import { DEFAULTS, FILE_EXTENSIONS } from '../utils/constants.js';
import { listDefinitionFiles, parseYaml, readYamlFile } from './yamlFiles.js';

// YAML reads `version: 2017` or `id: 1.1` as numbers
const IdentifierSchema = z.union([z.string(), z.number()]).transform(String);

const ControlSchema = z.object({
    id: IdentifierSchema,
    title: z.string(),
    description: z.string(),
    severity: z.preprocess(
        (value) => (typeof value === 'string' ? value.toLowerCase() : value),
        z.enum(CONTROL_SEVERITIES)
    ).optional(),
    checks: z.array(z.record(z.unknown())).nullish(),
});

const StandardDocumentSchema = z.object({
    standard: z.object({
        id: IdentifierSchema,
        name: z.string(),
        version: IdentifierSchema,
    }),
    controls: z.array(ControlSchema).nullish(),
});

export interface StandardLoadOptions {
    /** Files read in parallel */
    concurrency?: number;
    logger?: Logger;
}

/**
 * Narrow a parsed standard document
 *
 * @throws DefinitionLoadError when required fields are missing or mistyped
 */
export function toStandardDefinition(document: unknown, filePath: string): StandardDefinition {
    const result = StandardDocumentSchema.safeParse(document);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
        throw new DefinitionLoadError(filePath, `invalid standard definition (${issues})`);
    }

    const { standard, controls } = result.data;
    return {
        id: standard.id,
        name: standard.name,
        version: standard.version,
        controls: (controls ?? []).map((control) => ({
            id: control.id,
            title: control.title,
            description: control.description,
            severity: control.severity,
            checks: control.checks ?? undefined,
        })),
    };
}

/**
 * Parse a standard definition from YAML text
 */
export function parseStandardYaml(content: string, filePath = '<inline>'): StandardDefinition {
    return toStandardDefinition(parseYaml(content, filePath), filePath);
}

/**
 * Load every standard definition in a directory, in file-name order
 */
export async function loadStandardDefinitions(
    directory: string,
    options: StandardLoadOptions = {}
): Promise<StandardDefinition[]> {
    const { concurrency = DEFAULTS.LOAD_CONCURRENCY, logger } = options;
    const files = await listDefinitionFiles(directory, FILE_EXTENSIONS.STANDARD);
    const limit = pLimit(concurrency);

    const definitions = await Promise.all(
        files.map((file) => limit(async () => toStandardDefinition(await readYamlFile(file), file)))
    );

    logger?.info(`Loaded ${definitions.length} standard definitions from ${directory}`);
    return definitions;
}

/**
 * Load a directory of standards straight into a catalog
 */
export async function loadStandardCatalog(
    directory: string,
    options: StandardLoadOptions & StandardCatalogOptions = {}
): Promise<StandardCatalog> {
    const definitions = await loadStandardDefinitions(directory, options);
    return StandardCatalog.fromDefinitions(definitions, options);
}
