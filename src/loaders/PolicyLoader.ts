/**
 * Policy Loader
 *
 * Reads governance policies from *.yaml and *.yml files. Only `metadata.name` and
 * `metadata.compliance` are interpreted; malformed values there are dropped rather
 * than rejected, and every other field is kept as-is.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import { DefinitionLoadError } from '../core/errors.js';
import type { Policy } from '../types/policy.js';
import type { Logger } from '../types/index.js';
import { DEFAULTS, FILE_EXTENSIONS } from '../utils/constants.js';
import { listDefinitionFiles, parseYaml, readYamlFile } from './yamlFiles.js';

const PolicyMetadataSchema = z.object({
    name: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
    compliance: z.array(z.unknown())
        .transform((items) => items.filter((item): item is string => typeof item === 'string'))
        .optional()
        .catch(undefined),
}).passthrough();

const PolicyDocumentSchema = z.object({
    metadata: PolicyMetadataSchema.optional().catch(undefined),
}).passthrough();

export interface PolicyLoadOptions {
    /** Files read in parallel */
    concurrency?: number;
    logger?: Logger;
}

/**
 * Narrow a parsed policy document. An empty document is an empty policy.
 *
 * @throws DefinitionLoadError if the document is not a mapping
 */
export function toPolicy(document: unknown, filePath: string): Policy {
    if (document === null || document === undefined) {
        return {};
    }

    const result = PolicyDocumentSchema.safeParse(document);
    if (!result.success) {
        throw new DefinitionLoadError(filePath, 'policy document must be a mapping');
    }

    const { metadata, ...rest } = result.data;
    const policy: Policy = { ...rest };
    if (metadata) {
        policy.metadata = { ...metadata };
    }
    return policy;
}

/**
 * Parse a policy from YAML text
 */
export function parsePolicyYaml(content: string, filePath = '<inline>'): Policy {
    return toPolicy(parseYaml(content, filePath), filePath);
}

/**
 * Load every policy in a directory, in file-name order
 */
export async function loadPolicies(directory: string, options: PolicyLoadOptions = {}): Promise<Policy[]> {
    const { concurrency = DEFAULTS.LOAD_CONCURRENCY, logger } = options;
    const files = await listDefinitionFiles(directory, FILE_EXTENSIONS.POLICY);
    const limit = pLimit(concurrency);

    const policies = await Promise.all(
        files.map((file) => limit(async () => {
            const policy = toPolicy(await readYamlFile(file), file);
            logger?.debug(`Loaded policy ${policy.metadata?.name ?? '(unnamed)'} from ${file}`);
            return policy;
        }))
    );

    logger?.info(`Loaded ${policies.length} policies from ${directory}`);
    return policies;
}
