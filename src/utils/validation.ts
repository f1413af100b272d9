/**
 * Definition File Guards
 *
 * Standards and policies are hand-edited YAML, often collected from other teams.
 * These checks run on the raw text before js-yaml expands any anchors.
 */

import { LIMITS } from './constants.js';

export interface YamlSafetyResult {
    safe: boolean;
    error?: string;
}

// `*name` dereferences an anchor; js-yaml copies the anchored node for every alias
const ALIAS = /\*[\w-]+/g;

// `[*a, *a, *a, ...]`: each level multiplies the size of the level below
const ALIAS_RUN = /(?:\*[\w-]+\s*,\s*){10,}/;

/**
 * Reject definition text that is oversized or could expand through aliases
 *
 * @example
 * ```typescript
 * const result = validateYamlSafety(fs.readFileSync('standards/soc-2.yaml', 'utf-8'));
 * if (!result.safe) {
 *   throw new DefinitionLoadError('standards/soc-2.yaml', result.error ?? 'unsafe YAML content');
 * }
 * ```
 */
export function validateYamlSafety(content: string): YamlSafetyResult {
    const bytes = Buffer.byteLength(content, 'utf-8');
    if (bytes > LIMITS.YAML_MAX_SIZE_BYTES) {
        return {
            safe: false,
            error: `content is ${bytes} bytes; definition files are limited to ${LIMITS.YAML_MAX_SIZE_BYTES} bytes`,
        };
    }

    const aliasCount = content.match(ALIAS)?.length ?? 0;
    if (aliasCount > LIMITS.YAML_MAX_ALIASES) {
        return {
            safe: false,
            error: `${aliasCount} aliases exceed the limit of ${LIMITS.YAML_MAX_ALIASES} per definition file`,
        };
    }

    if (ALIAS_RUN.test(content)) {
        return {
            safe: false,
            error: 'list of 10 or more consecutive aliases (alias expansion)',
        };
    }

    return { safe: true };
}
