/**
 * Compliance reference parsing
 *
 * A reference is `TOKEN1-TOKEN2[-TOKEN3...]`. The standard id is always the first two
 * hyphen-delimited tokens; whatever follows is the control id, hyphens included.
 */

import type { ParsedReference } from '../types/policy.js';

const SEPARATOR = '-';

/**
 * Split a reference into its standard id and optional control id.
 * Never throws: references with fewer than two tokens are returned whole as the standard id.
 *
 * @example
 * ```typescript
 * parseReference('SOC-2-CC6.1');        // { standardId: 'SOC-2', controlId: 'CC6.1' }
 * parseReference('NIST-800-53-AC-2');   // { standardId: 'NIST-800', controlId: '53-AC-2' }
 * parseReference('GDPR');               // { standardId: 'GDPR' }
 * ```
 */
export function parseReference(reference: string): ParsedReference {
    const tokens = reference.split(SEPARATOR);

    const standardId = tokens.length >= 2
        ? `${tokens[0]}${SEPARATOR}${tokens[1]}`
        : reference;

    if (tokens.length > 2) {
        return { standardId, controlId: tokens.slice(2).join(SEPARATOR) };
    }

    return { standardId };
}
